import type { Container } from 'inversify'

import { ResponseExtractor } from '../agents/responseExtractor.js'
import { RunOrchestrator } from '../agents/runOrchestrator.js'
import { ArgumentNormalizer } from '../mcp/argumentNormalizer.js'
import { ToolInvoker } from '../mcp/toolInvoker.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'

/**
 * Registers the stateless services of the chat pipeline.
 * Expects telemetry client, clock, configuration, catalog, gateway, credential and runtime bindings to exist.
 */
export function registerCoreServices(container: Container): void {
    // Consistency policy: concrete services use class-based injection only (no string token).
    container.bind(TelemetryService).toSelf().inSingletonScope()
    container.bind(ArgumentNormalizer).toSelf().inSingletonScope()
    container.bind(ToolInvoker).toSelf().inSingletonScope()
    container.bind(ResponseExtractor).toSelf().inSingletonScope()
    container.bind(RunOrchestrator).toSelf().inSingletonScope()
}
