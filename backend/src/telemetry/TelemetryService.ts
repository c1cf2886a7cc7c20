/**
 * Telemetry Service - central service for emitting agent and MCP telemetry events
 *
 * Provides enriched telemetry methods that wrap ITelemetryClient.
 * Orchestrator, invoker and credential provider inject this service via DI.
 */
import { SERVICE_BACKEND, isTelemetryEventName, type TelemetryEventName } from '@foundry-mcp-chat/shared'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import { TOKENS } from '../di/tokens.js'
import type { ITelemetryClient } from './ITelemetryClient.js'

export interface TelemetryOptions {
    serviceOverride?: string
    correlationId?: string | null
}

@injectable()
export class TelemetryService {
    constructor(@inject(TOKENS.TelemetryClient) private client: ITelemetryClient) {}

    /**
     * Track an event with automatic enrichment (service name, correlation id).
     */
    trackEvent(name: string, properties?: Record<string, unknown>, opts?: TelemetryOptions): void {
        const finalProps: Record<string, unknown> = { ...properties }

        if (finalProps.service === undefined) {
            finalProps.service = opts?.serviceOverride || this.inferService()
        }

        // Always attach correlationId; generate if not supplied
        if (finalProps.correlationId === undefined) {
            finalProps.correlationId = opts?.correlationId || randomUUID()
        }

        this.client.trackEvent({ name, properties: finalProps })
    }

    /**
     * Track an event with strict name validation.
     * Names outside the shared registry are replaced by Telemetry.EventName.Invalid.
     */
    trackEventStrict(name: TelemetryEventName, properties: Record<string, unknown>, opts?: TelemetryOptions): void {
        if (!isTelemetryEventName(name)) {
            this.trackEvent('Telemetry.EventName.Invalid', { requested: name }, opts)
            return
        }
        this.trackEvent(name, properties, opts)
    }

    trackException(error: Error, properties?: Record<string, unknown>): void {
        this.client.trackException({ exception: error, properties })
    }

    private inferService(): string {
        return process.env.FOUNDRY_CHAT_SERVICE_NAME || SERVICE_BACKEND
    }
}
