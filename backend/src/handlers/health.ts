import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { SERVICE_BACKEND } from '@foundry-mcp-chat/shared'
import { inject, injectable, optional } from 'inversify'
import type { FoundryConfig } from '../config/foundryConfig.js'
import { TOKENS } from '../di/tokens.js'
import type { IToolCatalog } from '../mcp/toolCatalog.js'
import type { IGatewayCredentialProvider } from '../secrets/gatewayCredentialProvider.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { BaseHandler } from './base/BaseHandler.js'
import { getContainer } from './utils/contextHelpers.js'
import { okResponse } from './utils/responseBuilder.js'

export interface HealthReport {
    status: 'ok'
    service: string
    toolCount: number
    foundryConfigured: boolean
    credentialConfigured: boolean
    latencyMs: number
}

@injectable()
export class HealthHandler extends BaseHandler {
    constructor(
        @inject(TelemetryService) telemetry: TelemetryService,
        @inject(TOKENS.ToolCatalog) private readonly catalog: IToolCatalog,
        @inject(TOKENS.GatewayCredentialProvider) private readonly credentials: IGatewayCredentialProvider,
        @inject(TOKENS.FoundryConfig) @optional() private readonly foundryConfig?: FoundryConfig
    ) {
        super(telemetry)
    }

    protected async execute(): Promise<HttpResponseInit> {
        const report: HealthReport = {
            status: 'ok',
            service: SERVICE_BACKEND,
            toolCount: this.catalog.size,
            foundryConfigured: this.foundryConfig !== undefined,
            credentialConfigured: this.credentials.isConfigured(),
            latencyMs: this.latencyMs
        }
        this.track('Health.Checked', { toolCount: report.toolCount, foundryConfigured: report.foundryConfigured })
        return okResponse(report, { correlationId: this.correlationId })
    }
}

export async function healthHandler(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    const handler = getContainer(context).get(HealthHandler)
    return handler.handle(request, context)
}
