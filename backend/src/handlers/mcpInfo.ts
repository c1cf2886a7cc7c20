import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { inject, injectable } from 'inversify'
import type { McpGatewayConfig } from '../config/mcpConfig.js'
import { TOKENS } from '../di/tokens.js'
import type { IToolCatalog } from '../mcp/toolCatalog.js'
import type { IGatewayCredentialProvider } from '../secrets/gatewayCredentialProvider.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { BaseHandler } from './base/BaseHandler.js'
import { getContainer } from './utils/contextHelpers.js'
import { okResponse } from './utils/responseBuilder.js'

export const MCP_SERVER_FEATURES = ['tools/list', 'tools/call', 'argument-repair', 'auto-approve'] as const

export interface McpServerInfo {
    endpoint: string
    enabledTools: string[]
    credentialConfigured: boolean
    callTimeoutMs: number
    features: readonly string[]
}

/** GET /api/mcp/info */
@injectable()
export class McpInfoHandler extends BaseHandler {
    constructor(
        @inject(TelemetryService) telemetry: TelemetryService,
        @inject(TOKENS.ToolCatalog) private readonly catalog: IToolCatalog,
        @inject(TOKENS.McpGatewayConfig) private readonly gatewayConfig: McpGatewayConfig,
        @inject(TOKENS.GatewayCredentialProvider) private readonly credentials: IGatewayCredentialProvider
    ) {
        super(telemetry)
    }

    protected async execute(): Promise<HttpResponseInit> {
        const info: McpServerInfo = {
            endpoint: this.gatewayConfig.endpoint,
            enabledTools: this.catalog.names(),
            credentialConfigured: this.credentials.isConfigured(),
            callTimeoutMs: this.gatewayConfig.callTimeoutMs,
            features: MCP_SERVER_FEATURES
        }
        this.track('Mcp.Tools.Discovered', { toolCount: info.enabledTools.length, surface: 'info' })
        return okResponse(info, { correlationId: this.correlationId })
    }
}

export async function mcpInfoHandler(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    const handler = getContainer(context).get(McpInfoHandler)
    return handler.handle(request, context)
}
