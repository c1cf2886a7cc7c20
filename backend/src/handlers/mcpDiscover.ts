import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { IToolCatalog } from '../mcp/toolCatalog.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { BaseHandler } from './base/BaseHandler.js'
import { getContainer } from './utils/contextHelpers.js'
import { jsonResponse } from './utils/responseBuilder.js'

/** GET /api/mcp/discover: `tools/list`-shaped document of the enabled tools (not wrapped in the ok envelope). */
@injectable()
export class McpDiscoverHandler extends BaseHandler {
    constructor(
        @inject(TelemetryService) telemetry: TelemetryService,
        @inject(TOKENS.ToolCatalog) private readonly catalog: IToolCatalog
    ) {
        super(telemetry)
    }

    protected async execute(): Promise<HttpResponseInit> {
        this.track('Mcp.Tools.Discovered', { toolCount: this.catalog.size, surface: 'discover' })
        return jsonResponse(200, this.catalog.toDiscoveryDocument(), { correlationId: this.correlationId })
    }
}

export async function mcpDiscoverHandler(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    const handler = getContainer(context).get(McpDiscoverHandler)
    return handler.handle(request, context)
}
