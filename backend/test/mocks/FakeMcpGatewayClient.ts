import type { IMcpGatewayClient, McpCallToolRequest, McpCallToolResponse } from '../../src/mcp/mcpGatewayClient.js'

export type GatewayResponder = (request: McpCallToolRequest) => Promise<McpCallToolResponse>

export function textResult(text: string, isError = false): McpCallToolResponse {
    return { status: 200, content: [{ type: 'text', text }], isError }
}

/**
 * In-process MCP gateway. Tools without a responder answer `{"ok":true}`.
 */
export class FakeMcpGatewayClient implements IMcpGatewayClient {
    readonly requests: McpCallToolRequest[] = []
    private readonly responders = new Map<string, GatewayResponder>()

    respondWith(toolName: string, responder: GatewayResponder): void {
        this.responders.set(toolName, responder)
    }

    async callTool(request: McpCallToolRequest): Promise<McpCallToolResponse> {
        this.requests.push(request)
        const responder = this.responders.get(request.name)
        if (!responder) {
            return textResult('{"ok":true}')
        }
        return responder(request)
    }
}
