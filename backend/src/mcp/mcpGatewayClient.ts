/**
 * Upstream MCP gateway client (GitHub Copilot MCP by default).
 *
 * Each call opens a Streamable HTTP session with the caller's bearer token, issues `tools/call`
 * and terminates the session on the gateway before closing the client. Failures surface as McpGatewayError with an HTTP-equivalent status.
 */
import { isJsonObject, type JsonObject } from '@foundry-mcp-chat/shared'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { StreamableHTTPClientTransport, StreamableHTTPError } from '@modelcontextprotocol/sdk/client/streamableHttp.js'
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js'
import { inject, injectable } from 'inversify'
import { z } from 'zod'
import type { McpGatewayConfig } from '../config/mcpConfig.js'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'

const CLIENT_INFO = { name: 'foundry-mcp-chat', version: '0.1.0' }

export interface McpCallToolRequest {
    name: string
    arguments: JsonObject
    token: string
    signal?: AbortSignal
    timeoutMs: number
}

export interface McpContentItem {
    type: string
    text?: string
}

export interface McpCallToolResponse {
    status: number
    content: McpContentItem[]
    structuredContent?: JsonObject
    isError: boolean
}

export type McpGatewayErrorKind = 'http' | 'protocol' | 'timeout' | 'transport'

export class McpGatewayError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly kind: McpGatewayErrorKind
    ) {
        super(message)
        this.name = 'McpGatewayError'
    }
}

export interface IMcpGatewayClient {
    /**
     * @throws McpGatewayError on HTTP, protocol, timeout or transport failure
     * @throws the caller's abort reason when `signal` aborts
     */
    callTool(request: McpCallToolRequest): Promise<McpCallToolResponse>
}

const CallToolResultSchema = z.object({
    content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
    structuredContent: z.unknown().optional(),
    isError: z.boolean().optional()
})

/**
 * Map anything the SDK or fetch threw to a gateway error.
 */
export function classifyGatewayError(error: unknown): McpGatewayError {
    if (error instanceof McpGatewayError) {
        return error
    }
    if (error instanceof StreamableHTTPError) {
        const status = error.code !== undefined && error.code >= 400 ? error.code : 502
        return new McpGatewayError(error.message, status, 'http')
    }
    if (error instanceof McpError) {
        if (error.code === ErrorCode.RequestTimeout) {
            return new McpGatewayError(error.message, 504, 'timeout')
        }
        return new McpGatewayError(error.message, 502, 'protocol')
    }
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return new McpGatewayError(error.message, 504, 'timeout')
    }
    const message = error instanceof Error ? error.message : String(error)
    return new McpGatewayError(message, 502, 'transport')
}

export type GatewaySessionTransport = Pick<StreamableHTTPClientTransport, 'sessionId' | 'terminateSession'>

/**
 * Ends the gateway-side session, when one was established, then closes the client.
 * A failed termination is returned rather than thrown; the client is closed either way.
 */
export async function closeGatewaySession(client: Pick<Client, 'close'>, transport: GatewaySessionTransport): Promise<Error | undefined> {
    let terminateError: Error | undefined
    if (transport.sessionId !== undefined) {
        try {
            await transport.terminateSession()
        } catch (error) {
            terminateError = error instanceof Error ? error : new Error(String(error))
        }
    }
    await client.close()
    return terminateError
}

@injectable()
export class SdkMcpGatewayClient implements IMcpGatewayClient {
    constructor(
        @inject(TOKENS.McpGatewayConfig) private readonly config: McpGatewayConfig,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    async callTool(request: McpCallToolRequest): Promise<McpCallToolResponse> {
        const transport = new StreamableHTTPClientTransport(new URL(this.config.endpoint), {
            requestInit: { headers: { Authorization: `Bearer ${request.token}` } }
        })
        const client = new Client(CLIENT_INFO)
        const options = { signal: request.signal, timeout: request.timeoutMs }

        try {
            await client.connect(transport, options)
            const raw = await client.callTool({ name: request.name, arguments: request.arguments }, undefined, options)
            const parsed = CallToolResultSchema.safeParse(raw)
            if (!parsed.success) {
                throw new McpGatewayError(`Unexpected tools/call result from gateway: ${parsed.error.message}`, 502, 'protocol')
            }
            const { content, structuredContent, isError } = parsed.data
            return {
                status: 200,
                content: content.map((item) => ({ type: item.type, text: item.text })),
                structuredContent: isJsonObject(structuredContent) ? structuredContent : undefined,
                isError: isError === true
            }
        } catch (error) {
            if (request.signal?.aborted) {
                throw error
            }
            throw classifyGatewayError(error)
        } finally {
            const terminateError = await closeGatewaySession(client, transport)
            if (terminateError) {
                this.telemetry.trackEventStrict('Mcp.Session.TerminateFailed', { toolName: request.name, error: terminateError.message })
            }
        }
    }
}
