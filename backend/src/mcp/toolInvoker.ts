/**
 * Tool invoker: dispatches one normalized tool call to the MCP gateway.
 *
 * Every outcome is returned as a tool output payload that is fed back to the model;
 * the only error that escapes is the caller's own cancellation.
 */
import {
    isJsonObject,
    isJsonValue,
    toolFailure,
    type JsonValue,
    type ToolFailurePayload,
    type ToolOutputPayload
} from '@foundry-mcp-chat/shared'
import type { InvocationContext } from '@azure/functions'
import { inject, injectable } from 'inversify'
import type { McpGatewayConfig } from '../config/mcpConfig.js'
import { TOKENS } from '../di/tokens.js'
import type { IGatewayCredentialProvider } from '../secrets/gatewayCredentialProvider.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { classifyGatewayError, type IMcpGatewayClient, type McpCallToolResponse } from './mcpGatewayClient.js'
import type { IToolCatalog } from './toolCatalog.js'

export const MISSING_CREDENTIAL_ERROR = 'MCP gateway credential is missing: COPILOT_MCP_TOKEN is not set'
export const MISSING_CREDENTIAL_HOW_TO_FIX =
    'Set the COPILOT_MCP_TOKEN environment variable (app setting) to a GitHub token with Copilot MCP access.'

export const ARGUMENTS_HOW_TO_FIX = 'Send the arguments as a JSON object matching the tool schema.'

export type InvocationLogger = Pick<InvocationContext, 'log' | 'warn' | 'error'>

export interface ToolInvocationContext {
    logger: InvocationLogger
    signal?: AbortSignal
    correlationId?: string
}

type InvocationOutcome = 'success' | 'tool-error' | 'failure'

interface DispatchResult {
    status: number
    outcome: InvocationOutcome
    payload: ToolOutputPayload
}

/**
 * Text content of a tools/call result, JSON-parsed when it is JSON.
 */
export function extractToolResult(response: McpCallToolResponse): JsonValue {
    if (response.structuredContent) {
        return response.structuredContent
    }
    const text = response.content
        .map((item) => item.text)
        .filter((value): value is string => value !== undefined)
        .join('\n')
    try {
        const parsed: unknown = JSON.parse(text)
        return isJsonValue(parsed) ? parsed : text
    } catch {
        return text
    }
}

@injectable()
export class ToolInvoker {
    constructor(
        @inject(TOKENS.ToolCatalog) private readonly catalog: IToolCatalog,
        @inject(TOKENS.McpGatewayClient) private readonly gateway: IMcpGatewayClient,
        @inject(TOKENS.GatewayCredentialProvider) private readonly credentials: IGatewayCredentialProvider,
        @inject(TOKENS.McpGatewayConfig) private readonly config: McpGatewayConfig,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    async invoke(toolName: string, args: JsonValue, context: ToolInvocationContext): Promise<ToolOutputPayload> {
        const started = Date.now()
        const result = await this.dispatch(toolName, args, context)

        context.logger.log(`MCP tools/call ${toolName} => ${result.status}`)
        this.telemetry.trackEventStrict(
            'Mcp.Tool.Invoked',
            {
                toolName,
                status: result.status,
                outcome: result.outcome,
                latencyMs: Date.now() - started
            },
            { correlationId: context.correlationId }
        )
        return result.payload
    }

    private async dispatch(toolName: string, args: JsonValue, context: ToolInvocationContext): Promise<DispatchResult> {
        context.signal?.throwIfAborted()
        if (!this.catalog.has(toolName)) {
            const available = this.catalog.names().join(', ') || '(none)'
            return this.failed(404, toolFailure(toolName, `Unknown tool '${toolName}'`, `Use one of the available tools: ${available}.`))
        }
        if (!isJsonObject(args)) {
            return this.failed(
                400,
                toolFailure(toolName, `Arguments for tool '${toolName}' must be a JSON object`, ARGUMENTS_HOW_TO_FIX)
            )
        }

        let token: string | undefined
        try {
            token = await this.credentials.getToken(context.signal)
        } catch (error) {
            context.signal?.throwIfAborted()
            const reason = error instanceof Error ? error.message : String(error)
            return this.failed(401, toolFailure(toolName, `Failed to resolve MCP gateway credential: ${reason}`, MISSING_CREDENTIAL_HOW_TO_FIX))
        }
        context.signal?.throwIfAborted()
        if (!token) {
            return this.failed(401, toolFailure(toolName, MISSING_CREDENTIAL_ERROR, MISSING_CREDENTIAL_HOW_TO_FIX))
        }

        try {
            const response = await this.gateway.callTool({
                name: toolName,
                arguments: args,
                token,
                signal: context.signal,
                timeoutMs: this.config.callTimeoutMs
            })
            if (response.isError) {
                const text = response.content
                    .map((item) => item.text)
                    .filter((value): value is string => value !== undefined)
                    .join('\n')
                return { status: response.status, outcome: 'tool-error', payload: toolFailure(toolName, text || `Tool '${toolName}' reported an error`) }
            }
            return { status: response.status, outcome: 'success', payload: { success: true, function: toolName, result: extractToolResult(response) } }
        } catch (error) {
            if (context.signal?.aborted) {
                throw error
            }
            const gatewayError = classifyGatewayError(error)
            switch (gatewayError.kind) {
                case 'timeout':
                    return this.failed(
                        504,
                        toolFailure(toolName, `MCP gateway call timed out after ${this.config.callTimeoutMs} ms`, 'Retry the request, or narrow the query.')
                    )
                case 'http':
                    return this.failed(
                        gatewayError.status,
                        toolFailure(
                            toolName,
                            `MCP gateway returned HTTP ${gatewayError.status}: ${gatewayError.message}`,
                            gatewayError.status === 401 || gatewayError.status === 403
                                ? 'Check that COPILOT_MCP_TOKEN is a valid GitHub token with Copilot MCP access.'
                                : undefined
                        )
                    )
                default:
                    return this.failed(gatewayError.status, toolFailure(toolName, `MCP gateway request failed: ${gatewayError.message}`))
            }
        }
    }

    private failed(status: number, payload: ToolFailurePayload): DispatchResult {
        return { status, outcome: 'failure', payload }
    }
}
