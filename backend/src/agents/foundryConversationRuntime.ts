/**
 * Conversation runtime backed by the Azure AI Foundry Agents API (Assistants-compatible surface).
 *
 * Authentication:
 * - Production: system-assigned Managed Identity
 * - Local dev: DefaultAzureCredential (respects az login credentials)
 */
import { DefaultAzureCredential, getBearerTokenProvider } from '@azure/identity'
import type { ToolDefinition } from '@foundry-mcp-chat/shared'
import { inject, injectable } from 'inversify'
import { AzureOpenAI, type OpenAI } from 'openai'
import { z } from 'zod'
import type { FoundryConfig } from '../config/foundryConfig.js'
import { TOKENS } from '../di/tokens.js'
import type {
    AgentSpec,
    ContentItem,
    IConversationRuntime,
    MessageAnnotation,
    RunSnapshot,
    RuntimeCallOptions,
    ThreadMessage,
    ToolCallRequest,
    ToolCallResult
} from './conversationRuntime.js'

const COGNITIVE_SERVICES_SCOPE = 'https://cognitiveservices.azure.com/.default'
const MESSAGE_PAGE_SIZE = 20

export type RunRecord = Pick<OpenAI.Beta.Threads.Run, 'id' | 'thread_id' | 'status' | 'required_action' | 'last_error'>
export type MessageRecord = Pick<OpenAI.Beta.Threads.Message, 'id' | 'role' | 'run_id' | 'created_at' | 'content'>

// url_citation is returned by Foundry grounding tools but is not part of the OpenAI annotation types.
const AnnotationSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('url_citation'),
        url_citation: z.object({ url: z.string(), title: z.string().nullish() })
    }),
    z.object({
        type: z.literal('file_citation'),
        file_citation: z.object({ file_id: z.string(), quote: z.string().nullish() })
    })
])

/** Unsupported annotation kinds (file_path) map to nothing. */
export function toAnnotations(raw: unknown): MessageAnnotation[] {
    const parsed = AnnotationSchema.safeParse(raw)
    if (!parsed.success) return []
    const annotation = parsed.data
    if (annotation.type === 'url_citation') {
        return [{ type: 'url_citation', url: annotation.url_citation.url, title: annotation.url_citation.title ?? undefined }]
    }
    return [{ type: 'file_citation', fileId: annotation.file_citation.file_id, quote: annotation.file_citation.quote ?? undefined }]
}

export function toThreadMessage(message: MessageRecord): ThreadMessage {
    const content = message.content.map((block): ContentItem =>
        block.type === 'text'
            ? { type: 'text', text: block.text.value, annotations: block.text.annotations.flatMap((annotation) => toAnnotations(annotation)) }
            : { type: 'other', kind: block.type }
    )
    return {
        id: message.id,
        role: message.role,
        runId: message.run_id ?? undefined,
        createdAt: message.created_at,
        content
    }
}

export function toFunctionTool(tool: ToolDefinition): OpenAI.Beta.FunctionTool {
    return {
        type: 'function',
        function: {
            name: tool.name,
            description: tool.description,
            parameters: {
                type: tool.parameters.type,
                properties: tool.parameters.properties,
                required: [...tool.parameters.required]
            }
        }
    }
}

/**
 * Map a runtime run onto the orchestrator's five states.
 * `cancelling` still counts as in progress; `cancelled`, `expired` and `incomplete` are failures.
 */
export function toRunSnapshot(run: RunRecord): RunSnapshot {
    const base = { runId: run.id, threadId: run.thread_id }
    const none: ToolCallRequest[] = []
    switch (run.status) {
        case 'queued':
            return { ...base, status: 'queued', pendingToolCalls: none }
        case 'in_progress':
        case 'cancelling':
            return { ...base, status: 'in_progress', pendingToolCalls: none }
        case 'requires_action':
            return {
                ...base,
                status: 'requires_action',
                pendingToolCalls: (run.required_action?.submit_tool_outputs.tool_calls ?? []).map((call) => ({
                    callId: call.id,
                    toolName: call.function.name,
                    rawArguments: call.function.arguments
                }))
            }
        case 'completed':
            return { ...base, status: 'completed', pendingToolCalls: none }
        case 'failed':
            return { ...base, status: 'failed', pendingToolCalls: none, error: run.last_error?.message || `Run ${run.id} failed` }
        case 'cancelled':
            return { ...base, status: 'failed', pendingToolCalls: none, error: `Run ${run.id} was cancelled` }
        case 'expired':
            return { ...base, status: 'failed', pendingToolCalls: none, error: `Run ${run.id} expired before completing` }
        case 'incomplete':
            return { ...base, status: 'failed', pendingToolCalls: none, error: `Run ${run.id} ended incomplete` }
        default:
            return { ...base, status: 'failed', pendingToolCalls: none, error: `Run ${run.id} has unrecognized status '${String(run.status)}'` }
    }
}

@injectable()
export class FoundryConversationRuntime implements IConversationRuntime {
    private readonly client: AzureOpenAI

    constructor(@inject(TOKENS.FoundryConfig) private readonly config: FoundryConfig) {
        const credential = new DefaultAzureCredential()
        const azureADTokenProvider = getBearerTokenProvider(credential, COGNITIVE_SERVICES_SCOPE)

        this.client = new AzureOpenAI({
            endpoint: config.endpoint,
            azureADTokenProvider,
            deployment: config.deploymentName,
            apiVersion: config.apiVersion
        })
    }

    async createAgent(spec: AgentSpec, options: RuntimeCallOptions = {}): Promise<string> {
        const assistant = await this.client.beta.assistants.create(
            {
                model: this.config.deploymentName,
                name: spec.name,
                instructions: spec.instructions,
                tools: spec.tools.map(toFunctionTool)
            },
            { signal: options.signal }
        )
        return assistant.id
    }

    async deleteAgent(agentId: string, options: RuntimeCallOptions = {}): Promise<void> {
        await this.client.beta.assistants.del(agentId, { signal: options.signal })
    }

    async createThread(options: RuntimeCallOptions = {}): Promise<string> {
        const thread = await this.client.beta.threads.create({}, { signal: options.signal })
        return thread.id
    }

    async deleteThread(threadId: string, options: RuntimeCallOptions = {}): Promise<void> {
        await this.client.beta.threads.del(threadId, { signal: options.signal })
    }

    async addUserMessage(threadId: string, text: string, options: RuntimeCallOptions = {}): Promise<void> {
        await this.client.beta.threads.messages.create(threadId, { role: 'user', content: text }, { signal: options.signal })
    }

    async createRun(threadId: string, agentId: string, options: RuntimeCallOptions = {}): Promise<RunSnapshot> {
        const run = await this.client.beta.threads.runs.create(threadId, { assistant_id: agentId }, { signal: options.signal })
        return toRunSnapshot(run)
    }

    async getRun(threadId: string, runId: string, options: RuntimeCallOptions = {}): Promise<RunSnapshot> {
        const run = await this.client.beta.threads.runs.retrieve(threadId, runId, { signal: options.signal })
        return toRunSnapshot(run)
    }

    async submitToolOutputs(
        threadId: string,
        runId: string,
        results: readonly ToolCallResult[],
        options: RuntimeCallOptions = {}
    ): Promise<RunSnapshot> {
        const run = await this.client.beta.threads.runs.submitToolOutputs(
            threadId,
            runId,
            { tool_outputs: results.map((result) => ({ tool_call_id: result.callId, output: JSON.stringify(result.output) })) },
            { signal: options.signal }
        )
        return toRunSnapshot(run)
    }

    async cancelRun(threadId: string, runId: string, options: RuntimeCallOptions = {}): Promise<void> {
        await this.client.beta.threads.runs.cancel(threadId, runId, { signal: options.signal })
    }

    async listMessages(threadId: string, options: RuntimeCallOptions = {}): Promise<ThreadMessage[]> {
        const page = await this.client.beta.threads.messages.list(threadId, { order: 'desc', limit: MESSAGE_PAGE_SIZE }, { signal: options.signal })
        return page.data.map(toThreadMessage).reverse()
    }
}
