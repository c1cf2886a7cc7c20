/**
 * Contract of the conversation runtime (Azure AI Foundry Agents) as seen by the orchestrator.
 *
 * The runtime owns threads, runs and the model. The orchestrator only drives a run to a terminal state.
 */
import { ServiceUnavailableException, type ToolDefinition, type ToolOutputPayload } from '@foundry-mcp-chat/shared'
import { injectable } from 'inversify'

/** `completed` and `failed` are terminal. */
export type RunStatus = 'queued' | 'in_progress' | 'requires_action' | 'completed' | 'failed'

export const TERMINAL_RUN_STATUSES: ReadonlySet<RunStatus> = new Set<RunStatus>(['completed', 'failed'])

export interface ToolCallRequest {
    callId: string
    toolName: string
    /** Untyped JSON text produced by the model */
    rawArguments: string
}

export interface ToolCallResult {
    callId: string
    output: ToolOutputPayload
}

export interface RunSnapshot {
    runId: string
    threadId: string
    status: RunStatus
    /** Non-empty only while `requires_action` */
    pendingToolCalls: ToolCallRequest[]
    error?: string
}

export type MessageAnnotation = { type: 'url_citation'; url: string; title?: string } | { type: 'file_citation'; fileId: string; quote?: string }

export type ContentItem = { type: 'text'; text: string; annotations: MessageAnnotation[] } | { type: 'other'; kind: string }

export interface ThreadMessage {
    id: string
    role: 'user' | 'assistant'
    runId?: string
    /** Unix seconds */
    createdAt: number
    content: ContentItem[]
}

export interface AgentSpec {
    name: string
    instructions: string
    tools: readonly ToolDefinition[]
}

export interface RuntimeCallOptions {
    signal?: AbortSignal
}

export interface IConversationRuntime {
    createAgent(spec: AgentSpec, options?: RuntimeCallOptions): Promise<string>
    deleteAgent(agentId: string, options?: RuntimeCallOptions): Promise<void>
    createThread(options?: RuntimeCallOptions): Promise<string>
    deleteThread(threadId: string, options?: RuntimeCallOptions): Promise<void>
    addUserMessage(threadId: string, text: string, options?: RuntimeCallOptions): Promise<void>
    createRun(threadId: string, agentId: string, options?: RuntimeCallOptions): Promise<RunSnapshot>
    getRun(threadId: string, runId: string, options?: RuntimeCallOptions): Promise<RunSnapshot>
    /** Submits the whole batch in one call, keyed by call id. */
    submitToolOutputs(threadId: string, runId: string, results: readonly ToolCallResult[], options?: RuntimeCallOptions): Promise<RunSnapshot>
    cancelRun(threadId: string, runId: string, options?: RuntimeCallOptions): Promise<void>
    /** Messages in chronological order (oldest first). */
    listMessages(threadId: string, options?: RuntimeCallOptions): Promise<ThreadMessage[]>
}

export const FOUNDRY_NOT_CONFIGURED_MESSAGE =
    'Azure AI Foundry is not configured. Set FOUNDRY_PROJECT_ENDPOINT and FOUNDRY_DEPLOYMENT_NAME.'

/**
 * Bound when Foundry settings are missing. Every call fails with 503.
 */
@injectable()
export class NullConversationRuntime implements IConversationRuntime {
    private unavailable(): never {
        throw new ServiceUnavailableException(FOUNDRY_NOT_CONFIGURED_MESSAGE)
    }

    async createAgent(): Promise<string> {
        return this.unavailable()
    }

    async deleteAgent(): Promise<void> {
        this.unavailable()
    }

    async createThread(): Promise<string> {
        return this.unavailable()
    }

    async deleteThread(): Promise<void> {
        this.unavailable()
    }

    async addUserMessage(): Promise<void> {
        this.unavailable()
    }

    async createRun(): Promise<RunSnapshot> {
        return this.unavailable()
    }

    async getRun(): Promise<RunSnapshot> {
        return this.unavailable()
    }

    async submitToolOutputs(): Promise<RunSnapshot> {
        return this.unavailable()
    }

    async cancelRun(): Promise<void> {
        this.unavailable()
    }

    async listMessages(): Promise<ThreadMessage[]> {
        return this.unavailable()
    }
}
