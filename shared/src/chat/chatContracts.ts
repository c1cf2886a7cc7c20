/**
 * Chat turn contracts (Zod validation)
 *
 * Request body accepted by POST /api/chat/mcp and the success payload it returns.
 * Field names follow the chat page (`message`, `threadId`, `autoApproveMcpTools`)
 * so the browser client does not need to change.
 */
import { z } from 'zod'

export const ChatTurnRequestSchema = z.object({
    /** The user message. Blank messages are rejected by the orchestrator, not here. */
    message: z.string({ required_error: 'message is required', invalid_type_error: 'message must be a string' }),
    /** Opaque thread handle from a previous turn. Omit to start a new conversation. */
    threadId: z.string().min(1, 'threadId must not be empty').optional(),
    /** Resolve pending tool calls without human confirmation. */
    autoApproveMcpTools: z.boolean().default(true),
    /** Treat an empty tool catalog as an error (503) instead of an informational reply. */
    requireTools: z.boolean().default(false)
})

export type ChatTurnRequest = z.infer<typeof ChatTurnRequestSchema>

export interface Citation {
    title: string
    url: string
}

export type ChatTurnOutcome = 'completed' | 'no-tools'

export interface ChatTurnResponse {
    response: string
    citations: Citation[]
    outcome: ChatTurnOutcome
    threadId?: string
    agentId?: string
    runId?: string
    toolCallCount: number
}

/**
 * Validate a chat turn request body.
 * Returns a discriminated result so handlers can build an aggregated validation envelope.
 */
export function safeParseChatTurnRequest(
    body: unknown
): { success: true; data: ChatTurnRequest } | { success: false; issues: Array<{ path: string; message: string }> } {
    const result = ChatTurnRequestSchema.safeParse(body)
    if (result.success) {
        return { success: true, data: result.data }
    }
    return {
        success: false,
        issues: result.error.issues.map((issue) => ({
            path: issue.path.join('.') || '(root)',
            message: issue.message
        }))
    }
}
