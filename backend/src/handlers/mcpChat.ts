/**
 * POST /api/chat/mcp: run one chat turn with MCP tools.
 */
import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { safeParseChatTurnRequest, type ChatTurnResponse } from '@foundry-mcp-chat/shared'
import { inject, injectable } from 'inversify'
import { RunOrchestrator } from '../agents/runOrchestrator.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { BaseHandler } from './base/BaseHandler.js'
import { getContainer } from './utils/contextHelpers.js'
import { errorResponse, okResponse, validationErrorResponse } from './utils/responseBuilder.js'

@injectable()
export class McpChatHandler extends BaseHandler {
    constructor(
        @inject(TelemetryService) telemetry: TelemetryService,
        @inject(RunOrchestrator) private readonly orchestrator: RunOrchestrator
    ) {
        super(telemetry)
    }

    protected async execute(req: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
        let body: unknown
        try {
            body = await req.json()
        } catch {
            this.recordNormalizedError('Chat.Turn.Rejected', 'InvalidJson', 'Request body must be valid JSON', 400)
            return errorResponse(400, 'InvalidJson', 'Request body must be valid JSON', { correlationId: this.correlationId })
        }

        const parsed = safeParseChatTurnRequest(body)
        if (!parsed.success) {
            const errors = parsed.issues.map((issue) => ({ code: 'ValidationError', message: `${issue.path}: ${issue.message}` }))
            this.recordNormalizedError('Chat.Turn.Rejected', 'ValidationError', errors[0]?.message ?? 'Validation failed', 400, {
                issueCount: errors.length
            })
            return validationErrorResponse(errors, { correlationId: this.correlationId })
        }

        const { message, threadId, autoApproveMcpTools, requireTools } = parsed.data
        this.track('Chat.Turn.Requested', {
            messageLength: message.length,
            hasThread: threadId !== undefined,
            autoApprove: autoApproveMcpTools,
            requireTools
        })

        try {
            const result = await this.orchestrator.runTurn({
                message,
                threadId,
                autoApprove: autoApproveMcpTools,
                requireTools,
                logger: context,
                correlationId: this.correlationId
            })
            const data: ChatTurnResponse = {
                response: result.text,
                citations: result.citations,
                outcome: result.outcome,
                threadId: result.threadId,
                agentId: result.agentId,
                runId: result.runId,
                toolCallCount: result.toolCallCount
            }
            return okResponse(data, { correlationId: this.correlationId })
        } catch (error) {
            return this.exceptionResponse(error, 'Chat.Turn.Rejected', context)
        }
    }
}

export async function mcpChatHandler(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    const handler = getContainer(context).get(McpChatHandler)
    return handler.handle(request, context)
}
