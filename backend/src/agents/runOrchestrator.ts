/**
 * Run orchestrator: drives one conversational turn against the conversation runtime.
 *
 * create agent -> reuse/create thread -> add message -> create run -> poll
 *   requires_action: resolve every new tool call concurrently, submit the batch once, keep polling
 *   completed: extract the assistant reply
 *   failed / timed out: UpstreamFailureException
 *
 * The transient agent is always deleted. A thread this turn created is deleted unless the
 * turn succeeded, since the caller never received its handle.
 */
import {
    CallerInputException,
    InvalidArgumentsException,
    ServiceUnavailableException,
    UpstreamFailureException,
    toolFailure,
    type ChatTurnOutcome
} from '@foundry-mcp-chat/shared'
import { inject, injectable } from 'inversify'
import { setTimeout as sleep } from 'node:timers/promises'
import type { RunOrchestratorConfig } from '../config/runOrchestratorConfig.js'
import { TOKENS } from '../di/tokens.js'
import { endSpan, getTracer } from '../instrumentation/opentelemetry.js'
import { ArgumentNormalizer, type NormalizationReport } from '../mcp/argumentNormalizer.js'
import type { IToolCatalog } from '../mcp/toolCatalog.js'
import { ARGUMENTS_HOW_TO_FIX, ToolInvoker, type InvocationLogger } from '../mcp/toolInvoker.js'
import { TelemetryService, type TelemetryOptions } from '../telemetry/TelemetryService.js'
import { buildDefaultInstructions, type AgentProfile } from './agentProfile.js'
import {
    TERMINAL_RUN_STATUSES,
    type IConversationRuntime,
    type RunSnapshot,
    type ToolCallRequest,
    type ToolCallResult
} from './conversationRuntime.js'
import { ResponseExtractor, type ExtractedResponse } from './responseExtractor.js'

export const NO_TOOLS_CONFIGURED_MESSAGE =
    'No MCP servers are configured or enabled. Please enable at least one MCP tool through the MCP_ENABLED_TOOLS app setting.'

export const NOT_APPROVED_HOW_TO_FIX = 'Resend the message with autoApproveMcpTools enabled to allow MCP tool calls.'

export interface RunTurnRequest {
    message: string
    /** Thread handle from a previous turn; a new thread is created when omitted */
    threadId?: string
    autoApprove: boolean
    /** Fail with 503 instead of answering informationally when no tools are enabled */
    requireTools?: boolean
    signal?: AbortSignal
    logger: InvocationLogger
    correlationId?: string
}

export interface TurnResult extends ExtractedResponse {
    outcome: ChatTurnOutcome
    threadId?: string
    agentId?: string
    runId?: string
    toolCallCount: number
}

type CleanupStep = 'cancel-run' | 'delete-agent' | 'delete-thread'

interface TurnState {
    agentId?: string
    threadId?: string
    createdThread: boolean
    run?: RunSnapshot
    succeeded: boolean
}

@injectable()
export class RunOrchestrator {
    constructor(
        @inject(TOKENS.ConversationRuntime) private readonly runtime: IConversationRuntime,
        @inject(TOKENS.ToolCatalog) private readonly catalog: IToolCatalog,
        @inject(ArgumentNormalizer) private readonly normalizer: ArgumentNormalizer,
        @inject(ToolInvoker) private readonly invoker: ToolInvoker,
        @inject(ResponseExtractor) private readonly extractor: ResponseExtractor,
        @inject(TOKENS.RunOrchestratorConfig) private readonly config: RunOrchestratorConfig,
        @inject(TOKENS.AgentProfile) private readonly profile: AgentProfile,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    async runTurn(request: RunTurnRequest): Promise<TurnResult> {
        if (request.message.trim() === '') {
            throw new CallerInputException('Message is required', 'message')
        }
        const trackOpts: TelemetryOptions = { correlationId: request.correlationId }

        if (this.catalog.size === 0) {
            this.telemetry.trackEventStrict('Agent.Run.NoTools', { requireTools: request.requireTools === true }, trackOpts)
            if (request.requireTools) {
                throw new ServiceUnavailableException(NO_TOOLS_CONFIGURED_MESSAGE)
            }
            return { outcome: 'no-tools', text: NO_TOOLS_CONFIGURED_MESSAGE, citations: [], threadId: request.threadId, toolCallCount: 0 }
        }

        const timeoutSignal = AbortSignal.timeout(this.config.runTimeoutMs)
        const signal = request.signal ? AbortSignal.any([request.signal, timeoutSignal]) : timeoutSignal
        const state: TurnState = { createdThread: false, succeeded: false }
        const started = Date.now()
        const span = getTracer().startSpan('Agent.RunTurn', {
            attributes: {
                'agent.input.length': request.message.length,
                'agent.auto_approve': request.autoApprove,
                'agent.tool.count': this.catalog.size
            }
        })

        try {
            const result = await this.drive(request, state, signal)
            state.succeeded = true
            span.setAttribute('agent.id', result.agentId ?? '')
            span.setAttribute('agent.response.length', result.text.length)
            this.telemetry.trackEventStrict(
                'Agent.Run.Completed',
                {
                    agentId: result.agentId,
                    threadId: result.threadId,
                    runId: result.runId,
                    toolCallCount: result.toolCallCount,
                    citationCount: result.citations.length,
                    responseLength: result.text.length,
                    latencyMs: Date.now() - started
                },
                trackOpts
            )
            endSpan(span)
            return result
        } catch (error) {
            const failure = this.describeFailure(error, request, timeoutSignal, state)
            await this.cancelInFlightRun(state, request)
            const properties = { agentId: state.agentId, threadId: state.threadId, runId: state.run?.runId, latencyMs: Date.now() - started }
            if (failure !== error && failure instanceof UpstreamFailureException) {
                request.logger.warn(failure.message)
                this.telemetry.trackEventStrict('Agent.Run.TimedOut', { ...properties, timeoutMs: this.config.runTimeoutMs }, trackOpts)
            } else if (request.signal?.aborted) {
                this.telemetry.trackEventStrict('Agent.Run.Cancelled', properties, trackOpts)
            } else {
                const message = failure instanceof Error ? failure.message : String(failure)
                request.logger.error(`Agent run failed: ${message}`)
                this.telemetry.trackEventStrict('Agent.Run.Failed', { ...properties, error: message }, trackOpts)
            }
            if (state.agentId) span.setAttribute('agent.id', state.agentId)
            endSpan(span, failure)
            throw failure
        } finally {
            await this.cleanup(state, request)
        }
    }

    private async drive(request: RunTurnRequest, state: TurnState, signal: AbortSignal): Promise<TurnResult> {
        const tools = this.catalog.list()
        const agentId = await this.runtime.createAgent(
            { name: this.profile.name, instructions: this.profile.instructions ?? buildDefaultInstructions(tools), tools },
            { signal }
        )
        state.agentId = agentId

        let threadId = request.threadId
        if (!threadId) {
            threadId = await this.runtime.createThread({ signal })
            state.createdThread = true
        }
        state.threadId = threadId

        await this.runtime.addUserMessage(threadId, request.message, { signal })
        let run = await this.runtime.createRun(threadId, agentId, { signal })
        this.telemetry.trackEventStrict(
            'Agent.Run.Started',
            { agentId, threadId, runId: run.runId, newThread: state.createdThread, autoApprove: request.autoApprove },
            { correlationId: request.correlationId }
        )

        const resolved = new Set<string>()
        let toolCallCount = 0

        for (;;) {
            signal.throwIfAborted()
            state.run = run
            if (run.status === 'completed') {
                const messages = await this.runtime.listMessages(threadId, { signal })
                const { text, citations } = this.extractor.extract(messages, run.runId)
                return { outcome: 'completed', text, citations, threadId, agentId, runId: run.runId, toolCallCount }
            }
            if (run.status === 'failed') {
                throw new UpstreamFailureException(run.error ?? `Run ${run.runId} failed`, run.runId)
            }
            if (run.status === 'requires_action') {
                const batch = run.pendingToolCalls.filter((call) => {
                    if (resolved.has(call.callId)) return false
                    resolved.add(call.callId)
                    return true
                })
                if (batch.length > 0) {
                    const results = await Promise.all(batch.map((call) => this.resolveToolCall(call, request, signal)))
                    signal.throwIfAborted()
                    toolCallCount += results.length
                    const runId = run.runId
                    run = await this.runtime.submitToolOutputs(threadId, runId, results, { signal })
                    this.telemetry.trackEventStrict(
                        'Agent.ToolBatch.Submitted',
                        {
                            runId,
                            batchSize: results.length,
                            failureCount: results.filter((result) => !result.output.success).length,
                            tools: batch.map((call) => call.toolName).join(',')
                        },
                        { correlationId: request.correlationId }
                    )
                    continue
                }
            }
            await sleep(this.config.pollIntervalMs, undefined, { signal })
            run = await this.runtime.getRun(threadId, run.runId, { signal })
        }
    }

    private async resolveToolCall(call: ToolCallRequest, request: RunTurnRequest, signal: AbortSignal): Promise<ToolCallResult> {
        const trackOpts: TelemetryOptions = { correlationId: request.correlationId }
        if (!request.autoApprove) {
            request.logger.warn(`Tool call ${call.toolName} (${call.callId}) not approved`)
            return {
                callId: call.callId,
                output: toolFailure(call.toolName, `Tool call '${call.toolName}' was not approved`, NOT_APPROVED_HOW_TO_FIX)
            }
        }

        let report: NormalizationReport
        try {
            report = this.normalizer.normalizeWithReport(call.toolName, call.rawArguments)
        } catch (error) {
            if (!(error instanceof InvalidArgumentsException)) throw error
            this.telemetry.trackEventStrict('Mcp.Arguments.Invalid', { toolName: call.toolName, callId: call.callId }, trackOpts)
            return { callId: call.callId, output: toolFailure(call.toolName, error.message, ARGUMENTS_HOW_TO_FIX) }
        }
        if (report.repair !== 'none') {
            this.telemetry.trackEventStrict('Mcp.Arguments.Repaired', { toolName: call.toolName, repair: report.repair }, trackOpts)
        }

        const output = await this.invoker.invoke(call.toolName, report.arguments, {
            logger: request.logger,
            signal,
            correlationId: request.correlationId
        })
        return { callId: call.callId, output }
    }

    /**
     * Caller aborts pass through unchanged; a fired run deadline becomes RunTimeout.
     */
    private describeFailure(error: unknown, request: RunTurnRequest, timeoutSignal: AbortSignal, state: TurnState): unknown {
        if (request.signal?.aborted || !timeoutSignal.aborted) {
            return error
        }
        const runId = state.run?.runId
        const seconds = Math.round(this.config.runTimeoutMs / 1000)
        return new UpstreamFailureException(`Run ${runId ?? '(not started)'} did not complete within ${seconds} seconds`, runId, 'RunTimeout')
    }

    private async cancelInFlightRun(state: TurnState, request: RunTurnRequest): Promise<void> {
        const run = state.run
        if (!run || TERMINAL_RUN_STATUSES.has(run.status)) return
        await this.bestEffort('cancel-run', () => this.runtime.cancelRun(run.threadId, run.runId), request)
    }

    private async cleanup(state: TurnState, request: RunTurnRequest): Promise<void> {
        const { agentId, threadId } = state
        if (agentId) {
            await this.bestEffort('delete-agent', () => this.runtime.deleteAgent(agentId), request)
        }
        if (threadId && state.createdThread && !state.succeeded) {
            await this.bestEffort('delete-thread', () => this.runtime.deleteThread(threadId), request)
        }
    }

    /** Cleanup never uses the caller's signal and never masks the turn's own outcome. */
    private async bestEffort(step: CleanupStep, action: () => Promise<void>, request: RunTurnRequest): Promise<void> {
        try {
            await action()
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error)
            request.logger.warn(`Agent cleanup step ${step} failed: ${message}`)
            this.telemetry.trackEventStrict('Agent.Cleanup.Failed', { step, error: message }, { correlationId: request.correlationId })
        }
    }
}
