/**
 * Domain exceptions for agent runs.
 *
 * Only caller input errors and runtime failures reach the HTTP caller.
 * Argument and invocation errors are folded into tool output payloads and never thrown past the orchestrator.
 */

/**
 * Base class for all agent-related domain exceptions.
 */
export abstract class AgentException extends Error {
    abstract readonly code: string

    constructor(
        message: string,
        public readonly statusCode: number
    ) {
        super(message)
        this.name = this.constructor.name
        Error.captureStackTrace(this, this.constructor)
    }
}

/**
 * Caller input rejected before any run is created (400).
 */
export class CallerInputException extends AgentException {
    readonly code = 'ValidationError'

    constructor(
        message: string,
        public readonly field?: string
    ) {
        super(message, 400)
    }
}

/**
 * Tool arguments could not be parsed (422).
 * Internal to tool dispatch: the orchestrator converts it into a failure payload.
 */
export class InvalidArgumentsException extends AgentException {
    readonly code = 'InvalidArguments'

    constructor(
        message: string,
        public readonly toolName: string
    ) {
        super(message, 422)
    }
}

/**
 * The conversation runtime reported a failed run, or the run never reached a terminal state (502).
 * Not retried.
 */
export class UpstreamFailureException extends AgentException {
    readonly code: string

    constructor(
        message: string,
        public readonly runId?: string,
        code: 'UpstreamFailure' | 'RunTimeout' = 'UpstreamFailure'
    ) {
        super(message, 502)
        this.code = code
    }
}

/**
 * A required collaborator is not available: no enabled tools, or the agent runtime is not configured (503).
 */
export class ServiceUnavailableException extends AgentException {
    readonly code = 'ServiceUnavailable'

    constructor(message: string) {
        super(message, 503)
    }
}

export function isAgentException(error: unknown): error is AgentException {
    return error instanceof AgentException
}
