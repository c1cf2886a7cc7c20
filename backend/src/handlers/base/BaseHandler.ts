/**
 * Abstract base handler class for Azure Functions HTTP handlers.
 * Provides common functionality: timing, correlation, an HTTP span, telemetry, domain exception mapping.
 *
 * Error Telemetry Normalization:
 * - Includes error recording context with duplicate prevention (first-wins)
 * - Use recordNormalizedError() to attach error.* attributes to telemetry
 * - Errors are classified by kind (validation, not-found, upstream, unavailable, internal)
 */
import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { isAgentException, type TelemetryEventName } from '@foundry-mcp-chat/shared'
import { inject, injectable } from 'inversify'
import { endSpan, startHttpSpan } from '../../instrumentation/opentelemetry.js'
import { createErrorRecordingContext, recordError, type ErrorRecordingContext } from '../../telemetry/errorTelemetry.js'
import { extractCorrelationId } from '../../telemetry/correlation.js'
import { TelemetryService } from '../../telemetry/TelemetryService.js'
import { errorResponse, internalErrorResponse } from '../utils/responseBuilder.js'

@injectable()
export abstract class BaseHandler {
    protected correlationId = ''
    private started = 0
    /** Error recording context for duplicate prevention (first-wins) */
    private errorContext: ErrorRecordingContext = createErrorRecordingContext('')

    constructor(@inject(TelemetryService) protected telemetry: TelemetryService) {}

    /**
     * Main entry point for the handler. Sets up context and calls execute().
     */
    async handle(req: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
        this.started = Date.now()
        this.correlationId = extractCorrelationId(req.headers)
        this.errorContext = createErrorRecordingContext(this.correlationId)

        const span = startHttpSpan(`HTTP ${req.method} ${context.functionName}`, req.headers)
        span.setAttribute('correlation.id', this.correlationId)
        try {
            const response = await this.execute(req, context)
            span.setAttribute('http.status_code', response.status ?? 200)
            endSpan(span)
            return response
        } catch (error) {
            endSpan(span, error)
            throw error
        }
    }

    protected abstract execute(req: HttpRequest, context: InvocationContext): Promise<HttpResponseInit>

    /**
     * Elapsed time since the handler started (in milliseconds).
     */
    protected get latencyMs(): number {
        return Date.now() - this.started
    }

    /**
     * Emit a telemetry event with automatic correlation and timing.
     */
    protected track(eventName: TelemetryEventName, properties: Record<string, unknown>): void {
        this.telemetry.trackEventStrict(eventName, { ...properties, latencyMs: this.latencyMs }, { correlationId: this.correlationId })
    }

    /**
     * Record a normalized error with error.* attributes and emit telemetry.
     * Subsequent errors on the same request are ignored.
     *
     * @returns Whether the error was recorded (false if duplicate)
     */
    protected recordNormalizedError(
        eventName: TelemetryEventName,
        errorCode: string,
        errorMessage: string,
        httpStatus: number,
        additionalProps: Record<string, unknown> = {}
    ): boolean {
        this.errorContext.httpStatus = httpStatus

        const props: Record<string, unknown> = {
            ...additionalProps,
            status: httpStatus
        }

        const result = recordError(this.errorContext, { code: errorCode, message: errorMessage }, props)
        if (result.recorded) {
            this.track(eventName, props)
        }
        return result.recorded
    }

    /**
     * Map a thrown error to the standard error envelope.
     * Domain exceptions keep their status and code; anything else is a masked 500.
     */
    protected exceptionResponse(error: unknown, eventName: TelemetryEventName, context: InvocationContext): HttpResponseInit {
        if (isAgentException(error)) {
            this.recordNormalizedError(eventName, error.code, error.message, error.statusCode)
            return errorResponse(error.statusCode, error.code, error.message, { correlationId: this.correlationId })
        }
        const message = error instanceof Error ? error.message : String(error)
        context.error(`Unhandled error: ${message}`)
        this.recordNormalizedError(eventName, 'InternalError', message, 500)
        if (error instanceof Error) {
            this.telemetry.trackException(error, { correlationId: this.correlationId })
        }
        return internalErrorResponse(error, { correlationId: this.correlationId })
    }
}
