/**
 * Error Telemetry Normalization
 *
 * Maps domain and HTTP error codes to a small set of kinds so error-rate queries
 * can group failures without parsing messages.
 *
 * - Classification table: validation, not-found, upstream, unavailable, internal
 * - recordError() attaches error.code, error.message, error.kind
 * - Duplicate error prevention (first wins per request)
 * - Message truncation >256 chars
 */

export type ErrorKind = 'validation' | 'not-found' | 'upstream' | 'unavailable' | 'internal'

export const ERROR_MESSAGE_MAX_LENGTH = 256

export const ERROR_TELEMETRY_KEYS = {
    CODE: 'error.code',
    MESSAGE: 'error.message',
    KIND: 'error.kind'
} as const

export const ERROR_CLASSIFICATION_TABLE: Record<string, ErrorKind> = {
    // Caller input (400 / 422)
    ValidationError: 'validation',
    MissingField: 'validation',
    InvalidJson: 'validation',
    InvalidArguments: 'validation',

    NotFound: 'not-found',

    // Conversation runtime (502)
    UpstreamFailure: 'upstream',
    RunTimeout: 'upstream',

    // Missing collaborators (503)
    ServiceUnavailable: 'unavailable',

    InternalError: 'internal'
}

/**
 * Infer error kind from HTTP status code when error code is unknown.
 */
export function inferErrorKindFromStatus(statusCode: number): ErrorKind {
    if (statusCode === 404) return 'not-found'
    if (statusCode >= 400 && statusCode < 500) return 'validation'
    if (statusCode === 502 || statusCode === 504) return 'upstream'
    if (statusCode === 503) return 'unavailable'
    return 'internal'
}

/**
 * Classify an error code to its kind.
 * Falls back to inferring from HTTP status if code is not in the classification table.
 */
export function classifyError(errorCode: string, httpStatus?: number): ErrorKind {
    const classified = ERROR_CLASSIFICATION_TABLE[errorCode]
    if (classified) return classified
    if (httpStatus !== undefined) {
        return inferErrorKindFromStatus(httpStatus)
    }
    return 'internal'
}

export interface ErrorRecordingContext {
    correlationId: string
    /** Whether an error has already been recorded (first-wins) */
    errorRecorded?: boolean
    httpStatus?: number
}

export interface ErrorDetails {
    code: string
    /** Truncated to ERROR_MESSAGE_MAX_LENGTH when recorded */
    message: string
}

export interface ErrorAttributes {
    errorCode: string
    errorMessage: string
    errorKind: ErrorKind
}

export type RecordErrorResult = { recorded: true; attributes: ErrorAttributes } | { recorded: false }

export function buildErrorAttributes(error: ErrorDetails, httpStatus?: number): ErrorAttributes {
    const errorMessage =
        error.message.length > ERROR_MESSAGE_MAX_LENGTH ? error.message.slice(0, ERROR_MESSAGE_MAX_LENGTH) : error.message
    return {
        errorCode: error.code,
        errorMessage,
        errorKind: classifyError(error.code, httpStatus)
    }
}

/**
 * Record an error with normalized attributes.
 * First error wins: later calls on the same context leave `properties` untouched.
 *
 * @example
 * ```typescript
 * const ctx = createErrorRecordingContext('abc-123', 400)
 * const props: Record<string, unknown> = {}
 * recordError(ctx, { code: 'ValidationError', message: 'message is required' }, props)
 * // props['error.kind'] === 'validation'
 * ```
 */
export function recordError(context: ErrorRecordingContext, error: ErrorDetails, properties: Record<string, unknown>): RecordErrorResult {
    if (context.errorRecorded) {
        return { recorded: false }
    }

    const attributes = buildErrorAttributes(error, context.httpStatus)
    properties[ERROR_TELEMETRY_KEYS.CODE] = attributes.errorCode
    properties[ERROR_TELEMETRY_KEYS.MESSAGE] = attributes.errorMessage
    properties[ERROR_TELEMETRY_KEYS.KIND] = attributes.errorKind
    context.errorRecorded = true

    return { recorded: true, attributes }
}

export function hasErrorRecorded(context: ErrorRecordingContext): boolean {
    return context.errorRecorded === true
}

export function createErrorRecordingContext(correlationId: string, httpStatus?: number): ErrorRecordingContext {
    return {
        correlationId,
        httpStatus,
        errorRecorded: false
    }
}
