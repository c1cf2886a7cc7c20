/**
 * HTTP Error Envelope Utility
 *
 * Standardized error response structure for all HTTP handlers.
 * Responses are built by handlers/utils/responseBuilder.ts.
 *
 * Error envelope structure:
 * {
 *   success: false,
 *   error: { code: string, message: string },
 *   correlationId?: string,
 *   errors?: Array<{ code: string, message: string }>  // for aggregated validation errors
 * }
 */

/**
 * Standard error codes used across the API.
 */
export type StandardErrorCode =
    // Validation errors (400)
    | 'ValidationError'
    | 'MissingField'
    | 'InvalidJson'
    // Not found (404)
    | 'NotFound'
    // Runtime failures (502)
    | 'UpstreamFailure'
    | 'RunTimeout'
    // Collaborator not available (503)
    | 'ServiceUnavailable'
    // Internal errors (500)
    | 'InternalError'

export interface ErrorEnvelope {
    success: false
    error: {
        code: string
        message: string
    }
    correlationId?: string
    /** Aggregated validation errors when multiple fields fail validation */
    errors?: ValidationErrorItem[]
}

export interface ValidationErrorItem {
    code: string
    message: string
}

export const JSON_HEADERS = {
    'Content-Type': 'application/json; charset=utf-8',
    'Cache-Control': 'no-store'
} as const

export function formatError(code: StandardErrorCode | string, message: string, correlationId?: string): ErrorEnvelope {
    return {
        success: false,
        error: { code, message },
        correlationId
    }
}

/**
 * Format multiple validation errors into an aggregated envelope.
 * The first error becomes the primary error; `errors` is only set when there is more than one.
 */
export function formatValidationErrors(errors: ValidationErrorItem[], correlationId?: string): ErrorEnvelope {
    const primaryError = errors[0] || { code: 'ValidationError', message: 'Validation failed' }
    return {
        success: false,
        error: primaryError,
        correlationId,
        errors: errors.length > 1 ? errors : undefined
    }
}
