/**
 * HTTP response builder utilities for Azure Functions handlers.
 *
 * Error responses use the standardized error envelope from http/errorEnvelope.ts.
 */
import type { HttpResponseInit } from '@azure/functions'
import { ok } from '@foundry-mcp-chat/shared'
import { JSON_HEADERS, formatError, formatValidationErrors, type StandardErrorCode, type ValidationErrorItem } from '../../http/errorEnvelope.js'
import { CORRELATION_HEADER } from '../../telemetry/correlation.js'

export type { StandardErrorCode, ValidationErrorItem }

export interface ResponseOptions {
    correlationId: string
    additionalHeaders?: Record<string, string>
}

export function jsonResponse(status: number, body: unknown, options: ResponseOptions): HttpResponseInit {
    return {
        status,
        headers: {
            [CORRELATION_HEADER]: options.correlationId,
            ...JSON_HEADERS,
            ...options.additionalHeaders
        },
        jsonBody: body
    }
}

/**
 * Build a successful (200) response with ok envelope.
 */
export function okResponse(data: unknown, options: ResponseOptions): HttpResponseInit {
    return jsonResponse(200, ok(data, options.correlationId), options)
}

export function errorResponse(status: number, code: StandardErrorCode | string, message: string, options: ResponseOptions): HttpResponseInit {
    return jsonResponse(status, formatError(code, message, options.correlationId), options)
}

export function validationErrorResponse(errors: ValidationErrorItem[], options: ResponseOptions): HttpResponseInit {
    return jsonResponse(400, formatValidationErrors(errors, options.correlationId), options)
}

/**
 * Build an internal error response for unhandled exceptions.
 * Masks the actual error message in production.
 */
export function internalErrorResponse(error: unknown, options: ResponseOptions): HttpResponseInit {
    const isProduction = process.env.NODE_ENV === 'production'
    const errorMessage = isProduction ? 'An internal error occurred' : error instanceof Error ? error.message : 'Unknown error'
    return errorResponse(500, 'InternalError', errorMessage, options)
}
