/** Canonical envelope shape for HTTP responses returning domain data. */
export interface ApiSuccessEnvelope<T> {
    success: true
    data: T
    correlationId?: string
}
export interface ApiErrorEnvelope {
    success: false
    error: { code: string; message: string }
    correlationId?: string
}
export type ApiEnvelope<T> = ApiSuccessEnvelope<T> | ApiErrorEnvelope

/** Convenience constructors (no runtime dependency needed elsewhere). */
export const ok = <T>(data: T, correlationId?: string): ApiSuccessEnvelope<T> => ({ success: true, data, correlationId })
export const err = (code: string, message: string, correlationId?: string): ApiErrorEnvelope => ({
    success: false,
    error: { code, message },
    correlationId
})

export function isApiErrorEnvelope<T>(envelope: ApiEnvelope<T>): envelope is ApiErrorEnvelope {
    return envelope.success === false
}
