import { randomUUID } from 'node:crypto'

export const CORRELATION_HEADER = 'x-correlation-id'

export function extractCorrelationId(headers: { get(name: string): string | null | undefined } | undefined): string {
    try {
        const correlationId = headers?.get(CORRELATION_HEADER) || undefined
        return correlationId || randomUUID()
    } catch {
        return randomUUID()
    }
}
