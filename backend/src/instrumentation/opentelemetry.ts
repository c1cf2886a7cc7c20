/*
 * OpenTelemetry Tracing Initialization
 * Wires a NodeTracerProvider and sets resource attributes for service correlation.
 *
 * Safe to import multiple times (idempotent). Imported by index.ts before the container is built
 * so spans cover cold start.
 *
 * Configuration:
 * - TRACE_CONSOLE_ENABLED: Set to 'true' to print finished spans to the console (default: false)
 * - DEPLOYMENT_ENV / AZURE_FUNCTIONS_ENVIRONMENT: Environment name for resource attributes
 * - COMMIT_SHA: Git commit SHA for deployment tracing
 */
import { diag, DiagConsoleLogger, DiagLogLevel, propagation, ROOT_CONTEXT, SpanStatusCode, trace, type Span, type Tracer } from '@opentelemetry/api'
import { ExportResultCode, type ExportResult } from '@opentelemetry/core'
import { Resource } from '@opentelemetry/resources'
import {
    BatchSpanProcessor,
    InMemorySpanExporter,
    SimpleSpanProcessor,
    type ReadableSpan,
    type SpanExporter
} from '@opentelemetry/sdk-trace-base'
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node'
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions'
import { SERVICE_BACKEND } from '@foundry-mcp-chat/shared'

const SERVICE_VERSION = '0.1.0'
const TRACER_NAME = 'foundry-mcp-chat-backend'

let initialized = false
let memoryExporter: InMemorySpanExporter | undefined

class ConsoleSpanExporter implements SpanExporter {
    export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
        for (const span of spans) {
            console.debug('[trace]', span.spanContext().traceId, span.name)
        }
        resultCallback({ code: ExportResultCode.SUCCESS })
    }

    shutdown(): Promise<void> {
        return Promise.resolve()
    }
}

export function initializeTracing(): void {
    if (initialized) return
    diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR)

    const resource = new Resource({
        [ATTR_SERVICE_NAME]: SERVICE_BACKEND,
        [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
        'deployment.environment': process.env.DEPLOYMENT_ENV || process.env.AZURE_FUNCTIONS_ENVIRONMENT || process.env.NODE_ENV || 'unknown',
        ...(process.env.COMMIT_SHA ? { 'commit.sha': process.env.COMMIT_SHA } : {})
    })

    const provider = new NodeTracerProvider({ resource })

    if (process.env.TRACE_CONSOLE_ENABLED === 'true') {
        provider.addSpanProcessor(new BatchSpanProcessor(new ConsoleSpanExporter(), { scheduledDelayMillis: 5000 }))
    }

    // In-memory exporter for tests (span inspection)
    if (process.env.NODE_ENV === 'test') {
        memoryExporter = new InMemorySpanExporter()
        provider.addSpanProcessor(new SimpleSpanProcessor(memoryExporter))
    }

    provider.register()
    initialized = true
}

initializeTracing()

export function getTracer(): Tracer {
    return trace.getTracer(TRACER_NAME)
}

// HTTP helper – start span using incoming traceparent header if present
export function startHttpSpan(name: string, headers: { get(h: string): string | null | undefined }): Span {
    const carrier: Record<string, string> = {}
    const tp = headers.get('traceparent')
    if (tp) carrier.traceparent = tp
    const ctx = propagation.extract(ROOT_CONTEXT, carrier)
    return getTracer().startSpan(name, undefined, ctx)
}

export function endSpan(span: Span, error?: unknown): void {
    // Guard against double-end which produces noisy warnings in tests.
    if (!span.isRecording()) return
    if (error !== undefined) {
        span.recordException(error instanceof Error ? error : String(error))
        span.setStatus({ code: SpanStatusCode.ERROR })
    }
    span.end()
}

// Test-only access to finished spans
export function getFinishedSpans(): ReadableSpan[] {
    return memoryExporter ? memoryExporter.getFinishedSpans() : []
}

export function resetFinishedSpans(): void {
    memoryExporter?.reset()
}
