// reflect-metadata MUST be imported first for InversifyJS decorator metadata to work
import 'reflect-metadata'
// Tracing provider registers on import, before any handler module creates spans
import './instrumentation/opentelemetry.js'
import { app, type PreInvocationContext } from '@azure/functions'
// Import order matters: initialize App Insights before any user code for auto-collection.
import appInsights from 'applicationinsights'
import { Container } from 'inversify'
import { CONTAINER_EXTRA_INPUT } from './handlers/utils/contextHelpers.js'
import { setupContainer } from './inversify.config.js'
import { TOKENS } from './di/tokens.js'
import type { ITelemetryClient } from './telemetry/ITelemetryClient.js'

const container = new Container()

/**
 * Sampling percentage from APPINSIGHTS_SAMPLING_PERCENTAGE.
 * Accepts a whole number (15) or a ratio (0.15); clamps to [0..100]. Default: 100 in development/test, 15 otherwise.
 */
export function resolveSamplingPercentage(raw: string | undefined, nodeEnv: string): number {
    const isDevelopment = nodeEnv === 'development' || nodeEnv === 'test'
    const defaultSampling = isDevelopment ? 100 : 15
    if (!raw) return defaultSampling
    const parsed = parseFloat(raw)
    if (Number.isNaN(parsed)) return defaultSampling
    const normalized = parsed > 0 && parsed <= 1 ? parsed * 100 : parsed
    return Math.min(100, Math.max(0, normalized))
}

// Ensure container setup completes before any function invocation.
app.hook.appStart(async () => {
    const telemetryEnabled = Boolean(process.env.APPLICATIONINSIGHTS_CONNECTION_STRING) && process.env.NODE_ENV !== 'test'

    if (telemetryEnabled) {
        appInsights.setup().start()
        const nodeEnv = (process.env.NODE_ENV || 'production').toLowerCase()
        appInsights.defaultClient.config.samplingPercentage = resolveSamplingPercentage(process.env.APPINSIGHTS_SAMPLING_PERCENTAGE, nodeEnv)
    } else {
        console.log('[startup] APPLICATIONINSIGHTS_CONNECTION_STRING not set - skipping Application Insights initialization')
    }

    const startTime = Date.now()
    try {
        await setupContainer(container)
    } catch (error) {
        console.error('Container setup failed', error)
        if (telemetryEnabled && error instanceof Error) {
            appInsights.defaultClient.trackException({ exception: error })
        }
        throw error
    }

    const duration = Date.now() - startTime
    if (telemetryEnabled) {
        appInsights.defaultClient.trackMetric({ name: 'ContainerSetupDuration', value: duration })
    } else {
        console.log(`[startup] Container setup completed in ${duration}ms`)
    }

    // beforeExit gives a final opportunity to flush telemetry.
    process.once('beforeExit', () => {
        container.get<ITelemetryClient>(TOKENS.TelemetryClient).flush()
    })
})

app.hook.preInvocation((context: PreInvocationContext) => {
    context.invocationContext.extraInputs.set(CONTAINER_EXTRA_INPUT, container)
})
