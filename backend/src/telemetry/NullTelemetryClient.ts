import { injectable } from 'inversify'
import type { ITelemetryClient } from './ITelemetryClient.js'

/**
 * No-op telemetry client, bound under NODE_ENV=test and when APPLICATIONINSIGHTS_CONNECTION_STRING is unset.
 */
@injectable()
export class NullTelemetryClient implements ITelemetryClient {
    trackEvent(): void {}

    trackException(): void {}

    trackMetric(): void {}

    trackTrace(): void {}

    flush(): void {}
}
