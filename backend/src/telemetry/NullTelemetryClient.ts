import type { Contracts } from 'applicationinsights'
import { injectable } from 'inversify'
import type { ITelemetryClient, TelemetryFlushOptions } from './ITelemetryClient.js'

/**
 * Discards pipeline telemetry. Used for local runs without a connection string and under
 * NODE_ENV=test, where loading the real SDK keeps the process alive.
 */
@injectable()
export class NullTelemetryClient implements ITelemetryClient {
    trackEvent(_telemetry: Contracts.EventTelemetry): void {}

    trackException(_telemetry: Contracts.ExceptionTelemetry): void {}

    trackMetric(_telemetry: Contracts.MetricTelemetry): void {}

    flush(options?: TelemetryFlushOptions): void {
        options?.callback?.('')
    }
}
