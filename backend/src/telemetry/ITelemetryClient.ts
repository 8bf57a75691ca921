import type { Contracts } from 'applicationinsights'

export interface TelemetryFlushOptions {
    /** Invoked once buffered items have been handed off */
    callback?: (response: string) => void
}

/**
 * The slice of the Application Insights TelemetryClient the pipeline emits through.
 * Bound to the SDK default client when a connection string is configured,
 * otherwise to NullTelemetryClient; tests bind a recording client.
 */
export interface ITelemetryClient {
    trackEvent(telemetry: Contracts.EventTelemetry): void
    trackException(telemetry: Contracts.ExceptionTelemetry): void
    trackMetric(telemetry: Contracts.MetricTelemetry): void
    flush(options?: TelemetryFlushOptions): void
}
