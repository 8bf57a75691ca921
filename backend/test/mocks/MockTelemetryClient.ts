import type { PipelineEventName } from '@specmap/shared'
import type { Contracts } from 'applicationinsights'
import { injectable } from 'inversify'
import type { ITelemetryClient } from '../../src/telemetry/ITelemetryClient.js'

type Properties = Record<string, unknown>

/**
 * Records pipeline telemetry in memory so tests can assert on event names and properties.
 */
@injectable()
export class MockTelemetryClient implements ITelemetryClient {
    public events: Contracts.EventTelemetry[] = []
    public exceptions: Contracts.ExceptionTelemetry[] = []
    public metrics: Contracts.MetricTelemetry[] = []
    public flushes = 0

    trackEvent(telemetry: Contracts.EventTelemetry): void {
        this.events.push(telemetry)
    }

    trackException(telemetry: Contracts.ExceptionTelemetry): void {
        this.exceptions.push(telemetry)
    }

    trackMetric(telemetry: Contracts.MetricTelemetry): void {
        this.metrics.push(telemetry)
    }

    flush(options?: { callback?: (response: string) => void }): void {
        this.flushes++
        options?.callback?.('')
    }

    eventsNamed(name: PipelineEventName): Contracts.EventTelemetry[] {
        return this.events.filter((e) => e.name === name)
    }

    /** Properties of every event with this name, in emission order */
    propertiesOf(name: PipelineEventName): Properties[] {
        return this.eventsNamed(name).map((e) => e.properties ?? {})
    }

    eventNames(): string[] {
        return this.events.map((e) => e.name)
    }
}
