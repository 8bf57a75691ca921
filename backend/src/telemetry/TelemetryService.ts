/**
 * Telemetry Service - central service for emitting pipeline telemetry events
 *
 * Wraps ITelemetryClient and enriches every event with the service name, the run id
 * (correlation id shared by all events of one pipeline run) and the working language.
 */
import { isPipelineEventName, type PipelineEventName } from '@specmap/shared'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import { TOKENS } from '../di/tokens.js'
import type { ITelemetryClient } from './ITelemetryClient.js'

export const SERVICE_PIPELINE = 'specmap-pipeline'

export interface PipelineTelemetryOptions {
    serviceOverride?: string
    runId?: string | null
}

export interface RunTelemetryContext {
    runId: string
    workingLanguage: string
}

@injectable()
export class TelemetryService {
    private runContext: RunTelemetryContext | undefined

    constructor(@inject(TOKENS.TelemetryClient) private client: ITelemetryClient) {}

    /**
     * Attach run-level enrichment to every subsequent event. Returns the run id.
     */
    beginRun(workingLanguage: string, runId: string = randomUUID()): string {
        this.runContext = { runId, workingLanguage }
        return runId
    }

    endRun(): void {
        this.runContext = undefined
    }

    get currentRunId(): string | undefined {
        return this.runContext?.runId
    }

    /**
     * Track a pipeline event with automatic enrichment
     */
    trackPipelineEvent(name: string, properties?: Record<string, unknown>, opts?: PipelineTelemetryOptions): void {
        const finalProps: Record<string, unknown> = { ...properties }

        if (finalProps.service === undefined) {
            finalProps.service = opts?.serviceOverride || process.env.SPECMAP_SERVICE_NAME || SERVICE_PIPELINE
        }

        if (finalProps.runId === undefined) {
            finalProps.runId = opts?.runId || this.runContext?.runId || randomUUID()
        }

        if (this.runContext && finalProps.workingLanguage === undefined) {
            finalProps.workingLanguage = this.runContext.workingLanguage
        }

        this.client.trackEvent({ name, properties: finalProps })
    }

    /**
     * Track a pipeline event with strict name validation
     * Only accepts PipelineEventName to prevent typos
     */
    trackPipelineEventStrict(name: PipelineEventName, properties: Record<string, unknown>, opts?: PipelineTelemetryOptions): void {
        if (!isPipelineEventName(name)) {
            this.trackPipelineEvent('Telemetry.EventName.Invalid', { requested: name })
            return
        }
        this.trackPipelineEvent(name, properties, opts)
    }

    trackMetric(name: string, value: number, properties?: Record<string, unknown>): void {
        this.client.trackMetric({ name, value, properties: { ...properties, runId: this.runContext?.runId } })
    }

    trackException(error: Error, properties?: Record<string, unknown>): void {
        this.client.trackException({ exception: error, properties: { ...properties, runId: this.runContext?.runId } })
    }

    flush(): Promise<void> {
        return new Promise((resolve) => this.client.flush({ callback: () => resolve() }))
    }
}
