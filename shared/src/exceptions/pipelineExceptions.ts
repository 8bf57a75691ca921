/**
 * Domain exceptions for the specification pipeline.
 *
 * Only run-level problems are thrown. Per-fragment failures (parse, translation, extraction)
 * travel as tagged outcomes and end up in the run issue log instead.
 */

/**
 * Base class for all pipeline exceptions. `code` feeds the error telemetry classification table.
 */
export abstract class PipelineException extends Error {
    abstract readonly code: string

    constructor(message: string) {
        super(message)
        this.name = this.constructor.name
        Error.captureStackTrace(this, this.constructor)
    }
}

/**
 * Fatal: configuration is unusable (missing credentials, unreachable API, bad settings).
 * Raised before any fragment work starts.
 */
export class ConfigurationError extends PipelineException {
    readonly code: string = 'ConfigurationError'

    constructor(
        message: string,
        public readonly problems: readonly string[] = []
    ) {
        super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message)
    }
}

/**
 * Fatal: the output template cannot be used (no slots, duplicate coordinates, unreadable file).
 */
export class TemplateValidationError extends ConfigurationError {
    override readonly code: string = 'TemplateValidationError'
}

/**
 * An instance or record points at a fragment that was never produced.
 * Indicates a wiring bug, not bad input.
 */
export class ProvenanceIntegrityError extends PipelineException {
    readonly code = 'ProvenanceIntegrityError'

    constructor(
        message: string,
        public readonly fragmentId: string
    ) {
        super(message)
    }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
    return error instanceof ConfigurationError
}
