/**
 * Error Telemetry Normalization
 *
 * Maps failure codes to a small set of kinds so failure-rate queries stay low-cardinality.
 *
 * - Classification table: input, model, throttle, config, internal
 * - Messages truncated to 256 chars
 */

export type ErrorKind = 'input' | 'model' | 'throttle' | 'config' | 'internal'

export const ERROR_MESSAGE_MAX_LENGTH = 256

export const ERROR_CLASSIFICATION_TABLE: Record<string, ErrorKind> = {
    // Input: the parsing collaborator produced something unusable
    ParseFailure: 'input',
    EmptyLocator: 'input',
    EmptyText: 'input',
    DocumentFiltered: 'input',

    // Model: the provider answered but the answer was unusable or the call failed
    TranslationFailure: 'model',
    ExtractionFailure: 'model',
    MalformedResponse: 'model',
    EmptyResponse: 'model',
    TimeoutError: 'model',

    // Throttle: provider rate limits
    RateLimitExhausted: 'throttle',
    RateLimited: 'throttle',

    // Config: fatal, aborts the run
    ConfigurationError: 'config',
    TemplateValidationError: 'config',

    // Internal
    ProvenanceIntegrityError: 'internal',
    InternalError: 'internal'
}

export function classifyError(errorCode: string): ErrorKind {
    return ERROR_CLASSIFICATION_TABLE[errorCode] ?? 'internal'
}

export function truncateErrorMessage(message: string): string {
    if (message.length <= ERROR_MESSAGE_MAX_LENGTH) return message
    return message.slice(0, ERROR_MESSAGE_MAX_LENGTH - 3) + '...'
}

export interface ErrorEventAttributes {
    errorCode: string
    errorMessage: string
    errorKind: ErrorKind
}

export function buildErrorAttributes(code: string, message: string): ErrorEventAttributes {
    return {
        errorCode: code,
        errorMessage: truncateErrorMessage(message),
        errorKind: classifyError(code)
    }
}
