/**
 * Domain exceptions for pipeline runs.
 */

export {
    PipelineException,
    ConfigurationError,
    TemplateValidationError,
    ProvenanceIntegrityError,
    isConfigurationError
} from './pipelineExceptions.js'
