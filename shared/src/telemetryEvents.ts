// Canonical pipeline telemetry event names (Domain.[Subject].Action) with 2-3 PascalCase segments.
//
// NO INLINE LITERALS: every event emitted by the backend must be listed here.
// Rename by adding the replacement and keeping the old name until dashboards are migrated.

export const PIPELINE_EVENT_NAMES = [
    // Run lifecycle
    'Pipeline.Run.Started',
    'Pipeline.Run.Completed',
    'Pipeline.Run.Aborted',
    // Input validation (parser contract)
    'Fragment.Input.Rejected',
    // Document relevance filter
    'Document.Relevance.Accepted',
    'Document.Relevance.Filtered',
    // Language normalization
    'Translation.Native.Skipped',
    'Translation.Cache.Hit',
    'Translation.Cache.Miss',
    'Translation.Request.Succeeded',
    'Translation.Request.Failed',
    // Structured extraction
    'Extraction.Response.Rejected',
    'Extraction.Fragment.Succeeded',
    'Extraction.Fragment.Failed',
    'Extraction.Duplicate.Collapsed',
    // Terminology canonicalization
    'Terminology.Alias.Learned',
    'Terminology.Term.NonStandard',
    'Terminology.Canonical.Built',
    // Template mapping
    'Mapping.Slot.Assigned',
    'Mapping.Spec.Unmatched',
    // LLM transport
    'LLM.Call.RateLimited',
    'LLM.Call.Failed',
    'LLM.Governor.Paused',
    // Output
    'Output.Workbook.Written',
    // Internal / fallback diagnostics
    'Telemetry.EventName.Invalid'
] as const

export type PipelineEventName = (typeof PIPELINE_EVENT_NAMES)[number]

export function isPipelineEventName(name: string): name is PipelineEventName {
    return (PIPELINE_EVENT_NAMES as readonly string[]).includes(name)
}

// Shape every registered name must follow (checked in tests)
export const TELEMETRY_NAME_REGEX = /^[A-Z][A-Za-z]+(\.[A-Z][A-Za-z]+){1,2}$/
