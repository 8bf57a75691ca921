/**
 * Per-run record of isolated failures. Nothing recorded here aborts the run; the list ends up in
 * the run summary sheet so skipped work is visible to the user.
 */
import { buildErrorAttributes, type ErrorKind } from '../telemetry/errorTelemetry.js'

export type RunIssueKind = 'parse' | 'relevance' | 'translation' | 'extraction'

export interface RunIssue {
    kind: RunIssueKind
    /** Error classification code, e.g. TranslationFailure */
    code: string
    errorKind: ErrorKind
    sourceFile: string
    locator?: string
    message: string
}

export class RunIssueLog {
    private readonly entries: RunIssue[] = []

    record(kind: RunIssueKind, code: string, sourceFile: string, message: string, locator?: string): RunIssue {
        const attributes = buildErrorAttributes(code, message)
        const issue: RunIssue = {
            kind,
            code: attributes.errorCode,
            errorKind: attributes.errorKind,
            sourceFile,
            message: attributes.errorMessage,
            ...(locator !== undefined ? { locator } : {})
        }
        this.entries.push(issue)
        return issue
    }

    list(): RunIssue[] {
        return [...this.entries]
    }

    count(kind?: RunIssueKind): number {
        return kind ? this.entries.filter((issue) => issue.kind === kind).length : this.entries.length
    }
}
