/**
 * Core Types
 *
 * Protocol-independent values produced by the request pipelines.
 * Mapping to LSP shapes happens in mapping.ts.
 */

/** Document identifier, a URI in practice */
export type DocumentId = string;

/**
 * Zero-based line and column. Columns count UTF-16 code units,
 * the same unit LSP clients use by default.
 */
export interface SourcePosition {
    line: number;
    character: number;
}

export interface SourceRange {
    start: SourcePosition;
    end: SourcePosition;
}

export type Severity = 'error' | 'warning' | 'info' | 'hint';

export interface DiagnosticRecord {
    readonly range: SourceRange;
    readonly message: string;
    readonly severity: Severity;
    /** Also appended to `message` */
    readonly hint?: string;
}

export interface CompletionCandidate {
    label: string;
    detail?: string;
    /** Markdown */
    documentation?: string;
    /** Snippet syntax, e.g. `max(${1:a}, ${2:b})` */
    insertText?: string;
}

/** Markdown block shown on hover */
export type RenderedDoc = string;
