/**
 * LSP Mapping
 *
 * Core results to vscode-languageserver types.
 */

import {
    CompletionItemKind,
    DiagnosticSeverity,
    InsertTextFormat,
    MarkupKind,
    type CompletionItem,
    type Diagnostic,
    type Hover
} from 'vscode-languageserver/node';
import type { CompletionCandidate, DiagnosticRecord, RenderedDoc, Severity } from './types';

export const DIAGNOSTIC_SOURCE = 'tally';

const SEVERITIES: Record<Severity, DiagnosticSeverity> = {
    error: DiagnosticSeverity.Error,
    warning: DiagnosticSeverity.Warning,
    info: DiagnosticSeverity.Information,
    hint: DiagnosticSeverity.Hint
};

export function toLspSeverity(severity: Severity): DiagnosticSeverity {
    return SEVERITIES[severity];
}

export function mapDiagnostics(records: readonly DiagnosticRecord[]): Diagnostic[] {
    return records.map(record => ({
        range: record.range,
        message: record.message,
        severity: toLspSeverity(record.severity),
        source: DIAGNOSTIC_SOURCE
    }));
}

export function mapCompletions(candidates: readonly CompletionCandidate[]): CompletionItem[] {
    return candidates.map(candidate => {
        const item: CompletionItem = {
            label: candidate.label,
            kind: CompletionItemKind.Function
        };
        if (candidate.detail !== undefined) item.detail = candidate.detail;
        if (candidate.documentation !== undefined) {
            item.documentation = { kind: MarkupKind.Markdown, value: candidate.documentation };
        }
        if (candidate.insertText !== undefined) {
            item.insertText = candidate.insertText;
            item.insertTextFormat = InsertTextFormat.Snippet;
        }
        return item;
    });
}

export function mapHover(doc: RenderedDoc | null): Hover | null {
    if (doc === null) return null;
    return {
        contents: { kind: MarkupKind.Markdown, value: doc }
    };
}
