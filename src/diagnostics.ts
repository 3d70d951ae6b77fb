/**
 * Diagnostics
 *
 * Runs the language checker over a document's text and positions its
 * findings in caller coordinates.
 *
 * Output order is the order the checker reports in.
 */

import type { DiagnosticRecord } from './types';
import type { LanguageCapability, RawError } from './language';
import { toSourcePosition } from './positions';

/**
 * Collect all diagnostics for a document's text
 */
export function collectDiagnostics(language: LanguageCapability, text: string): DiagnosticRecord[] {
    const errors = language.parseErrors(text);
    if (!errors) return [];

    return errors.map(toDiagnostic);
}

export function toDiagnostic(error: RawError): DiagnosticRecord {
    const diagnostic: DiagnosticRecord = {
        range: {
            start: toSourcePosition(error.start),
            end: toSourcePosition(error.end)
        },
        message: formatMessage(error),
        severity: error.level
    };
    return hasHint(error) ? { ...diagnostic, hint: error.hint } : diagnostic;
}

/**
 * The hint goes on its own line so clients show it as a separate note.
 */
export function formatMessage(error: RawError): string {
    if (!hasHint(error)) return error.callout;
    return `${error.callout}\nNote: ${error.hint}`;
}

function hasHint(error: RawError): error is RawError & { hint: string } {
    return error.hint !== undefined && error.hint !== '';
}
