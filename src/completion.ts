/**
 * Completion
 *
 * Offers the members of a namespace once the cursor sits after
 * `namespace::`. Unqualified positions get nothing; the client filters
 * and sorts by the typed prefix.
 */

import type { CompletionCandidate, SourcePosition } from './types';
import { formatSignature, type FunctionDoc, type LanguageCapability } from './language';
import { extractToken } from './token';

export function collectCompletions(
    language: LanguageCapability,
    text: string,
    position: SourcePosition
): CompletionCandidate[] {
    const token = extractToken(text, position, language.pathSeparator);
    if (!token || !token.namespace) return [];

    const namespace = token.namespace;

    return language.functions(namespace).map(member => {
        const doc = language.functionDoc(`${namespace}${language.pathSeparator}${member}`);
        if (!doc) {
            return { label: member };
        }
        return {
            label: member,
            detail: formatSignature(doc.signature),
            documentation: doc.description,
            insertText: callSnippet(member, doc)
        };
    });
}

/**
 * `member(${1:a}, ${2:b})`: one tab stop per argument, in declaration order
 */
export function callSnippet(member: string, doc: FunctionDoc): string {
    const args = doc.signature.args
        .map((arg, i) => `\${${i + 1}:${escapePlaceholder(arg)}}`)
        .join(', ');
    return `${member}(${args})`;
}

function escapePlaceholder(text: string): string {
    return text.replace(/[\\$}]/g, match => `\\${match}`);
}
