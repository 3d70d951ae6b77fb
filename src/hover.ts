/**
 * Hover
 */

import type { RenderedDoc, SourcePosition } from './types';
import { renderFunctionDoc, type LanguageCapability } from './language';
import { extractToken } from './token';

/**
 * Documentation for the qualified name ending at the cursor.
 * Bare identifiers get no hover, even when a same-named entry exists.
 */
export function collectHover(
    language: LanguageCapability,
    text: string,
    position: SourcePosition
): RenderedDoc | null {
    const token = extractToken(text, position, language.pathSeparator);
    if (!token || !token.text.includes(language.pathSeparator)) return null;

    const doc = language.functionDoc(token.text);
    return doc ? renderFunctionDoc(doc) : null;
}
