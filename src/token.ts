/**
 * Token Extraction
 *
 * Finds the identifier or qualified path that ends at the cursor.
 * The scan only moves backward: a token never extends past the cursor.
 */

import type { SourcePosition } from './types';
import { offsetAt } from './positions';

export const DEFAULT_PATH_SEPARATOR = '::';

export interface Token {
    /** Raw token text, e.g. `string::upper` */
    text: string;
    start: number;
    end: number;
    /** Text before the last separator, null when there is no separator */
    namespace: string | null;
    member: string;
}

function isIdentifierChar(char: string): boolean {
    return /[A-Za-z0-9_]/.test(char);
}

/**
 * Extract the token ending at `position`, or null when the character
 * before the cursor is not part of an identifier or path.
 */
export function extractToken(
    text: string,
    position: SourcePosition,
    separator: string = DEFAULT_PATH_SEPARATOR
): Token | null {
    const end = offsetAt(text, position);
    let start = end;

    while (start > 0) {
        if (isIdentifierChar(text[start - 1])) {
            start--;
        } else if (separator && start >= separator.length && text.startsWith(separator, start - separator.length)) {
            start -= separator.length;
        } else {
            break;
        }
    }

    if (start === end) return null;

    const raw = text.substring(start, end);
    const split = separator ? raw.lastIndexOf(separator) : -1;

    if (split === -1) {
        return { text: raw, start, end, namespace: null, member: raw };
    }

    return {
        text: raw,
        start,
        end,
        namespace: raw.substring(0, split),
        member: raw.substring(split + separator.length)
    };
}
