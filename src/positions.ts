/**
 * Position Mapping
 *
 * Converts between caller coordinates (zero-based line/character) and
 * absolute offsets, and from language-native locations (one-based) into
 * caller coordinates.
 */

import { TextDocument } from 'vscode-languageserver-textdocument';
import type { SourcePosition } from './types';
import type { NativeLocation } from './language';

function snapshot(text: string): TextDocument {
    return TextDocument.create('untitled:snapshot', 'plaintext', 0, text);
}

/**
 * Absolute offset of a position. Positions past the end of a line
 * or the text are clamped.
 */
export function offsetAt(text: string, position: SourcePosition): number {
    return snapshot(text).offsetAt(position);
}

export function positionAt(text: string, offset: number): SourcePosition {
    return snapshot(text).positionAt(offset);
}

export function toSourcePosition(location: NativeLocation): SourcePosition {
    return {
        line: Math.max(0, location.line - 1),
        character: Math.max(0, location.column - 1)
    };
}
