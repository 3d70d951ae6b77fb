/**
 * Tally Lexer
 *
 * Splits source into tokens with one-based line/column locations.
 * Lexical problems are collected, never thrown; the offending input
 * is skipped so parsing can continue.
 */

import type { NativeLocation, RawError } from '../language';

export type Dialect = 'script' | 'query';

export type TokenKind =
    | 'identifier'
    | 'keyword'
    | 'number'
    | 'string'
    | 'separator'
    | 'punctuation'
    | 'operator'
    | 'eof';

export interface LexToken {
    kind: TokenKind;
    /** Source text; for strings, the unescaped value */
    value: string;
    start: NativeLocation;
    end: NativeLocation;
}

export interface LexResult {
    tokens: LexToken[];
    errors: RawError[];
}

const SCRIPT_KEYWORDS = ['let', 'emit', 'true', 'false', 'null', 'and', 'or', 'not'];
const QUERY_KEYWORDS = [...SCRIPT_KEYWORDS, 'select', 'from', 'into'];

export function keywordsFor(dialect: Dialect): ReadonlySet<string> {
    return new Set(dialect === 'query' ? QUERY_KEYWORDS : SCRIPT_KEYWORDS);
}

const PUNCTUATION = '()[],;';
const TWO_CHAR_OPERATORS = ['==', '!=', '<=', '>='];
const ONE_CHAR_OPERATORS = '+-*/%<>=';
const ESCAPES: Record<string, string> = { '"': '"', '\\': '\\', n: '\n', t: '\t' };

class Scanner {
    offset = 0;
    line = 1;
    column = 1;

    constructor(readonly text: string) {}

    get done(): boolean {
        return this.offset >= this.text.length;
    }

    peek(ahead = 0): string {
        return this.text.charAt(this.offset + ahead);
    }

    location(): NativeLocation {
        return { line: this.line, column: this.column };
    }

    advance(): string {
        const char = this.text.charAt(this.offset++);
        if (char === '\n') {
            this.line++;
            this.column = 1;
        } else {
            this.column++;
        }
        return char;
    }
}

function isIdentStart(char: string): boolean {
    return /[A-Za-z_]/.test(char);
}

function isIdentPart(char: string): boolean {
    return /[A-Za-z0-9_]/.test(char);
}

function isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
}

export function tokenize(text: string, dialect: Dialect = 'script'): LexResult {
    const keywords = keywordsFor(dialect);
    const scanner = new Scanner(text);
    const tokens: LexToken[] = [];
    const errors: RawError[] = [];

    const push = (kind: TokenKind, value: string, start: NativeLocation) => {
        tokens.push({ kind, value, start, end: scanner.location() });
    };

    while (!scanner.done) {
        const char = scanner.peek();
        const start = scanner.location();

        if (/\s/.test(char)) {
            scanner.advance();
            continue;
        }

        // Comment to end of line
        if (char === '#') {
            while (!scanner.done && scanner.peek() !== '\n') scanner.advance();
            continue;
        }

        if (isIdentStart(char)) {
            let value = '';
            while (!scanner.done && isIdentPart(scanner.peek())) value += scanner.advance();
            push(keywords.has(value) ? 'keyword' : 'identifier', value, start);
            continue;
        }

        if (isDigit(char)) {
            let value = '';
            while (!scanner.done && isDigit(scanner.peek())) value += scanner.advance();
            if (scanner.peek() === '.' && isDigit(scanner.peek(1))) {
                value += scanner.advance();
                while (!scanner.done && isDigit(scanner.peek())) value += scanner.advance();
            }
            push('number', value, start);
            continue;
        }

        if (char === '"') {
            scanString(scanner, start, push, errors);
            continue;
        }

        if (char === ':' && scanner.peek(1) === ':') {
            scanner.advance();
            scanner.advance();
            push('separator', '::', start);
            continue;
        }

        if (PUNCTUATION.includes(char)) {
            push('punctuation', scanner.advance(), start);
            continue;
        }

        const pair = char + scanner.peek(1);
        if (TWO_CHAR_OPERATORS.includes(pair)) {
            scanner.advance();
            scanner.advance();
            push('operator', pair, start);
            continue;
        }

        if (ONE_CHAR_OPERATORS.includes(char)) {
            push('operator', scanner.advance(), start);
            continue;
        }

        scanner.advance();
        errors.push({
            start,
            end: scanner.location(),
            callout: `Unexpected character \`${char}\``,
            level: 'error'
        });
    }

    tokens.push({ kind: 'eof', value: '', start: scanner.location(), end: scanner.location() });
    return { tokens, errors };
}

function scanString(
    scanner: Scanner,
    start: NativeLocation,
    push: (kind: TokenKind, value: string, start: NativeLocation) => void,
    errors: RawError[]
): void {
    scanner.advance();
    let value = '';

    while (!scanner.done && scanner.peek() !== '"' && scanner.peek() !== '\n') {
        if (scanner.peek() !== '\\') {
            value += scanner.advance();
            continue;
        }

        const escapeStart = scanner.location();
        scanner.advance();
        const next = scanner.peek();
        const replacement = ESCAPES[next];

        if (replacement !== undefined) {
            scanner.advance();
            value += replacement;
        } else {
            const escaped = next === '\n' ? '' : next;
            if (escaped !== '') scanner.advance();
            errors.push({
                start: escapeStart,
                end: scanner.location(),
                callout: `Invalid escape sequence \`\\${escaped}\``,
                level: 'error',
                hint: 'Valid escapes are \\", \\\\, \\n and \\t'
            });
        }
    }

    if (scanner.peek() !== '"') {
        errors.push({
            start,
            end: scanner.location(),
            callout: 'Unterminated string literal',
            level: 'error',
            hint: 'Add a closing `"` before the end of the line'
        });
        push('string', value, start);
        return;
    }

    scanner.advance();
    push('string', value, start);
}
