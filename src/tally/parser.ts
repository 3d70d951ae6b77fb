/**
 * Tally Parser
 *
 * Recursive descent over the lexer's tokens. A syntax error abandons the
 * current statement only: the parser skips to the next `;` and carries
 * on, so one pass reports every broken statement.
 */

import type { NativeLocation, RawError } from '../language';
import { tokenize, type Dialect, type LexToken } from './lexer';

export interface Span {
    start: NativeLocation;
    end: NativeLocation;
}

export interface Name extends Span {
    name: string;
}

export type Expression =
    | (Span & { kind: 'literal'; type: 'number' | 'string' | 'bool' | 'null'; value: string })
    | (Span & { kind: 'path'; segments: Name[] })
    | (Span & { kind: 'call'; callee: Name[]; args: Expression[] })
    | (Span & { kind: 'array'; items: Expression[] })
    | (Span & { kind: 'unary'; operator: string; operand: Expression })
    | (Span & { kind: 'binary'; operator: string; left: Expression; right: Expression });

export type Statement =
    | (Span & { kind: 'let'; binding: Name; value: Expression })
    | (Span & { kind: 'emit'; value: Expression })
    | (Span & { kind: 'expression'; value: Expression })
    | (Span & { kind: 'select'; value: Expression; source: Name; target: Name });

export interface ParseResult {
    statements: Statement[];
    errors: RawError[];
}

const BINARY_LEVELS: ReadonlyArray<readonly string[]> = [
    ['or'],
    ['and'],
    ['==', '!='],
    ['<', '<=', '>', '>='],
    ['+', '-'],
    ['*', '/', '%']
];

/** Deepest bracket, call or unary nesting the parser descends into */
export const MAX_NESTING = 256;

class SyntaxFailure extends Error {
    constructor(readonly error: RawError) {
        super(error.callout);
    }
}

function describe(token: LexToken): string {
    switch (token.kind) {
        case 'eof': return 'end of input';
        case 'string': return 'a string literal';
        case 'number': return `number \`${token.value}\``;
        default: return `\`${token.value}\``;
    }
}

export function parse(text: string, dialect: Dialect = 'script'): ParseResult {
    const lexed = tokenize(text, dialect);
    const parser = new Parser(lexed.tokens, dialect);
    const statements = parser.parseProgram();

    return { statements, errors: [...lexed.errors, ...parser.errors] };
}

class Parser {
    readonly errors: RawError[] = [];
    private position = 0;
    private depth = 0;

    constructor(private readonly tokens: LexToken[], private readonly dialect: Dialect) {}

    parseProgram(): Statement[] {
        const statements: Statement[] = [];

        while (this.peek().kind !== 'eof') {
            const empty = this.peek();
            if (this.is('punctuation', ';')) {
                this.advance();
                this.errors.push({
                    start: empty.start,
                    end: empty.end,
                    callout: 'Empty statement',
                    level: 'hint',
                    hint: 'Remove the extra `;`'
                });
                continue;
            }

            try {
                statements.push(this.parseStatement());
            } catch (e) {
                if (!(e instanceof SyntaxFailure)) throw e;
                this.errors.push(e.error);
                this.synchronize();
            }
        }

        return statements;
    }

    private parseStatement(): Statement {
        const first = this.peek();

        if (this.is('keyword', 'let')) {
            this.advance();
            const binding = this.expectName();
            this.expect('operator', '=');
            const value = this.parseExpression();
            const end = this.expect('punctuation', ';').end;
            return { kind: 'let', binding, value, start: first.start, end };
        }

        if (this.is('keyword', 'emit')) {
            this.advance();
            const value = this.parseExpression();
            const end = this.expect('punctuation', ';').end;
            return { kind: 'emit', value, start: first.start, end };
        }

        if (this.dialect === 'query' && this.is('keyword', 'select')) {
            this.advance();
            const value = this.parseExpression();
            this.expect('keyword', 'from');
            const source = this.expectName();
            this.expect('keyword', 'into');
            const target = this.expectName();
            const end = this.expect('punctuation', ';').end;
            return { kind: 'select', value, source, target, start: first.start, end };
        }

        const value = this.parseExpression();
        const end = this.expect('punctuation', ';').end;
        return { kind: 'expression', value, start: first.start, end };
    }

    private parseExpression(level = 0): Expression {
        if (level === BINARY_LEVELS.length) return this.parseUnary();

        const operators = BINARY_LEVELS[level];
        let left = this.parseExpression(level + 1);

        while (this.isOperator(operators)) {
            const operator = this.advance().value;
            const right = this.parseExpression(level + 1);
            left = { kind: 'binary', operator, left, right, start: left.start, end: right.end };
        }

        return left;
    }

    private parseUnary(): Expression {
        const token = this.peek();
        if (this.is('keyword', 'not') || this.is('operator', '-')) {
            this.advance();
            const operand = this.nested(token, () => this.parseUnary());
            return { kind: 'unary', operator: token.value, operand, start: token.start, end: operand.end };
        }
        return this.parsePrimary();
    }

    private parsePrimary(): Expression {
        const token = this.peek();

        switch (token.kind) {
            case 'number':
            case 'string':
                this.advance();
                return { kind: 'literal', type: token.kind, value: token.value, start: token.start, end: token.end };
            case 'keyword':
                if (token.value === 'true' || token.value === 'false') {
                    this.advance();
                    return { kind: 'literal', type: 'bool', value: token.value, start: token.start, end: token.end };
                }
                if (token.value === 'null') {
                    this.advance();
                    return { kind: 'literal', type: 'null', value: token.value, start: token.start, end: token.end };
                }
                break;
            case 'identifier':
                return this.parsePathOrCall();
            case 'punctuation':
                if (token.value === '(') {
                    this.advance();
                    const inner = this.nested(token, () => this.parseExpression());
                    this.expectClosing(')', token);
                    return inner;
                }
                if (token.value === '[') {
                    this.advance();
                    const items = this.nested(token, () => this.parseList(']'));
                    const end = this.expectClosing(']', token).end;
                    return { kind: 'array', items, start: token.start, end };
                }
                break;
        }

        throw this.failure(token, `Expected an expression but found ${describe(token)}`);
    }

    private parsePathOrCall(): Expression {
        const segments: Name[] = [this.expectName()];

        while (this.is('separator', '::')) {
            this.advance();
            segments.push(this.expectName());
        }

        const start = segments[0].start;
        const open = this.peek();

        if (this.is('punctuation', '(')) {
            this.advance();
            const args = this.nested(open, () => this.parseList(')'));
            const end = this.expectClosing(')', open).end;
            return { kind: 'call', callee: segments, args, start, end };
        }

        return { kind: 'path', segments, start, end: segments[segments.length - 1].end };
    }

    private parseList(closing: string): Expression[] {
        const items: Expression[] = [];
        if (this.is('punctuation', closing)) return items;

        items.push(this.parseExpression());
        while (this.is('punctuation', ',')) {
            this.advance();
            items.push(this.parseExpression());
        }
        return items;
    }

    /**
     * Parse one nesting level deeper, failing at `opener` past MAX_NESTING.
     */
    private nested<T>(opener: LexToken, parse: () => T): T {
        if (this.depth >= MAX_NESTING) {
            throw this.failure(
                opener,
                'Expression nested too deeply',
                `Nesting is limited to ${MAX_NESTING} levels`
            );
        }

        this.depth++;
        try {
            return parse();
        } finally {
            this.depth--;
        }
    }

    private expectName(): Name {
        const token = this.peek();
        if (token.kind !== 'identifier') {
            throw this.failure(token, `Expected an identifier but found ${describe(token)}`);
        }
        this.advance();
        return { name: token.value, start: token.start, end: token.end };
    }

    private expect(kind: LexToken['kind'], value: string): LexToken {
        const token = this.peek();
        if (token.kind !== kind || token.value !== value) {
            throw this.failure(token, `Expected \`${value}\` but found ${describe(token)}`);
        }
        return this.advance();
    }

    private expectClosing(closing: string, opener: LexToken): LexToken {
        const token = this.peek();
        if (this.is('punctuation', closing)) return this.advance();

        throw this.failure(
            token,
            `Expected \`${closing}\` but found ${describe(token)}`,
            `The \`${opener.value}\` at line ${opener.start.line}, column ${opener.start.column} is never closed`
        );
    }

    private failure(token: LexToken, callout: string, hint?: string): SyntaxFailure {
        const error: RawError = { start: token.start, end: token.end, callout, level: 'error' };
        if (hint !== undefined) error.hint = hint;
        return new SyntaxFailure(error);
    }

    /** Skip past the next `;` */
    private synchronize(): void {
        while (this.peek().kind !== 'eof') {
            const token = this.advance();
            if (token.kind === 'punctuation' && token.value === ';') return;
        }
    }

    private peek(): LexToken {
        return this.tokens[this.position];
    }

    private advance(): LexToken {
        const token = this.tokens[this.position];
        if (token.kind !== 'eof') this.position++;
        return token;
    }

    private is(kind: LexToken['kind'], value: string): boolean {
        const token = this.peek();
        return token.kind === kind && token.value === value;
    }

    private isOperator(operators: readonly string[]): boolean {
        const token = this.peek();
        return (token.kind === 'operator' || token.kind === 'keyword') && operators.includes(token.value);
    }
}
