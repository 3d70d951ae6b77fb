/**
 * Tally Checker
 *
 * Resolves calls and variable references of a parsed program against the
 * function library.
 */

import type { NativeLocation, RawError } from '../language';
import { formatSignature } from '../language';
import type { Expression, Name, Statement } from './parser';
import { qualify, type FunctionLibrary } from './library';

/** Bound before the first statement runs */
export const PREDEFINED_VARIABLES = ['event', 'state'];

interface Binding {
    name: Name;
    used: boolean;
}

export function check(statements: Statement[], library: FunctionLibrary): RawError[] {
    const checker = new Checker(library);
    for (const statement of statements) {
        checker.statement(statement);
    }
    return checker.finish();
}

class Checker {
    private readonly errors: RawError[] = [];
    private readonly bindings = new Map<string, Binding>();

    constructor(private readonly library: FunctionLibrary) {}

    statement(statement: Statement): void {
        this.expression(statement.value);

        if (statement.kind === 'let') {
            const previous = this.bindings.get(statement.binding.name);
            if (previous) this.reportUnused(previous);
            this.bindings.set(statement.binding.name, { name: statement.binding, used: false });
        }
    }

    finish(): RawError[] {
        for (const binding of this.bindings.values()) {
            this.reportUnused(binding);
        }
        return this.errors;
    }

    private expression(expression: Expression): void {
        switch (expression.kind) {
            case 'literal':
                return;
            case 'path':
                this.reference(expression.segments);
                return;
            case 'call':
                this.call(expression.callee, expression.args.length, expression);
                expression.args.forEach(arg => this.expression(arg));
                return;
            case 'array':
                expression.items.forEach(item => this.expression(item));
                return;
            case 'unary':
                this.expression(expression.operand);
                return;
            case 'binary': {
                // Operator chains nest to the left without a bound
                const rights: Expression[] = [];
                let left: Expression = expression;
                while (left.kind === 'binary') {
                    rights.push(left.right);
                    left = left.left;
                }
                this.expression(left);
                for (let i = rights.length - 1; i >= 0; i--) {
                    this.expression(rights[i]);
                }
                return;
            }
        }
    }

    private reference(segments: Name[]): void {
        if (segments.length === 1) {
            this.variable(segments[0]);
            return;
        }

        const qualified = this.resolve(segments);
        if (!qualified) return;

        const fn = this.library.lookup(qualified);
        if (fn) {
            this.report(segments[0].start, segments[segments.length - 1].end, {
                callout: `Function \`${qualified}\` must be called`,
                level: 'error',
                hint: `Write \`${formatSignature({ name: qualified, args: fn.args })}\``
            });
        }
    }

    private variable(name: Name): void {
        if (PREDEFINED_VARIABLES.includes(name.name)) return;

        const binding = this.bindings.get(name.name);
        if (binding) {
            binding.used = true;
            return;
        }

        this.report(name.start, name.end, {
            callout: `Undefined variable \`${name.name}\``,
            level: 'warning',
            hint: this.library.hasModule(name.name)
                ? `\`${name.name}\` is a module; call one of its functions as \`${qualify(name.name, 'name')}(...)\``
                : undefined
        });
    }

    private call(callee: Name[], argCount: number, span: { start: NativeLocation; end: NativeLocation }): void {
        const last = callee[callee.length - 1];

        if (callee.length === 1) {
            const owner = this.library.moduleNames().find(module => this.library.lookup(qualify(module, last.name)));
            this.report(last.start, last.end, {
                callout: `Unqualified call to \`${last.name}\``,
                level: 'error',
                hint: owner
                    ? `Did you mean \`${qualify(owner, last.name)}\`?`
                    : `Functions are called through their module, as in \`${qualify('module', last.name)}(...)\``
            });
            return;
        }

        const qualified = this.resolve(callee);
        if (!qualified) return;

        const fn = this.library.lookup(qualified);
        if (!fn) return;

        if (fn.args.length !== argCount) {
            this.report(span.start, span.end, {
                callout: `\`${qualified}\` expects ${plural(fn.args.length, 'argument')} but got ${argCount}`,
                level: 'error',
                hint: `Signature: ${formatSignature({ name: qualified, args: fn.args })}`
            });
        }

        if (fn.deprecated) {
            this.report(callee[0].start, last.end, {
                callout: `\`${qualified}\` is deprecated`,
                level: 'hint',
                hint: `Use \`${fn.deprecated}\` instead`
            });
        }
    }

    /**
     * Qualified name of a known function, or undefined after reporting
     * the unknown module or function.
     */
    private resolve(segments: Name[]): string | undefined {
        const moduleSegments = segments.slice(0, -1);
        const module = moduleSegments.map(s => s.name).join('::');
        const member = segments[segments.length - 1];

        if (!this.library.hasModule(module)) {
            this.report(moduleSegments[0].start, moduleSegments[moduleSegments.length - 1].end, {
                callout: `Unknown module \`${module}\``,
                level: 'error',
                hint: `Known modules: ${this.library.moduleNames().join(', ')}`
            });
            return undefined;
        }

        const qualified = qualify(module, member.name);
        if (!this.library.lookup(qualified)) {
            const suggestion = closest(member.name, this.library.functionNames(module));
            this.report(member.start, member.end, {
                callout: `Unknown function \`${qualified}\``,
                level: 'error',
                hint: suggestion ? `Did you mean \`${qualify(module, suggestion)}\`?` : undefined
            });
            return undefined;
        }

        return qualified;
    }

    private reportUnused(binding: Binding): void {
        if (binding.used || binding.name.name.startsWith('_')) return;
        this.report(binding.name.start, binding.name.end, {
            callout: `Unused variable \`${binding.name.name}\``,
            level: 'info',
            hint: 'Prefix the name with `_` if it is unused on purpose'
        });
    }

    private report(
        start: NativeLocation,
        end: NativeLocation,
        error: Pick<RawError, 'callout' | 'level'> & { hint: string | undefined }
    ): void {
        const raw: RawError = { start, end, callout: error.callout, level: error.level };
        if (error.hint !== undefined) raw.hint = error.hint;
        this.errors.push(raw);
    }
}

function plural(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Nearest candidate within an edit distance of 2
 */
export function closest(name: string, candidates: string[]): string | undefined {
    let best: string | undefined;
    let bestDistance = 3;

    for (const candidate of candidates) {
        const distance = editDistance(name, candidate);
        if (distance < bestDistance) {
            best = candidate;
            bestDistance = distance;
        }
    }
    return best;
}

export function editDistance(a: string, b: string): number {
    let previous = Array.from({ length: b.length + 1 }, (_, i) => i);

    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
        }
        previous = current;
    }

    return previous[b.length];
}
