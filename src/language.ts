/**
 * Language Capability
 *
 * The seam between the language-agnostic pipelines and a concrete
 * language's checker and function library.
 */

export const LANGUAGE_IDS = ['tally', 'tally-query'] as const;

export type LanguageId = typeof LANGUAGE_IDS[number];

/** One-based line and column as reported by a language's checker */
export interface NativeLocation {
    line: number;
    column: number;
}

export type ErrorLevel = 'error' | 'warning' | 'info' | 'hint';

export interface RawError {
    start: NativeLocation;
    end: NativeLocation;
    callout: string;
    level: ErrorLevel;
    hint?: string;
}

export interface FunctionSignature {
    /** Fully qualified, e.g. `math::max` */
    name: string;
    args: readonly string[];
}

export interface FunctionDoc {
    signature: FunctionSignature;
    /** Markdown */
    description: string;
}

export interface LanguageCapability {
    readonly id: LanguageId;
    /** Separator between a namespace and its members */
    readonly pathSeparator: string;

    /**
     * Check `text` and report problems in document order.
     * Returns null when there is nothing to check (blank input).
     * Malformed input is reported, never thrown.
     */
    parseErrors(text: string): RawError[] | null;

    /** Member names of `namespace` in declaration order, empty if unknown */
    functions(namespace: string): string[];

    functionDoc(qualifiedName: string): FunctionDoc | null;
}

export function formatSignature(signature: FunctionSignature): string {
    return `${signature.name}(${signature.args.join(', ')})`;
}

export function renderFunctionDoc(doc: FunctionDoc, fence = 'tally'): string {
    return `\`\`\`${fence}\n${formatSignature(doc.signature)}\n\`\`\`\n\n${doc.description}`;
}
