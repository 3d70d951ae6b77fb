/**
 * Tally Language Capability
 *
 * Both dialects share the function library; the query dialect adds
 * `select ... from ... into ...` statements.
 */

import type { FunctionDoc, LanguageCapability, LanguageId, NativeLocation, RawError } from '../language';
import type { Dialect } from './lexer';
import { parse } from './parser';
import { check } from './checker';
import { loadBundledLibrary, PATH_SEPARATOR, type FunctionLibrary } from './library';

export interface TallyLanguageOptions {
    dialect?: Dialect;
    library?: FunctionLibrary;
}

export class TallyLanguage implements LanguageCapability {
    readonly id: LanguageId;
    readonly pathSeparator = PATH_SEPARATOR;
    readonly dialect: Dialect;

    private readonly library: FunctionLibrary;

    constructor(options: TallyLanguageOptions = {}) {
        this.dialect = options.dialect ?? 'script';
        this.id = this.dialect === 'query' ? 'tally-query' : 'tally';
        this.library = options.library ?? loadBundledLibrary();
    }

    parseErrors(text: string): RawError[] | null {
        if (isBlank(text)) return null;

        const parsed = parse(text, this.dialect);
        const errors = [...parsed.errors, ...check(parsed.statements, this.library)];

        // Array.prototype.sort is stable, so same-position errors keep their order
        return errors.sort((a, b) => compareLocations(a.start, b.start));
    }

    functions(namespace: string): string[] {
        return this.library.functionNames(namespace);
    }

    functionDoc(qualifiedName: string): FunctionDoc | null {
        return this.library.doc(qualifiedName);
    }
}

function isBlank(text: string): boolean {
    return text.split('\n').every(line => /^\s*(#.*)?$/.test(line));
}

function compareLocations(a: NativeLocation, b: NativeLocation): number {
    return a.line - b.line || a.column - b.column;
}
