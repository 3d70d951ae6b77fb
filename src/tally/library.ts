/**
 * Function Library
 *
 * Modules and functions callable from Tally, loaded from library.json.
 * Modules and their functions keep the order they are declared in.
 */

import { z } from 'zod';
import bundled from './library.json';
import type { FunctionDoc } from '../language';

export const LibraryFunctionSchema = z.object({
    name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
    args: z.array(z.string()),
    description: z.string(),
    /** Qualified name of the replacement */
    deprecated: z.string().optional()
});

export const LibraryModuleSchema = z.object({
    name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
    description: z.string(),
    functions: z.array(LibraryFunctionSchema)
});

export const LibrarySchema = z.object({
    modules: z.array(LibraryModuleSchema)
});

export type LibraryFunction = z.infer<typeof LibraryFunctionSchema>;
export type LibraryModule = z.infer<typeof LibraryModuleSchema>;
export type LibraryDefinition = z.infer<typeof LibrarySchema>;

export const PATH_SEPARATOR = '::';

export class FunctionLibrary {
    private readonly modules = new Map<string, LibraryModule>();
    private readonly index = new Map<string, LibraryFunction>();

    constructor(definition: LibraryDefinition) {
        for (const module of definition.modules) {
            this.modules.set(module.name, module);
            for (const fn of module.functions) {
                this.index.set(qualify(module.name, fn.name), fn);
            }
        }
    }

    /**
     * Validate and load an untrusted definition
     */
    static parse(input: unknown): FunctionLibrary {
        return new FunctionLibrary(LibrarySchema.parse(input));
    }

    moduleNames(): string[] {
        return Array.from(this.modules.keys());
    }

    hasModule(name: string): boolean {
        return this.modules.has(name);
    }

    functionNames(module: string): string[] {
        return this.modules.get(module)?.functions.map(fn => fn.name) ?? [];
    }

    lookup(qualifiedName: string): LibraryFunction | undefined {
        return this.index.get(qualifiedName);
    }

    doc(qualifiedName: string): FunctionDoc | null {
        const fn = this.lookup(qualifiedName);
        if (!fn) return null;

        return {
            signature: { name: qualifiedName, args: fn.args },
            description: fn.deprecated
                ? `${fn.description}\n\n**Deprecated:** use \`${fn.deprecated}\` instead.`
                : fn.description
        };
    }
}

export function qualify(module: string, name: string): string {
    return `${module}${PATH_SEPARATOR}${name}`;
}

let defaultLibrary: FunctionLibrary | undefined;

export function loadBundledLibrary(): FunctionLibrary {
    defaultLibrary ??= FunctionLibrary.parse(bundled);
    return defaultLibrary;
}
