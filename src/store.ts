/**
 * Document Store
 *
 * Latest full text of every open document. A write always replaces the
 * whole text; there is no patching.
 *
 * Mutations are synchronous, so a reader on the event loop sees either
 * the old or the new string. Async loads go through `load`, which reads
 * outside the store and drops its result if a newer write for the same
 * document landed in the meantime.
 */

import type { DocumentId } from './types';
import { DocumentNotFoundError } from './errors';

/**
 * What `close` does with the entry:
 * - `remove` deletes it
 * - `retain` keeps the last text around
 */
export type ClosePolicy = 'remove' | 'retain';

export interface DocumentState {
    readonly text: string;
}

export interface DocumentStoreOptions {
    closePolicy?: ClosePolicy;
}

export class DocumentStore {
    readonly closePolicy: ClosePolicy;

    private readonly documents = new Map<DocumentId, DocumentState>();
    /** Only for ids with an entry or a pending load */
    private readonly revisions = new Map<DocumentId, number>();
    private readonly pendingLoads = new Map<DocumentId, number>();
    private readonly openIds = new Set<DocumentId>();

    constructor(options: DocumentStoreOptions = {}) {
        this.closePolicy = options.closePolicy ?? 'remove';
    }

    open(id: DocumentId, text: string): void {
        this.write(id, text);
    }

    update(id: DocumentId, text: string): void {
        this.write(id, text);
    }

    get(id: DocumentId): string {
        const state = this.documents.get(id);
        if (!state) {
            throw new DocumentNotFoundError(id);
        }
        return state.text;
    }

    find(id: DocumentId): string | undefined {
        return this.documents.get(id)?.text;
    }

    has(id: DocumentId): boolean {
        return this.documents.has(id);
    }

    ids(): DocumentId[] {
        return Array.from(this.documents.keys());
    }

    get size(): number {
        return this.documents.size;
    }

    /** Written since the last close. A retained entry is not open. */
    isOpen(id: DocumentId): boolean {
        return this.openIds.has(id);
    }

    /** Ids holding revision state */
    get revisionCount(): number {
        return this.revisions.size;
    }

    /**
     * Returns true when the entry was removed.
     */
    close(id: DocumentId): boolean {
        this.bump(id);
        this.openIds.delete(id);

        const removed = this.closePolicy === 'remove' && this.documents.delete(id);
        this.prune(id);
        return removed;
    }

    /**
     * Run `loader` and store its text unless the document was written,
     * or closed, while it ran. Resolves to the text current afterwards.
     */
    async load(id: DocumentId, loader: () => Promise<string>): Promise<string | undefined> {
        const revision = this.revision(id);
        this.pendingLoads.set(id, (this.pendingLoads.get(id) ?? 0) + 1);

        try {
            const text = await loader();
            if (this.revision(id) === revision) {
                this.write(id, text);
            }
            return this.find(id);
        } finally {
            const remaining = (this.pendingLoads.get(id) ?? 1) - 1;
            if (remaining > 0) {
                this.pendingLoads.set(id, remaining);
            } else {
                this.pendingLoads.delete(id);
            }
            this.prune(id);
        }
    }

    private write(id: DocumentId, text: string): void {
        this.bump(id);
        this.openIds.add(id);
        this.documents.set(id, Object.freeze({ text }));
    }

    /** A pending load still compares against the current revision */
    private prune(id: DocumentId): void {
        if (!this.documents.has(id) && !this.pendingLoads.has(id)) {
            this.revisions.delete(id);
        }
    }

    private revision(id: DocumentId): number {
        return this.revisions.get(id) ?? 0;
    }

    private bump(id: DocumentId): void {
        this.revisions.set(id, this.revision(id) + 1);
    }
}
