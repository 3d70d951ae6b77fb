/**
 * Server Core
 *
 * The operations the request handlers call: document lifecycle events
 * update the store and return fresh diagnostics, queries read the
 * current text and run the completion or hover pipeline.
 *
 * Every call computes from whatever text is current at call time;
 * nothing is debounced or cached.
 */

import * as fs from 'fs';
import { URI } from 'vscode-uri';
import type { CompletionCandidate, DiagnosticRecord, DocumentId, RenderedDoc, SourcePosition } from './types';
import type { LanguageCapability } from './language';
import type { Logger } from './logger';
import { DocumentStore } from './store';
import { collectDiagnostics } from './diagnostics';
import { collectCompletions } from './completion';
import { collectHover } from './hover';

export type DocumentSource = 'client' | 'disk';

export type ReadDocument = (id: DocumentId) => Promise<string>;

export interface CoreOptions {
    language: LanguageCapability;
    store: DocumentStore;
    logger: Logger;
    /** `disk` re-reads an opened document from its file */
    documentSource?: DocumentSource;
    readDocument?: ReadDocument;
}

export async function readDocumentFromDisk(id: DocumentId): Promise<string> {
    const uri = URI.parse(id);
    if (uri.scheme !== 'file') {
        throw new Error(`Cannot read ${id} from disk: not a file URI`);
    }
    return fs.promises.readFile(uri.fsPath, 'utf-8');
}

export class LanguageServerCore {
    readonly language: LanguageCapability;
    readonly store: DocumentStore;

    private readonly logger: Logger;
    private readonly documentSource: DocumentSource;
    private readonly readDocument: ReadDocument;

    constructor(options: CoreOptions) {
        this.language = options.language;
        this.store = options.store;
        this.logger = options.logger;
        this.documentSource = options.documentSource ?? 'client';
        this.readDocument = options.readDocument ?? readDocumentFromDisk;
    }

    /**
     * Store the opened text and check it. With `documentSource: 'disk'`
     * the file contents replace the client's text when they can be read.
     */
    async onOpen(id: DocumentId, text: string): Promise<DiagnosticRecord[]> {
        this.store.open(id, text);

        if (this.documentSource === 'disk') {
            try {
                await this.store.load(id, () => this.readDocument(id));
            } catch (e) {
                const reason = e instanceof Error ? e.message : String(e);
                this.logger.warn(`could not read ${id} from disk, using client text: ${reason}`);
            }
        }

        // Closed while the file was read: close already cleared its diagnostics
        const current = this.store.find(id);
        if (current === undefined || !this.store.isOpen(id)) return [];
        return this.diagnose(id, current);
    }

    onChange(id: DocumentId, text: string): DiagnosticRecord[] {
        this.store.update(id, text);
        return this.diagnose(id, text);
    }

    /**
     * Always empty, so the caller clears what it showed for the document.
     */
    onClose(id: DocumentId): DiagnosticRecord[] {
        const removed = this.store.close(id);
        this.logger.log(`closed ${id} (${removed ? 'removed' : `kept, closePolicy=${this.store.closePolicy}`})`);
        return [];
    }

    /** @throws DocumentNotFoundError */
    completions(id: DocumentId, position: SourcePosition): CompletionCandidate[] {
        const text = this.store.get(id);
        return collectCompletions(this.language, text, position);
    }

    /** @throws DocumentNotFoundError */
    hover(id: DocumentId, position: SourcePosition): RenderedDoc | null {
        const text = this.store.get(id);
        return collectHover(this.language, text, position);
    }

    private diagnose(id: DocumentId, text: string): DiagnosticRecord[] {
        const diagnostics = collectDiagnostics(this.language, text);
        this.logger.log(`diagnostics ${id}: ${diagnostics.length}`);
        return diagnostics;
    }
}
