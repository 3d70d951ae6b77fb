/**
 * Errors
 */

import type { DocumentId } from './types';

/**
 * Raised when a request names a document the store does not hold.
 * Request handlers answer with an empty result instead of failing.
 */
export class DocumentNotFoundError extends Error {
    readonly uri: DocumentId;

    constructor(uri: DocumentId) {
        super(`Document not open: ${uri}`);
        this.name = 'DocumentNotFoundError';
        this.uri = uri;
    }
}

export function formatError(e: unknown): string {
    if (e instanceof Error) return e.stack ?? e.message;
    return String(e);
}
