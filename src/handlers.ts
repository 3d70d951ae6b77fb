/**
 * Request Handlers
 *
 * Binds LSP lifecycle events and queries to the server core.
 *
 * Each handler catches its own failures: a document the store does not
 * know yields an empty result, anything else is logged and answered
 * with an empty result too. Nothing here takes the connection down.
 */

import {
    TextDocumentSyncKind,
    type CompletionItem,
    type CompletionParams,
    type Connection,
    type DidChangeTextDocumentParams,
    type DidCloseTextDocumentParams,
    type DidOpenTextDocumentParams,
    type Hover,
    type HoverParams,
    type InitializeParams,
    type InitializeResult
} from 'vscode-languageserver/node';
import type { DiagnosticRecord, DocumentId } from './types';
import { LanguageServerCore, type ReadDocument } from './core';
import { DocumentStore } from './store';
import { createLanguage } from './languages';
import { createConnectionLogger, type Logger } from './logger';
import { DocumentNotFoundError, formatError } from './errors';
import { mapCompletions, mapDiagnostics, mapHover } from './mapping';
import { resolveSettings, type ServerSettings } from './settings';

export const SERVER_NAME = 'tally-language-server';

type HandlerConnection = Pick<
    Connection,
    | 'console'
    | 'sendDiagnostics'
    | 'onInitialize'
    | 'onInitialized'
    | 'onShutdown'
    | 'onDidOpenTextDocument'
    | 'onDidChangeTextDocument'
    | 'onDidCloseTextDocument'
    | 'onCompletion'
    | 'onHover'
>;

/**
 * Shared state handed to every handler. `core` and `settings` are set
 * by `initialize`.
 */
export interface ServerContext {
    readonly connection: HandlerConnection;
    readonly argv: readonly string[];
    logger: Logger;
    settings: ServerSettings | null;
    core: LanguageServerCore | null;
    /** Overrides how `documentSource: 'disk'` reads files */
    readDocument?: ReadDocument;
}

export function createServerContext(connection: HandlerConnection, argv: readonly string[]): ServerContext {
    return {
        connection,
        argv,
        logger: createConnectionLogger(connection),
        settings: null,
        core: null
    };
}

export function handleInitialize(ctx: ServerContext, params: InitializeParams): InitializeResult {
    const { settings, issues } = resolveSettings(ctx.argv, params.initializationOptions);

    ctx.settings = settings;
    ctx.logger = createConnectionLogger(ctx.connection, settings.logLevel);
    for (const issue of issues) {
        ctx.logger.warn(`ignoring invalid setting ${issue}`);
    }

    ctx.core = new LanguageServerCore({
        language: createLanguage(settings.language),
        store: new DocumentStore({ closePolicy: settings.closePolicy }),
        logger: ctx.logger,
        documentSource: settings.documentSource,
        readDocument: ctx.readDocument
    });

    ctx.logger.info(
        `initialize: language=${settings.language} closePolicy=${settings.closePolicy} documentSource=${settings.documentSource}`
    );

    return {
        capabilities: {
            textDocumentSync: TextDocumentSyncKind.Full,
            completionProvider: {
                resolveProvider: false,
                triggerCharacters: [':']
            },
            hoverProvider: true
        },
        serverInfo: { name: SERVER_NAME }
    };
}

async function publish(ctx: ServerContext, uri: DocumentId, records: DiagnosticRecord[]): Promise<void> {
    await ctx.connection.sendDiagnostics({ uri, diagnostics: mapDiagnostics(records) });
}

function requireCore(ctx: ServerContext, event: string): LanguageServerCore | null {
    if (!ctx.core) {
        ctx.logger.warn(`${event} received before initialize`);
    }
    return ctx.core;
}

export async function handleDidOpen(ctx: ServerContext, params: DidOpenTextDocumentParams): Promise<void> {
    const { uri, text, languageId } = params.textDocument;
    ctx.logger.log(`didOpen ${uri} (${languageId})`);

    const core = requireCore(ctx, 'didOpen');
    if (!core) return;

    try {
        await publish(ctx, uri, await core.onOpen(uri, text));
    } catch (e) {
        ctx.logger.error(`[didOpen] failed for ${uri}: ${formatError(e)}`);
    }
}

export async function handleDidChange(ctx: ServerContext, params: DidChangeTextDocumentParams): Promise<void> {
    const uri = params.textDocument.uri;
    ctx.logger.log(`didChange ${uri}`);

    const core = requireCore(ctx, 'didChange');
    if (!core) return;

    // Full sync: the last change carries the whole text
    const change = params.contentChanges[params.contentChanges.length - 1];
    if (!change) return;
    if ('range' in change) {
        ctx.logger.warn(`[didChange] ignoring ranged change for ${uri}; the server only accepts full text`);
        return;
    }

    try {
        await publish(ctx, uri, core.onChange(uri, change.text));
    } catch (e) {
        ctx.logger.error(`[didChange] failed for ${uri}: ${formatError(e)}`);
    }
}

export async function handleDidClose(ctx: ServerContext, params: DidCloseTextDocumentParams): Promise<void> {
    const uri = params.textDocument.uri;
    ctx.logger.log(`didClose ${uri}`);

    const core = requireCore(ctx, 'didClose');
    if (!core) return;

    try {
        await publish(ctx, uri, core.onClose(uri));
    } catch (e) {
        ctx.logger.error(`[didClose] failed for ${uri}: ${formatError(e)}`);
    }
}

export function handleCompletion(ctx: ServerContext, params: CompletionParams): CompletionItem[] {
    const uri = params.textDocument.uri;
    const core = requireCore(ctx, 'completion');
    if (!core) return [];

    try {
        return mapCompletions(core.completions(uri, params.position));
    } catch (e) {
        if (e instanceof DocumentNotFoundError) {
            ctx.logger.warn(`[completion] ${e.message}`);
        } else {
            ctx.logger.error(`[completion] failed for ${uri}: ${formatError(e)}`);
        }
        return [];
    }
}

export function handleHover(ctx: ServerContext, params: HoverParams): Hover | null {
    const uri = params.textDocument.uri;
    const core = requireCore(ctx, 'hover');
    if (!core) return null;

    try {
        return mapHover(core.hover(uri, params.position));
    } catch (e) {
        if (e instanceof DocumentNotFoundError) {
            ctx.logger.warn(`[hover] ${e.message}`);
        } else {
            ctx.logger.error(`[hover] failed for ${uri}: ${formatError(e)}`);
        }
        return null;
    }
}

/**
 * Registers all handlers on the connection.
 */
export function registerHandlers(ctx: ServerContext): void {
    const { connection } = ctx;

    connection.onInitialize(params => handleInitialize(ctx, params));
    connection.onInitialized(() => {
        ctx.logger.info('initialized');
    });
    connection.onShutdown(() => {
        ctx.logger.info('shutdown');
    });

    connection.onDidOpenTextDocument(params => handleDidOpen(ctx, params));
    connection.onDidChangeTextDocument(params => handleDidChange(ctx, params));
    connection.onDidCloseTextDocument(params => handleDidClose(ctx, params));

    connection.onCompletion(params => handleCompletion(ctx, params));
    connection.onHover(params => handleHover(ctx, params));
}
