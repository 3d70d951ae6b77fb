import { describe, test, expect, vi } from 'vitest';
import {
    CompletionItemKind,
    DiagnosticSeverity,
    InsertTextFormat,
    MarkupKind,
    TextDocumentSyncKind,
    type InitializeParams
} from 'vscode-languageserver/node';
import {
    createServerContext,
    handleCompletion,
    handleDidChange,
    handleDidClose,
    handleDidOpen,
    handleHover,
    handleInitialize,
    registerHandlers,
    SERVER_NAME
} from '../src/handlers';

const uri = 'file:///work/pipeline.tally';

function createMockConnection() {
    return {
        console: { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
        sendDiagnostics: vi.fn(async () => undefined),
        onInitialize: vi.fn(),
        onInitialized: vi.fn(),
        onShutdown: vi.fn(),
        onDidOpenTextDocument: vi.fn(),
        onDidChangeTextDocument: vi.fn(),
        onDidCloseTextDocument: vi.fn(),
        onCompletion: vi.fn(),
        onHover: vi.fn()
    };
}

function initParams(initializationOptions?: unknown): InitializeParams {
    return { processId: null, rootUri: null, capabilities: {}, initializationOptions };
}

function createMockContext(argv: string[] = [], initializationOptions?: unknown) {
    const connection = createMockConnection();
    const ctx = createServerContext(connection as never, argv);
    const result = handleInitialize(ctx, initParams(initializationOptions));
    return { connection, ctx, result };
}

function open(text: string, languageId = 'tally') {
    return { textDocument: { uri, languageId, version: 1, text } };
}

describe('handleInitialize', () => {
    test('advertises full sync, completion and hover', () => {
        const { result } = createMockContext();

        expect(result).toEqual({
            capabilities: {
                textDocumentSync: TextDocumentSyncKind.Full,
                completionProvider: { resolveProvider: false, triggerCharacters: [':'] },
                hoverProvider: true
            },
            serverInfo: { name: SERVER_NAME }
        });
    });

    test('builds the core from the resolved settings', () => {
        const { ctx } = createMockContext(['--language=tally-query'], { closePolicy: 'retain' });

        expect(ctx.settings?.language).toBe('tally-query');
        expect(ctx.core?.language.id).toBe('tally-query');
        expect(ctx.core?.store.closePolicy).toBe('retain');
    });

    test('warns about invalid settings', () => {
        const { connection, ctx } = createMockContext([], { documentSource: 'network' });

        expect(ctx.settings?.documentSource).toBe('client');
        expect(connection.console.warn).toHaveBeenCalledTimes(1);
        expect(connection.console.warn.mock.calls[0][0]).toMatch(/^\[tally\] ignoring invalid setting documentSource: /);
    });
});

describe('document events', () => {
    test('didOpen publishes mapped diagnostics', async () => {
        const { connection, ctx } = createMockContext();

        await handleDidOpen(ctx, open('emit missing;'));

        expect(connection.sendDiagnostics).toHaveBeenCalledWith({
            uri,
            diagnostics: [
                {
                    range: { start: { line: 0, character: 5 }, end: { line: 0, character: 12 } },
                    message: 'Undefined variable `missing`',
                    severity: DiagnosticSeverity.Warning,
                    source: 'tally'
                }
            ]
        });
    });

    test('didChange checks the last full-text change', async () => {
        const { connection, ctx } = createMockContext();
        await handleDidOpen(ctx, open('emit missing;'));

        await handleDidChange(ctx, {
            textDocument: { uri, version: 2 },
            contentChanges: [{ text: 'emit missing;' }, { text: 'emit event;' }]
        });

        expect(connection.sendDiagnostics).toHaveBeenLastCalledWith({ uri, diagnostics: [] });
        expect(ctx.core?.store.get(uri)).toBe('emit event;');
    });

    test('didChange ignores ranged changes', async () => {
        const { connection, ctx } = createMockContext();
        await handleDidOpen(ctx, open('emit event;'));

        await handleDidChange(ctx, {
            textDocument: { uri, version: 2 },
            contentChanges: [
                { range: { start: { line: 0, character: 0 }, end: { line: 0, character: 4 } }, text: 'let' }
            ]
        });

        expect(ctx.core?.store.get(uri)).toBe('emit event;');
        expect(connection.sendDiagnostics).toHaveBeenCalledTimes(1);
        expect(connection.console.warn).toHaveBeenCalledWith(
            `[tally] [didChange] ignoring ranged change for ${uri}; the server only accepts full text`
        );
    });

    test('didClose clears the diagnostics', async () => {
        const { connection, ctx } = createMockContext();
        await handleDidOpen(ctx, open('emit missing;'));

        await handleDidClose(ctx, { textDocument: { uri } });

        expect(connection.sendDiagnostics).toHaveBeenLastCalledWith({ uri, diagnostics: [] });
        expect(ctx.core?.store.has(uri)).toBe(false);
    });

    test('didOpen reads the file when documentSource is disk', async () => {
        const connection = createMockConnection();
        const ctx = createServerContext(connection as never, ['--document-source=disk']);
        ctx.readDocument = vi.fn(async () => 'emit event;');
        handleInitialize(ctx, initParams());

        await handleDidOpen(ctx, open('emit missing;'));

        expect(ctx.readDocument).toHaveBeenCalledWith(uri);
        expect(connection.sendDiagnostics).toHaveBeenCalledWith({ uri, diagnostics: [] });
    });
});

describe('handleCompletion', () => {
    test('lists module functions as snippets', async () => {
        const { ctx } = createMockContext();
        await handleDidOpen(ctx, open('emit math::'));

        const items = handleCompletion(ctx, { textDocument: { uri }, position: { line: 0, character: 11 } });

        expect(items.map(i => i.label)).toEqual(['abs', 'ceil', 'floor', 'max', 'min', 'round', 'clamp', 'pow']);
        expect(items[3]).toEqual({
            label: 'max',
            kind: CompletionItemKind.Function,
            detail: 'math::max(a, b)',
            documentation: { kind: MarkupKind.Markdown, value: 'The larger of `a` and `b`.' },
            insertText: 'max(${1:a}, ${2:b})',
            insertTextFormat: InsertTextFormat.Snippet
        });
    });

    test('returns nothing for unknown documents', () => {
        const { connection, ctx } = createMockContext();

        expect(handleCompletion(ctx, { textDocument: { uri }, position: { line: 0, character: 0 } })).toEqual([]);
        expect(connection.console.warn).toHaveBeenCalledWith(`[tally] [completion] Document not open: ${uri}`);
    });
});

describe('handleHover', () => {
    test('renders the function documentation', async () => {
        const { ctx } = createMockContext();
        await handleDidOpen(ctx, open('emit string::upper'));

        expect(handleHover(ctx, { textDocument: { uri }, position: { line: 0, character: 18 } })).toEqual({
            contents: {
                kind: MarkupKind.Markdown,
                value: '```tally\nstring::upper(s)\n```\n\n`s` converted to upper case.'
            }
        });
    });

    test('returns null for unknown documents', () => {
        const { connection, ctx } = createMockContext();

        expect(handleHover(ctx, { textDocument: { uri }, position: { line: 0, character: 0 } })).toBeNull();
        expect(connection.console.warn).toHaveBeenCalledWith(`[tally] [hover] Document not open: ${uri}`);
    });
});

describe('before initialize', () => {
    test('queries return empty results and warn', async () => {
        const connection = createMockConnection();
        const ctx = createServerContext(connection as never, []);

        await handleDidOpen(ctx, open('emit event;'));
        const items = handleCompletion(ctx, { textDocument: { uri }, position: { line: 0, character: 0 } });

        expect(items).toEqual([]);
        expect(connection.sendDiagnostics).not.toHaveBeenCalled();
        expect(connection.console.warn).toHaveBeenCalledWith('[tally] didOpen received before initialize');
        expect(connection.console.warn).toHaveBeenCalledWith('[tally] completion received before initialize');
    });
});

describe('registerHandlers', () => {
    test('registers every handler on the connection', () => {
        const connection = createMockConnection();
        registerHandlers(createServerContext(connection as never, []));

        expect(connection.onInitialize).toHaveBeenCalledTimes(1);
        expect(connection.onInitialized).toHaveBeenCalledTimes(1);
        expect(connection.onShutdown).toHaveBeenCalledTimes(1);
        expect(connection.onDidOpenTextDocument).toHaveBeenCalledTimes(1);
        expect(connection.onDidChangeTextDocument).toHaveBeenCalledTimes(1);
        expect(connection.onDidCloseTextDocument).toHaveBeenCalledTimes(1);
        expect(connection.onCompletion).toHaveBeenCalledTimes(1);
        expect(connection.onHover).toHaveBeenCalledTimes(1);
    });
});
