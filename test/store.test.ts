import { describe, test, expect } from 'vitest';
import { DocumentStore } from '../src/store';
import { DocumentNotFoundError } from '../src/errors';

const uri = 'file:///work/pipeline.tally';

describe('DocumentStore', () => {
    test('update replaces the whole text', () => {
        const store = new DocumentStore();
        store.open(uri, 'a');
        store.update(uri, 'b');
        expect(store.get(uri)).toBe('b');
        expect(store.size).toBe(1);
    });

    test('open on an existing id overwrites it', () => {
        const store = new DocumentStore();
        store.open(uri, 'first');
        store.open(uri, 'second');
        expect(store.get(uri)).toBe('second');
        expect(store.ids()).toEqual([uri]);
    });

    test('update without a prior open inserts the document', () => {
        const store = new DocumentStore();
        store.update(uri, 'text');
        expect(store.has(uri)).toBe(true);
    });

    test('get throws DocumentNotFoundError for unknown ids', () => {
        const store = new DocumentStore();
        expect(() => store.get(uri)).toThrow(DocumentNotFoundError);
        expect(store.find(uri)).toBeUndefined();
    });

    test('close removes the entry by default', () => {
        const store = new DocumentStore();
        store.open(uri, 'text');
        expect(store.close(uri)).toBe(true);
        expect(store.has(uri)).toBe(false);
    });

    test('close keeps the entry under the retain policy', () => {
        const store = new DocumentStore({ closePolicy: 'retain' });
        store.open(uri, 'text');
        expect(store.close(uri)).toBe(false);
        expect(store.get(uri)).toBe('text');
    });

    test('documents are independent of each other', () => {
        const store = new DocumentStore();
        store.open('file:///a.tally', 'a');
        store.open('file:///b.tally', 'b');
        store.close('file:///a.tally');
        expect(store.get('file:///b.tally')).toBe('b');
    });

    test('tracks whether a document is open', () => {
        const store = new DocumentStore({ closePolicy: 'retain' });
        store.open(uri, 'text');
        expect(store.isOpen(uri)).toBe(true);

        store.close(uri);
        expect(store.isOpen(uri)).toBe(false);
        expect(store.has(uri)).toBe(true);

        store.update(uri, 'edited');
        expect(store.isOpen(uri)).toBe(true);
    });

    test('forgets the revisions of removed documents', () => {
        const store = new DocumentStore();
        store.open('file:///a.tally', 'a');
        store.open('file:///b.tally', 'b');
        store.close('file:///a.tally');
        store.close('file:///never-opened.tally');

        expect(store.revisionCount).toBe(1);
    });

    test('keeps the revisions of retained documents only', () => {
        const store = new DocumentStore({ closePolicy: 'retain' });
        store.open(uri, 'text');
        store.close(uri);
        store.close('file:///never-opened.tally');

        expect(store.revisionCount).toBe(1);
    });

    describe('load', () => {
        test('stores the loaded text', async () => {
            const store = new DocumentStore();
            const text = await store.load(uri, async () => 'from disk');
            expect(text).toBe('from disk');
            expect(store.get(uri)).toBe('from disk');
        });

        test('drops a load that finishes after a newer update', async () => {
            const store = new DocumentStore();
            store.open(uri, 'opened');

            let release: (text: string) => void = () => undefined;
            const pending = store.load(uri, () => new Promise<string>(resolve => { release = resolve; }));

            store.update(uri, 'edited');
            release('stale disk text');

            await expect(pending).resolves.toBe('edited');
            expect(store.get(uri)).toBe('edited');
        });

        test('does not resurrect a document closed while loading', async () => {
            const store = new DocumentStore();
            store.open(uri, 'opened');

            let release: (text: string) => void = () => undefined;
            const pending = store.load(uri, () => new Promise<string>(resolve => { release = resolve; }));

            store.close(uri);
            release('disk text');

            await expect(pending).resolves.toBeUndefined();
            expect(store.has(uri)).toBe(false);
        });

        test('holds the revision of a closed document until its load settles', async () => {
            const store = new DocumentStore();
            store.open(uri, 'opened');

            let release: (text: string) => void = () => undefined;
            const pending = store.load(uri, () => new Promise<string>(resolve => { release = resolve; }));

            store.close(uri);
            expect(store.revisionCount).toBe(1);

            release('disk text');
            await pending;
            expect(store.revisionCount).toBe(0);
        });

        test('readers see the old or the new text while a load is pending', async () => {
            const store = new DocumentStore();
            store.open(uri, 'x0');

            let release: (text: string) => void = () => undefined;
            const pending = store.load(uri, () => new Promise<string>(resolve => { release = resolve; }));

            expect(store.get(uri)).toBe('x0');
            release('x1');
            await pending;
            expect(store.get(uri)).toBe('x1');
        });

        test('propagates loader failures without touching the entry', async () => {
            const store = new DocumentStore();
            store.open(uri, 'kept');
            await expect(store.load(uri, async () => { throw new Error('EACCES'); })).rejects.toThrow('EACCES');
            expect(store.get(uri)).toBe('kept');
        });
    });
});
