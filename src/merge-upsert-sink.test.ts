import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
    InMemoryDocumentStore,
    mergeDocumentFields,
} from './document-store';
import {
    MergeUpsertSink,
    collapseDocuments,
} from './merge-upsert-sink';
import { createRecordingLogger } from './test-helpers';

describe('mergeDocumentFields', () => {
    it('overwrites supplied fields and keeps the rest', () => {
        assert.deepEqual(
            mergeDocumentFields(
                { id: 'p-1', name: 'Ada', status: 'active' },
                { id: 'p-1', status: 'archived' },
            ),
            { id: 'p-1', name: 'Ada', status: 'archived' },
        );
    });

    it('replaces a nested object field whole instead of merging into it', () => {
        assert.deepEqual(
            mergeDocumentFields(
                { id: 'p-1', person: { email: 'x', name: 'A' } },
                { person: { name: 'B' } },
            ),
            { id: 'p-1', person: { name: 'B' } },
        );
    });

    it('stores a null incoming value rather than dropping the field', () => {
        assert.deepEqual(
            mergeDocumentFields({ id: 'p-1', team: 'core' }, { team: null }),
            { id: 'p-1', team: null },
        );
    });

    it('copies the incoming fields for a new document', () => {
        const incoming = { id: 'p-9' };
        const merged = mergeDocumentFields(null, incoming);

        assert.deepEqual(merged, { id: 'p-9' });
        assert.notEqual(merged, incoming);
    });
});

describe('collapseDocuments', () => {
    it('folds duplicate ids in first-seen order', () => {
        const collapsed = collapseDocuments([
            { fields: { id: 'a', x: 1 }, id: 'a' },
            { fields: { id: 'b', x: 2 }, id: 'b' },
            { fields: { id: 'a', y: 3 }, id: 'a' },
        ]);

        assert.deepEqual(collapsed, [
            { fields: { id: 'a', x: 1, y: 3 }, id: 'a' },
            { fields: { id: 'b', x: 2 }, id: 'b' },
        ]);
    });
});

describe('MergeUpsertSink', () => {
    it('inserts new documents and merges into existing ones', async () => {
        const store = new InMemoryDocumentStore();
        store.seedIndex('people', [{
            fields: { id: 'p-1', name: 'Ada', status: 'active' },
            id: 'p-1',
        }]);
        const sink = new MergeUpsertSink(store, createRecordingLogger());

        const result = await sink.upsertBatch('people', [
            { fields: { id: 'p-1', status: 'archived' }, id: 'p-1' },
            { fields: { id: 'p-2', name: 'Grace' }, id: 'p-2' },
        ]);

        assert.deepEqual(result, { failed: 0, succeeded: 2 });
        assert.deepEqual(store.getDocument('people', 'p-1'), {
            id: 'p-1',
            name: 'Ada',
            status: 'archived',
        });
        assert.deepEqual(store.getDocument('people', 'p-2'), {
            id: 'p-2',
            name: 'Grace',
        });
    });

    it('overwrites nested object fields of stored documents', async () => {
        const store = new InMemoryDocumentStore();
        store.seedIndex('people', [{
            fields: { id: 'p-1', person: { email: 'x', name: 'A' }, team: 'core' },
            id: 'p-1',
        }]);
        const sink = new MergeUpsertSink(store, createRecordingLogger());

        await sink.upsertBatch('people', [
            { fields: { id: 'p-1', person: { name: 'B' } }, id: 'p-1' },
        ]);

        assert.deepEqual(store.getDocument('people', 'p-1'), {
            id: 'p-1',
            person: { name: 'B' },
            team: 'core',
        });
    });

    it('is idempotent for repeated batches', async () => {
        const store = new InMemoryDocumentStore();
        store.seedIndex('people');
        const sink = new MergeUpsertSink(store, createRecordingLogger());
        const batch = [{ fields: { id: 'p-1', score: 3 }, id: 'p-1' }];

        await sink.upsertBatch('people', batch);
        await sink.upsertBatch('people', batch);

        assert.deepEqual(store.listDocumentIds('people'), ['p-1']);
        assert.deepEqual(store.getDocument('people', 'p-1'), {
            id: 'p-1',
            score: 3,
        });
    });

    it('counts per-document failures and keeps writing the rest', async () => {
        const store = new InMemoryDocumentStore({
            rejectDocument: (_index, document) => document.id === 'p-2'
                ? 'mapper_parsing_exception'
                : null,
        });
        store.seedIndex('people');
        const logger = createRecordingLogger();
        const sink = new MergeUpsertSink(store, logger);

        const result = await sink.upsertBatch('people', [
            { fields: { id: 'p-1' }, id: 'p-1' },
            { fields: { id: 'p-2' }, id: 'p-2' },
            { fields: { id: 'p-3' }, id: 'p-3' },
        ]);

        assert.deepEqual(result, { failed: 1, succeeded: 2 });
        assert.deepEqual(store.listDocumentIds('people'), ['p-1', 'p-3']);

        const warning = logger.entries.find((entry) => entry.level === 'warn');

        assert.deepEqual(warning, {
            fields: {
                document_id: 'p-2',
                error: "Document 'p-2' failed to write: mapper_parsing_exception",
                index_name: 'people',
            },
            level: 'warn',
            message: 'document upsert failed',
        });
    });

    it('writes a page with duplicate ids once per id', async () => {
        const store = new InMemoryDocumentStore();
        store.seedIndex('people');
        const sink = new MergeUpsertSink(store, createRecordingLogger());

        const result = await sink.upsertBatch('people', [
            { fields: { id: 'p-1', a: 1 }, id: 'p-1' },
            { fields: { id: 'p-1', b: 2 }, id: 'p-1' },
        ]);

        assert.deepEqual(result, { failed: 0, succeeded: 1 });
        assert.deepEqual(store.mergeCalls, [{
            documentIds: ['p-1'],
            indexName: 'people',
        }]);
        assert.deepEqual(store.getDocument('people', 'p-1'), {
            a: 1,
            b: 2,
            id: 'p-1',
        });
    });

    it('skips the store for an empty batch', async () => {
        const store = new InMemoryDocumentStore();
        const sink = new MergeUpsertSink(store, createRecordingLogger());

        assert.deepEqual(
            await sink.upsertBatch('people', []),
            { failed: 0, succeeded: 0 },
        );
        assert.equal(store.mergeCalls.length, 0);
    });

    it('fails every document when the index is missing', async () => {
        const store = new InMemoryDocumentStore();
        const sink = new MergeUpsertSink(store, createRecordingLogger());

        const result = await sink.upsertBatch('ghost', [
            { fields: { id: 'p-1' }, id: 'p-1' },
            { fields: { id: 'p-2' }, id: 'p-2' },
        ]);

        assert.deepEqual(result, { failed: 2, succeeded: 0 });
    });
});
