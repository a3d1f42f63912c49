import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { InMemoryDocumentStore } from './document-store';
import {
    ConnectionError,
    IndexLifecycleError,
} from './errors';
import { ensureIndex } from './index-lifecycle';
import { createRecordingLogger } from './test-helpers';

describe('ensureIndex', () => {
    it('creates a missing index when creation is allowed', async () => {
        const store = new InMemoryDocumentStore();
        const logger = createRecordingLogger();

        const outcome = await ensureIndex(store, 'people', {
            allowCreation: true,
            clearExisting: false,
        }, logger);

        assert.deepEqual(outcome, { created: true, deleted: false });
        assert.equal(await store.indexExists('people'), true);
        assert.deepEqual(logger.messages('info'), ['index created']);
    });

    it('leaves an existing index and its documents alone', async () => {
        const store = new InMemoryDocumentStore();
        store.seedIndex('people', [{ fields: { id: 'p-1' }, id: 'p-1' }]);

        const outcome = await ensureIndex(store, 'people', {
            allowCreation: false,
            clearExisting: false,
        }, createRecordingLogger());

        assert.deepEqual(outcome, { created: false, deleted: false });
        assert.deepEqual(store.listDocumentIds('people'), ['p-1']);
    });

    it('deletes and recreates an existing index when clearing', async () => {
        const store = new InMemoryDocumentStore();
        store.seedIndex('people', [{ fields: { id: 'stale' }, id: 'stale' }]);
        const logger = createRecordingLogger();

        const outcome = await ensureIndex(store, 'people', {
            allowCreation: true,
            clearExisting: true,
        }, logger);

        assert.deepEqual(outcome, { created: true, deleted: true });
        assert.deepEqual(store.listDocumentIds('people'), []);
        assert.deepEqual(
            logger.messages('info'),
            ['index deleted', 'index created'],
        );
    });

    it('logs and continues when there is nothing to clear', async () => {
        const store = new InMemoryDocumentStore();
        const logger = createRecordingLogger();

        const outcome = await ensureIndex(store, 'people', {
            allowCreation: true,
            clearExisting: true,
        }, logger);

        assert.deepEqual(outcome, { created: true, deleted: false });
        assert.deepEqual(
            logger.messages('info'),
            ['index absent, nothing to delete', 'index created'],
        );
    });

    it('fails when the index is missing and creation is disallowed', async () => {
        const store = new InMemoryDocumentStore();

        await assert.rejects(
            ensureIndex(store, 'people', {
                allowCreation: false,
                clearExisting: false,
            }, createRecordingLogger()),
            (error: unknown) => {
                assert.ok(error instanceof IndexLifecycleError);
                assert.equal(error.indexName, 'people');
                assert.equal(
                    error.message,
                    "Index 'people' is missing and index creation is disallowed",
                );
                return true;
            },
        );
    });

    it('fails after clearing when creation is disallowed', async () => {
        const store = new InMemoryDocumentStore();
        store.seedIndex('people');

        await assert.rejects(
            ensureIndex(store, 'people', {
                allowCreation: false,
                clearExisting: true,
            }, createRecordingLogger()),
            IndexLifecycleError,
        );
        assert.equal(await store.indexExists('people'), false);
    });

    it('passes connection errors through and wraps anything else', async () => {
        class FailingStore extends InMemoryDocumentStore {
            constructor(private readonly failure: Error) {
                super();
            }

            override async indexExists(): Promise<boolean> {
                throw this.failure;
            }
        }

        await assert.rejects(
            ensureIndex(
                new FailingStore(new ConnectionError('refused')),
                'people',
                { allowCreation: true, clearExisting: false },
                createRecordingLogger(),
            ),
            ConnectionError,
        );
        await assert.rejects(
            ensureIndex(
                new FailingStore(new Error('bad mapping')),
                'people',
                { allowCreation: true, clearExisting: false },
                createRecordingLogger(),
            ),
            /^IndexLifecycleError: Index 'people' could not be prepared: bad mapping$/,
        );
    });
});
