import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { newDb } from 'pg-mem';
import { ConnectionError } from './errors';
import {
    PostgresDocumentStore,
    isConnectionFailure,
} from './postgres-document-store';
import { GraphIndexSyncService } from './sync.service';
import { InMemoryGraphQueryTransport } from './graph-source';
import {
    buildIndexSpec,
    createRecordingLogger,
    pagedQuery,
} from './test-helpers';

type Fixture = {
    close: () => Promise<void>;
    store: PostgresDocumentStore;
};

function pgError(message: string, code?: string): Error {
    return Object.assign(new Error(message), code === undefined ? {} : { code });
}

/** `writeError` is thrown by every document INSERT or UPDATE. */
function createFixture(writeError?: Error): Fixture {
    const pgAdapter = newDb().adapters.createPg();
    const pool = new pgAdapter.Pool();

    if (writeError) {
        const query = pool.query.bind(pool);

        pool.query = async (sql: string, values?: unknown[]) => {
            if (/^\s*(INSERT INTO|UPDATE) "search"\."documents"/u.test(sql)) {
                throw writeError;
            }

            return query(sql, values);
        };
    }
    const store = new PostgresDocumentStore('postgres://unused', {
        pool,
        schemaName: 'search',
    });

    return {
        close: async () => {
            await store.close();
            await pool.end();
        },
        store,
    };
}

describe('PostgresDocumentStore (pg-mem)', () => {
    it('creates, checks and deletes indices', async () => {
        const fixture = createFixture();

        try {
            assert.equal(await fixture.store.indexExists('people'), false);

            await fixture.store.createIndex('people');
            await fixture.store.createIndex('people');

            assert.equal(await fixture.store.indexExists('people'), true);

            await fixture.store.deleteIndex('people');

            assert.equal(await fixture.store.indexExists('people'), false);
        } finally {
            await fixture.close();
        }
    });

    it('inserts new documents and merges fields into existing ones', async () => {
        const fixture = createFixture();

        try {
            await fixture.store.createIndex('people');

            const first = await fixture.store.mergeDocuments('people', [
                { fields: { id: 'p-1', name: 'Ada', status: 'active' }, id: 'p-1' },
            ]);
            const second = await fixture.store.mergeDocuments('people', [
                { fields: { id: 'p-1', status: 'archived' }, id: 'p-1' },
                { fields: { id: 'p-2', tags: ['x'] }, id: 'p-2' },
            ]);

            assert.deepEqual(first, [{ id: 'p-1', ok: true }]);
            assert.deepEqual(second, [
                { id: 'p-1', ok: true },
                { id: 'p-2', ok: true },
            ]);
            assert.deepEqual(await fixture.store.getDocument('people', 'p-1'), {
                id: 'p-1',
                name: 'Ada',
                status: 'archived',
            });
            assert.deepEqual(await fixture.store.getDocument('people', 'p-2'), {
                id: 'p-2',
                tags: ['x'],
            });
        } finally {
            await fixture.close();
        }
    });

    it('replaces nested object fields instead of merging into them', async () => {
        const fixture = createFixture();

        try {
            await fixture.store.createIndex('people');
            await fixture.store.mergeDocuments('people', [{
                fields: { id: 'p-1', person: { email: 'x', name: 'A' }, team: 'core' },
                id: 'p-1',
            }]);
            await fixture.store.mergeDocuments('people', [
                { fields: { id: 'p-1', person: { name: 'B' } }, id: 'p-1' },
            ]);

            assert.deepEqual(await fixture.store.getDocument('people', 'p-1'), {
                id: 'p-1',
                person: { name: 'B' },
                team: 'core',
            });
        } finally {
            await fixture.close();
        }
    });

    it('fails every document written to a missing index', async () => {
        const fixture = createFixture();

        try {
            const results = await fixture.store.mergeDocuments('ghost', [
                { fields: { id: 'p-1' }, id: 'p-1' },
            ]);

            assert.deepEqual(results, [{
                error: 'no such index [ghost]',
                id: 'p-1',
                ok: false,
            }]);
        } finally {
            await fixture.close();
        }
    });

    it('fails the batch with ConnectionError when the connection drops mid-write', async () => {
        const fixture = createFixture(
            pgError('terminating connection due to administrator command', '08006'),
        );

        try {
            await fixture.store.createIndex('people');

            await assert.rejects(
                fixture.store.mergeDocuments('people', [
                    { fields: { id: 'p-1' }, id: 'p-1' },
                    { fields: { id: 'p-2' }, id: 'p-2' },
                ]),
                (error: unknown) => {
                    assert.ok(error instanceof ConnectionError);
                    assert.equal(
                        error.message,
                        'Postgres document store write failed: '
                        + 'terminating connection due to administrator command',
                    );
                    return true;
                },
            );
        } finally {
            await fixture.close();
        }
    });

    it('keeps other write errors per document', async () => {
        const fixture = createFixture(
            pgError('value too long for type character varying(8)', '22001'),
        );

        try {
            await fixture.store.createIndex('people');

            const results = await fixture.store.mergeDocuments('people', [
                { fields: { id: 'p-1' }, id: 'p-1' },
            ]);

            assert.deepEqual(results, [{
                error: 'value too long for type character varying(8)',
                id: 'p-1',
                ok: false,
            }]);
        } finally {
            await fixture.close();
        }
    });

    it('drops documents together with their index', async () => {
        const fixture = createFixture();

        try {
            await fixture.store.createIndex('people');
            await fixture.store.mergeDocuments('people', [
                { fields: { id: 'stale' }, id: 'stale' },
            ]);
            await fixture.store.deleteIndex('people');
            await fixture.store.createIndex('people');

            assert.equal(await fixture.store.getDocument('people', 'stale'), null);
        } finally {
            await fixture.close();
        }
    });

    it('backs a full sync run', async () => {
        const fixture = createFixture();
        const initial = pagedQuery('MATCH (p:Person) RETURN p.id AS id, p.status AS status');
        const update = pagedQuery(
            'MATCH (p:Person)-[:LEFT]->() RETURN p.id AS id, "archived" AS status',
            { name: 'archive' },
        );
        const transport = new InMemoryGraphQueryTransport({
            [initial.text]: [
                { id: 'p-1', status: 'active' },
                { id: 'p-2', status: 'active' },
            ],
            [update.text]: [{ id: 'p-2', status: 'archived' }],
        });

        try {
            const report = await new GraphIndexSyncService(transport, fixture.store, {
                allowIndexCreation: true,
                clearExistingIndices: true,
                logger: createRecordingLogger(),
            }).run([buildIndexSpec({
                initialQuery: initial,
                updateQueries: [update],
            })]);

            assert.equal(report.ok, true);
            assert.deepEqual(await fixture.store.getDocument('people', 'p-2'), {
                id: 'p-2',
                status: 'archived',
            });
        } finally {
            await fixture.close();
        }
    });

    it('rejects unsafe schema names', () => {
        assert.throws(
            () => new PostgresDocumentStore('postgres://unused', {
                pool: new (newDb().adapters.createPg().Pool)(),
                schemaName: 'bad-name;drop',
            }),
            /document store schema name must use \[A-Za-z_\]\[A-Za-z0-9_\]\* identifier format/,
        );
    });
});

describe('isConnectionFailure', () => {
    it('recognizes connection exceptions, socket errors and closed sockets', () => {
        assert.equal(isConnectionFailure(pgError('lost', '08006')), true);
        assert.equal(isConnectionFailure(pgError('shutdown', '57P01')), true);
        assert.equal(isConnectionFailure(pgError('reset', 'ECONNRESET')), true);
        assert.equal(
            isConnectionFailure(pgError('Connection terminated unexpectedly')),
            true,
        );
    });

    it('leaves data and constraint errors to the document', () => {
        assert.equal(isConnectionFailure(pgError('duplicate key', '23505')), false);
        assert.equal(isConnectionFailure(pgError('bad json', '22P02')), false);
        assert.equal(isConnectionFailure('Connection terminated'), false);
    });
});
