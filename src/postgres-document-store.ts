import { Pool, type PoolConfig } from 'pg';
import { DEFAULT_PG_SCHEMA } from './constants';
import {
    mergeDocumentFields,
    type DocumentStore,
} from './document-store';
import { ConnectionError } from './errors';
import type {
    DocumentFields,
    DocumentValue,
    DocumentWriteResult,
    SyncDocument,
} from './types';

export type PostgresDocumentStoreOptions = {
    pool?: Pool;
    poolConfig?: Omit<PoolConfig, 'connectionString'>;
    schemaName?: string;
};

type DocumentRow = {
    fields: unknown;
};

function validateSqlIdentifier(
    value: string,
    field: string,
): string {
    const trimmed = String(value || '').trim();

    if (!trimmed) {
        throw new Error(`${field} must not be empty`);
    }

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(trimmed)) {
        throw new Error(
            `${field} must use [A-Za-z_][A-Za-z0-9_]* identifier format`,
        );
    }

    return trimmed;
}

function isDocumentValue(value: unknown): value is DocumentValue {
    if (
        value === null
        || typeof value === 'string'
        || typeof value === 'number'
        || typeof value === 'boolean'
    ) {
        return true;
    }

    if (Array.isArray(value)) {
        return value.every(isDocumentValue);
    }

    if (typeof value === 'object') {
        return Object.values(value).every(isDocumentValue);
    }

    return false;
}

function readStoredFields(value: unknown): DocumentFields {
    const parsed: unknown = typeof value === 'string'
        ? JSON.parse(value)
        : value;

    if (
        parsed === null
        || typeof parsed !== 'object'
        || Array.isArray(parsed)
    ) {
        throw new Error('stored document fields must be a JSON object');
    }

    const fields: DocumentFields = {};

    for (const [key, entry] of Object.entries(parsed)) {
        if (!isDocumentValue(entry)) {
            throw new Error(`stored document field ${key} is not JSON`);
        }

        fields[key] = entry;
    }

    return fields;
}

function describeCause(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

const SOCKET_ERROR_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'EPIPE',
    'ETIMEDOUT',
]);

function readErrorCode(error: unknown): string | undefined {
    if (
        typeof error === 'object'
        && error !== null
        && 'code' in error
        && typeof error.code === 'string'
    ) {
        return error.code;
    }

    return undefined;
}

/**
 * SQLSTATE class 08 (connection exception), 57P0x (server shutting down),
 * socket errors, and the message pg raises when the server closes the socket.
 */
export function isConnectionFailure(error: unknown): boolean {
    const code = readErrorCode(error);

    if (code !== undefined) {
        return code.startsWith('08')
            || code.startsWith('57P0')
            || SOCKET_ERROR_CODES.has(code);
    }

    return error instanceof Error && /^Connection terminated/u.test(error.message);
}

/**
 * Keeps every index as rows of one JSONB table keyed by index name and
 * document id, with a registry table recording which indices exist.
 */
export class PostgresDocumentStore implements DocumentStore {
    private readonly ownsPool: boolean;

    private readonly pool: Pool;

    private readonly ready: Promise<void>;

    private readonly schemaName: string;

    private readonly indicesTableQualified: string;

    private readonly documentsTableQualified: string;

    constructor(
        pgUrl: string,
        options: PostgresDocumentStoreOptions = {},
    ) {
        const connectionString = String(pgUrl || '').trim();

        if (!connectionString && !options.pool) {
            throw new Error('postgres document store requires a connection url');
        }

        this.schemaName = validateSqlIdentifier(
            options.schemaName || DEFAULT_PG_SCHEMA,
            'document store schema name',
        );
        this.indicesTableQualified = `"${this.schemaName}"."indices"`;
        this.documentsTableQualified = `"${this.schemaName}"."documents"`;

        if (options.pool) {
            this.pool = options.pool;
            this.ownsPool = false;
        } else {
            this.pool = new Pool({
                allowExitOnIdle: true,
                connectionString,
                idleTimeoutMillis: options.poolConfig?.idleTimeoutMillis ?? 30000,
                max: options.poolConfig?.max ?? 10,
                ...options.poolConfig,
            });
            this.ownsPool = true;
        }

        this.ready = this.initialize();
        // surfaced by the first operation through ensureReady()
        this.ready.catch(() => undefined);
    }

    async close(): Promise<void> {
        if (!this.ownsPool) {
            return;
        }

        await this.pool.end();
    }

    async indexExists(indexName: string): Promise<boolean> {
        await this.ensureReady();

        const result = await this.query<{ index_name: string }>(
            `SELECT index_name FROM ${this.indicesTableQualified}
            WHERE index_name = $1`,
            [indexName],
        );

        return result.rows.length > 0;
    }

    async createIndex(indexName: string): Promise<void> {
        if (await this.indexExists(indexName)) {
            return;
        }

        await this.query(
            `INSERT INTO ${this.indicesTableQualified} (index_name, created_at)
            VALUES ($1, $2::timestamptz)`,
            [indexName, new Date().toISOString()],
        );
    }

    async deleteIndex(indexName: string): Promise<void> {
        await this.ensureReady();
        await this.query(
            `DELETE FROM ${this.documentsTableQualified} WHERE index_name = $1`,
            [indexName],
        );
        await this.query(
            `DELETE FROM ${this.indicesTableQualified} WHERE index_name = $1`,
            [indexName],
        );
    }

    async getDocument(
        indexName: string,
        id: string,
    ): Promise<DocumentFields | null> {
        await this.ensureReady();

        const result = await this.query<DocumentRow>(
            `SELECT fields FROM ${this.documentsTableQualified}
            WHERE index_name = $1 AND doc_id = $2`,
            [indexName, id],
        );
        const row = result.rows[0];

        return row ? readStoredFields(row.fields) : null;
    }

    /**
     * Reads each stored document, merges the incoming fields over it and
     * writes it back. A failing document does not stop the rest; a lost
     * connection fails the whole batch with ConnectionError.
     */
    async mergeDocuments(
        indexName: string,
        documents: SyncDocument[],
    ): Promise<DocumentWriteResult[]> {
        if (!await this.indexExists(indexName)) {
            return documents.map((document) => ({
                error: `no such index [${indexName}]`,
                id: document.id,
                ok: false,
            }));
        }

        const results: DocumentWriteResult[] = [];

        for (const document of documents) {
            try {
                await this.mergeDocument(indexName, document);
                results.push({
                    id: document.id,
                    ok: true,
                });
            } catch (error: unknown) {
                if (error instanceof ConnectionError) {
                    throw error;
                }

                if (isConnectionFailure(error)) {
                    throw new ConnectionError(
                        `Postgres document store write failed: ${describeCause(error)}`,
                        { cause: error },
                    );
                }

                results.push({
                    error: describeCause(error),
                    id: document.id,
                    ok: false,
                });
            }
        }

        return results;
    }

    private async mergeDocument(
        indexName: string,
        document: SyncDocument,
    ): Promise<void> {
        const existing = await this.getDocument(indexName, document.id);
        const merged = JSON.stringify(
            mergeDocumentFields(existing, document.fields),
        );
        const updatedAt = new Date().toISOString();

        if (existing === null) {
            await this.pool.query(
                `INSERT INTO ${this.documentsTableQualified}
                (index_name, doc_id, fields, updated_at)
                VALUES ($1, $2, $3::jsonb, $4::timestamptz)`,
                [indexName, document.id, merged, updatedAt],
            );
            return;
        }

        await this.pool.query(
            `UPDATE ${this.documentsTableQualified}
            SET fields = $3::jsonb, updated_at = $4::timestamptz
            WHERE index_name = $1 AND doc_id = $2`,
            [indexName, document.id, merged, updatedAt],
        );
    }

    private async query<Row extends object = Record<string, unknown>>(
        sql: string,
        values: unknown[],
    ): Promise<{ rows: Row[] }> {
        try {
            const result = await this.pool.query<Row & Record<string, unknown>>(
                sql,
                values,
            );

            return {
                rows: result.rows,
            };
        } catch (error: unknown) {
            throw new ConnectionError(
                `Postgres document store query failed: ${describeCause(error)}`,
                { cause: error },
            );
        }
    }

    private async ensureReady(): Promise<void> {
        try {
            await this.ready;
        } catch (error: unknown) {
            throw new ConnectionError(
                `Postgres document store could not initialize: `
                + describeCause(error),
                { cause: error },
            );
        }
    }

    private async initialize(): Promise<void> {
        await this.pool.query(`CREATE SCHEMA IF NOT EXISTS "${this.schemaName}"`);
        await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.indicesTableQualified} (
    index_name TEXT PRIMARY KEY,
    created_at TIMESTAMPTZ NOT NULL
)`);
        await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.documentsTableQualified} (
    index_name TEXT NOT NULL,
    doc_id TEXT NOT NULL,
    fields JSONB NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL,
    PRIMARY KEY (index_name, doc_id)
)`);
    }
}
