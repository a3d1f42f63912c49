import { Client, type ClientOptions } from '@opensearch-project/opensearch';
import { z } from 'zod';
import type { DocumentStore } from './document-store';
import { ConnectionError } from './errors';
import type {
    DocumentWriteResult,
    SyncDocument,
} from './types';

/**
 * The slice of the OpenSearch client the store talks to; response bodies stay
 * `unknown` until parsed.
 */
export interface OpenSearchApi {
    bulk(operations: Array<Record<string, unknown>>): Promise<unknown>;
    close(): Promise<void>;
    createIndex(indexName: string): Promise<void>;
    deleteIndex(indexName: string): Promise<void>;
    indexExists(indexName: string): Promise<unknown>;
}

export type OpenSearchStoreConfig = {
    node: string;
    password?: string;
    username?: string;
    verifyCerts: boolean;
};

export const MERGE_FIELDS_SCRIPT = 'ctx._source.putAll(params.fields)';

const BulkItemSchema = z.object({
    _id: z.union([z.string(), z.number()]).optional(),
    error: z.unknown().optional(),
    status: z.number(),
});

const BulkResponseSchema = z.object({
    errors: z.boolean(),
    items: z.array(z.record(BulkItemSchema)),
});

function describeBulkError(error: unknown): string {
    const parsed = z.object({
        reason: z.string().optional(),
        type: z.string().optional(),
    }).safeParse(error);

    if (parsed.success && (parsed.data.type || parsed.data.reason)) {
        return [parsed.data.type, parsed.data.reason]
            .filter((part) => part !== undefined)
            .join(': ');
    }

    return JSON.stringify(error);
}

function describeCause(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class OpenSearchDocumentStore implements DocumentStore {
    constructor(private readonly api: OpenSearchApi) {}

    async indexExists(indexName: string): Promise<boolean> {
        const body = await this.call(
            `check index ${indexName}`,
            () => this.api.indexExists(indexName),
        );

        const parsed = z.boolean().safeParse(body);

        if (!parsed.success) {
            throw new ConnectionError(
                `Unexpected index check response from OpenSearch for ${indexName}`,
            );
        }

        return parsed.data;
    }

    async createIndex(indexName: string): Promise<void> {
        // no explicit mappings: field types come from the first write
        await this.call(
            `create index ${indexName}`,
            () => this.api.createIndex(indexName),
        );
    }

    async deleteIndex(indexName: string): Promise<void> {
        if (!await this.indexExists(indexName)) {
            return;
        }

        await this.call(
            `delete index ${indexName}`,
            () => this.api.deleteIndex(indexName),
        );
    }

    /**
     * One bulk request per batch. Each update replaces the given top-level
     * fields of an existing document through `putAll`, so a nested object is
     * overwritten whole rather than merged; `upsert` inserts new ids.
     */
    async mergeDocuments(
        indexName: string,
        documents: SyncDocument[],
    ): Promise<DocumentWriteResult[]> {
        if (documents.length === 0) {
            return [];
        }

        const operations: Array<Record<string, unknown>> = [];

        for (const document of documents) {
            operations.push({
                update: {
                    _id: document.id,
                    _index: indexName,
                },
            });
            operations.push({
                script: {
                    lang: 'painless',
                    params: { fields: document.fields },
                    source: MERGE_FIELDS_SCRIPT,
                },
                upsert: document.fields,
            });
        }

        const body = await this.call(
            `bulk merge into ${indexName}`,
            () => this.api.bulk(operations),
        );
        const parsed = BulkResponseSchema.safeParse(body);

        if (!parsed.success) {
            throw new ConnectionError(
                `Unexpected bulk response from OpenSearch for ${indexName}`,
            );
        }

        return documents.map((document, position): DocumentWriteResult => {
            const entry = parsed.data.items[position];
            const item = entry?.update ?? entry?.index;

            if (!item) {
                return {
                    error: 'missing bulk item result',
                    id: document.id,
                    ok: false,
                };
            }

            if (item.error !== undefined || item.status >= 300) {
                return {
                    error: item.error !== undefined
                        ? describeBulkError(item.error)
                        : `status ${item.status}`,
                    id: document.id,
                    ok: false,
                };
            }

            return {
                id: document.id,
                ok: true,
            };
        });
    }

    async close(): Promise<void> {
        await this.api.close();
    }

    private async call<T>(
        operation: string,
        run: () => Promise<T>,
    ): Promise<T> {
        try {
            return await run();
        } catch (error: unknown) {
            throw new ConnectionError(
                `OpenSearch ${operation} failed: ${describeCause(error)}`,
                { cause: error },
            );
        }
    }
}

export function createOpenSearchDocumentStore(
    config: OpenSearchStoreConfig,
): OpenSearchDocumentStore {
    const clientOptions: ClientOptions = {
        node: config.node,
        ssl: {
            rejectUnauthorized: config.verifyCerts,
        },
    };

    if (config.username && config.password) {
        clientOptions.auth = {
            password: config.password,
            username: config.username,
        };
    }

    const client = new Client(clientOptions);

    return new OpenSearchDocumentStore({
        bulk: async (operations) => {
            const response = await client.bulk({
                body: operations,
                refresh: true,
            });

            return response.body;
        },
        close: async () => {
            await client.close();
        },
        createIndex: async (indexName) => {
            await client.indices.create({ index: indexName });
        },
        deleteIndex: async (indexName) => {
            await client.indices.delete({ index: indexName });
        },
        indexExists: async (indexName) => {
            const response = await client.indices.exists({ index: indexName });

            return response.body;
        },
    });
}
