import type {
    DocumentFields,
    DocumentWriteResult,
    SyncDocument,
} from './types';

/**
 * Target of the sync. `mergeDocuments` inserts documents whose id is new and
 * otherwise overwrites only the fields the incoming document carries.
 */
export interface DocumentStore {
    close(): Promise<void>;
    createIndex(indexName: string): Promise<void>;
    deleteIndex(indexName: string): Promise<void>;
    indexExists(indexName: string): Promise<boolean>;
    mergeDocuments(
        indexName: string,
        documents: SyncDocument[],
    ): Promise<DocumentWriteResult[]>;
}

export function mergeDocumentFields(
    existing: DocumentFields | null,
    incoming: DocumentFields,
): DocumentFields {
    if (existing === null) {
        return { ...incoming };
    }

    return {
        ...existing,
        ...incoming,
    };
}

function cloneFields(fields: DocumentFields): DocumentFields {
    return structuredClone(fields);
}

export type InMemoryDocumentStoreOptions = {
    /** Returns an error message to fail a single document write. */
    rejectDocument?: (
        indexName: string,
        document: SyncDocument,
    ) => string | null;
};

export class InMemoryDocumentStore implements DocumentStore {
    readonly mergeCalls: Array<{
        documentIds: string[];
        indexName: string;
    }> = [];

    private readonly indices = new Map<string, Map<string, DocumentFields>>();

    private closed = false;

    constructor(
        private readonly options: InMemoryDocumentStoreOptions = {},
    ) {}

    seedIndex(
        indexName: string,
        documents: SyncDocument[] = [],
    ): void {
        const index = new Map<string, DocumentFields>();

        for (const document of documents) {
            index.set(document.id, cloneFields(document.fields));
        }

        this.indices.set(indexName, index);
    }

    getDocument(
        indexName: string,
        id: string,
    ): DocumentFields | null {
        const fields = this.indices.get(indexName)?.get(id);

        return fields ? cloneFields(fields) : null;
    }

    listDocumentIds(indexName: string): string[] {
        return [...(this.indices.get(indexName)?.keys() ?? [])];
    }

    isClosed(): boolean {
        return this.closed;
    }

    async indexExists(indexName: string): Promise<boolean> {
        return this.indices.has(indexName);
    }

    async createIndex(indexName: string): Promise<void> {
        if (!this.indices.has(indexName)) {
            this.indices.set(indexName, new Map());
        }
    }

    async deleteIndex(indexName: string): Promise<void> {
        this.indices.delete(indexName);
    }

    async mergeDocuments(
        indexName: string,
        documents: SyncDocument[],
    ): Promise<DocumentWriteResult[]> {
        this.mergeCalls.push({
            documentIds: documents.map((document) => document.id),
            indexName,
        });

        const index = this.indices.get(indexName);

        return documents.map((document): DocumentWriteResult => {
            if (!index) {
                return {
                    error: `no such index [${indexName}]`,
                    id: document.id,
                    ok: false,
                };
            }

            const rejection = this.options.rejectDocument?.(
                indexName,
                document,
            ) ?? null;

            if (rejection !== null) {
                return {
                    error: rejection,
                    id: document.id,
                    ok: false,
                };
            }

            index.set(
                document.id,
                mergeDocumentFields(
                    index.get(document.id) ?? null,
                    cloneFields(document.fields),
                ),
            );

            return {
                id: document.id,
                ok: true,
            };
        });
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}
