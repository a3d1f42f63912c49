export type DocumentValue =
    | string
    | number
    | boolean
    | null
    | DocumentValue[]
    | { [key: string]: DocumentValue };

export type DocumentFields = Record<string, DocumentValue>;

export type QueryVariables = Record<string, DocumentValue>;

export type QuerySpec = {
    name: string;
    pageSize?: number;
    text: string;
    variables: QueryVariables;
};

export type IndexSpec = {
    idField: string;
    indexName: string;
    initialQuery: QuerySpec;
    updateQueries: QuerySpec[];
};

/**
 * One row as returned by the graph database, keyed by column name in
 * return order.
 */
export type ResultRow = DocumentFields;

export type SyncDocument = {
    fields: DocumentFields;
    id: string;
};

export type DocumentWriteResult =
    | {
        id: string;
        ok: true;
    }
    | {
        error: string;
        id: string;
        ok: false;
    };

export type UpsertBatchResult = {
    failed: number;
    succeeded: number;
};

export type IndexSyncState =
    | 'validating'
    | 'loading'
    | 'updating'
    | 'done'
    | 'failed';

export type QueryKind =
    | 'initial'
    | 'update';

export type QueryRunReport = {
    failed: number;
    kind: QueryKind;
    pages: number;
    queryName: string;
    rowsRead: number;
    rowsSkipped: number;
    upserted: number;
};

export type IndexRunReport = {
    failedDuring: IndexSyncState | null;
    finishedAt: string;
    indexName: string;
    queries: QueryRunReport[];
    reason: string | null;
    startedAt: string;
    state: 'done' | 'failed';
};

export type RunReport = {
    indices: IndexRunReport[];
    ok: boolean;
};
