import { INITIAL_QUERY_NAME } from './constants';
import type { DocumentStore } from './document-store';
import {
    RowProjectionError,
    describeError,
} from './errors';
import type { GraphQueryTransport } from './graph-source';
import { ensureIndex } from './index-lifecycle';
import { assertValidIndexSpecs } from './index-spec';
import {
    createConsoleLogger,
    type SyncLogger,
} from './logger';
import { MergeUpsertSink } from './merge-upsert-sink';
import {
    resolvePageSize,
    streamQueryPages,
} from './paginated-executor';
import { projectRow } from './projector';
import { assertReadOnlyQuery } from './query-classifier';
import type {
    IndexRunReport,
    IndexSpec,
    IndexSyncState,
    QueryKind,
    QueryRunReport,
    QuerySpec,
    RunReport,
    SyncDocument,
} from './types';

export type GraphIndexSyncOptions = {
    allowIndexCreation: boolean;
    clearExistingIndices: boolean;
    defaultPageSize?: number;
    logger?: SyncLogger;
    onStateChange?: (indexName: string, state: IndexSyncState) => void;
    /** Procedures, besides the built-in read-only list, a query may CALL. */
    readOnlyProcedures?: string[];
    /** Fetch only the first page of every query. */
    testMode?: boolean;
    timeProvider?: () => string;
};

function nowIso(): string {
    return new Date().toISOString();
}

export function exitCodeForReport(report: RunReport): number {
    return report.ok ? 0 : 1;
}

export class GraphIndexSyncService {
    private readonly logger: SyncLogger;

    private readonly sink: MergeUpsertSink;

    private readonly timeProvider: () => string;

    constructor(
        private readonly transport: GraphQueryTransport,
        private readonly store: DocumentStore,
        private readonly options: GraphIndexSyncOptions,
    ) {
        this.logger = options.logger ?? createConsoleLogger();
        this.sink = new MergeUpsertSink(store, this.logger);
        this.timeProvider = options.timeProvider ?? nowIso;
    }

    /**
     * Syncs every index in declaration order. Invalid index specs throw before
     * any index is touched; failures inside one index only fail that index.
     */
    async run(specs: IndexSpec[]): Promise<RunReport> {
        assertValidIndexSpecs(specs);

        this.logger.info('sync run started', {
            indices: specs.length,
            test_mode: this.options.testMode ?? false,
        });

        const indices: IndexRunReport[] = [];

        for (const spec of specs) {
            indices.push(await this.syncIndex(spec));
        }

        const report: RunReport = {
            indices,
            ok: indices.every((index) => index.state === 'done'),
        };

        this.logger.info('sync run finished', {
            done: indices.filter((index) => index.state === 'done').length,
            failed: indices.filter((index) => index.state === 'failed').length,
        });

        return report;
    }

    async syncIndex(spec: IndexSpec): Promise<IndexRunReport> {
        const startedAt = this.timeProvider();
        const queries: QueryRunReport[] = [];
        let state: IndexSyncState = 'validating';
        const enter = (next: IndexSyncState): void => {
            state = next;
            this.options.onStateChange?.(spec.indexName, next);
        };

        enter('validating');
        this.logger.info('index sync started', {
            index_name: spec.indexName,
            update_queries: spec.updateQueries.length,
        });

        try {
            const allQueries = [spec.initialQuery, ...spec.updateQueries];

            for (const query of allQueries) {
                assertReadOnlyQuery(query, {
                    readOnlyProcedures: this.options.readOnlyProcedures,
                });
                resolvePageSize(query, this.options.defaultPageSize);
            }

            enter('loading');
            await ensureIndex(this.store, spec.indexName, {
                allowCreation: this.options.allowIndexCreation,
                clearExisting: this.options.clearExistingIndices,
            }, this.logger);
            await this.runQuery(spec, spec.initialQuery, 'initial', queries);

            enter('updating');

            for (const query of spec.updateQueries) {
                await this.runQuery(spec, query, 'update', queries);
            }

            enter('done');
            this.logger.info('index sync done', {
                index_name: spec.indexName,
                upserted: queries.reduce((sum, query) => sum + query.upserted, 0),
            });

            return {
                failedDuring: null,
                finishedAt: this.timeProvider(),
                indexName: spec.indexName,
                queries,
                reason: null,
                startedAt,
                state: 'done',
            };
        } catch (error: unknown) {
            const failedDuring = state;
            const reason = describeError(error);

            enter('failed');
            this.logger.error('index sync failed', {
                error: reason,
                failed_during: failedDuring,
                index_name: spec.indexName,
            });

            return {
                failedDuring,
                finishedAt: this.timeProvider(),
                indexName: spec.indexName,
                queries,
                reason,
                startedAt,
                state: 'failed',
            };
        }
    }

    private async runQuery(
        spec: IndexSpec,
        query: QuerySpec,
        kind: QueryKind,
        reports: QueryRunReport[],
    ): Promise<void> {
        const report: QueryRunReport = {
            failed: 0,
            kind,
            pages: 0,
            queryName: kind === 'initial' ? INITIAL_QUERY_NAME : query.name,
            rowsRead: 0,
            rowsSkipped: 0,
            upserted: 0,
        };

        reports.push(report);
        this.logger.info('query started', {
            index_name: spec.indexName,
            kind,
            query_name: report.queryName,
        });

        const pages = streamQueryPages(this.transport, query, {
            defaultPageSize: this.options.defaultPageSize,
            logger: this.logger,
            maxPages: this.options.testMode ? 1 : undefined,
        });

        for await (const page of pages) {
            const documents: SyncDocument[] = [];

            report.pages += 1;
            report.rowsRead += page.rows.length;

            for (const row of page.rows) {
                try {
                    documents.push(projectRow(row, spec.idField));
                } catch (error: unknown) {
                    if (!(error instanceof RowProjectionError)) {
                        throw error;
                    }

                    report.rowsSkipped += 1;
                    this.logger.warn('row skipped', {
                        error: error.message,
                        index_name: spec.indexName,
                        page: page.pageNumber,
                        query_name: report.queryName,
                    });
                }
            }

            const result = await this.sink.upsertBatch(
                spec.indexName,
                documents,
            );

            report.upserted += result.succeeded;
            report.failed += result.failed;
        }

        if (report.rowsRead === 0) {
            this.logger.warn('query returned no rows', {
                index_name: spec.indexName,
                query_name: report.queryName,
            });
        }

        this.logger.info('query completed', {
            failed: report.failed,
            index_name: spec.indexName,
            pages: report.pages,
            query_name: report.queryName,
            rows_read: report.rowsRead,
            rows_skipped: report.rowsSkipped,
            upserted: report.upserted,
        });
    }
}
