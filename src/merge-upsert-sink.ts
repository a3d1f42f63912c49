import type { DocumentStore } from './document-store';
import { mergeDocumentFields } from './document-store';
import { UpsertError } from './errors';
import type { SyncLogger } from './logger';
import type {
    SyncDocument,
    UpsertBatchResult,
} from './types';

/**
 * Folds documents sharing an id into one, later fields winning, so a page
 * reaches the store as one write per identity in first-seen order.
 */
export function collapseDocuments(
    documents: SyncDocument[],
): SyncDocument[] {
    const byId = new Map<string, SyncDocument>();

    for (const document of documents) {
        const existing = byId.get(document.id);

        byId.set(document.id, {
            fields: mergeDocumentFields(
                existing?.fields ?? null,
                document.fields,
            ),
            id: document.id,
        });
    }

    return [...byId.values()];
}

export class MergeUpsertSink {
    constructor(
        private readonly store: DocumentStore,
        private readonly logger: SyncLogger,
    ) {}

    async upsertBatch(
        indexName: string,
        documents: SyncDocument[],
    ): Promise<UpsertBatchResult> {
        const batch = collapseDocuments(documents);

        if (batch.length === 0) {
            return {
                failed: 0,
                succeeded: 0,
            };
        }

        const results = await this.store.mergeDocuments(indexName, batch);
        const summary: UpsertBatchResult = {
            failed: 0,
            succeeded: 0,
        };

        for (const result of results) {
            if (result.ok) {
                summary.succeeded += 1;
                continue;
            }

            const error = new UpsertError(
                `Document '${result.id}' failed to write: ${result.error}`,
                result.id,
            );

            summary.failed += 1;
            this.logger.warn('document upsert failed', {
                document_id: error.documentId,
                error: error.message,
                index_name: indexName,
            });
        }

        const unreported = batch.length - results.length;

        if (unreported > 0) {
            summary.failed += unreported;
            this.logger.warn('document store omitted write results', {
                index_name: indexName,
                missing: unreported,
            });
        }

        this.logger.debug('document batch upserted', {
            failed: summary.failed,
            index_name: indexName,
            succeeded: summary.succeeded,
        });

        return summary;
    }
}
