import type { DocumentStore } from './document-store';
import {
    ConnectionError,
    IndexLifecycleError,
} from './errors';
import type { SyncLogger } from './logger';

export type IndexLifecycleOptions = {
    allowCreation: boolean;
    clearExisting: boolean;
};

export type IndexLifecycleOutcome = {
    created: boolean;
    deleted: boolean;
};

export async function ensureIndex(
    store: DocumentStore,
    indexName: string,
    options: IndexLifecycleOptions,
    logger: SyncLogger,
): Promise<IndexLifecycleOutcome> {
    const outcome: IndexLifecycleOutcome = {
        created: false,
        deleted: false,
    };

    try {
        let exists = await store.indexExists(indexName);

        if (options.clearExisting) {
            if (exists) {
                await store.deleteIndex(indexName);
                outcome.deleted = true;
                exists = false;
                logger.info('index deleted', {
                    index_name: indexName,
                });
            } else {
                logger.info('index absent, nothing to delete', {
                    index_name: indexName,
                });
            }
        }

        if (exists) {
            return outcome;
        }

        if (!options.allowCreation) {
            throw new IndexLifecycleError(
                `Index '${indexName}' is missing and index creation is disallowed`,
                indexName,
            );
        }

        await store.createIndex(indexName);
        outcome.created = true;
        logger.info('index created', {
            index_name: indexName,
        });

        return outcome;
    } catch (error: unknown) {
        if (
            error instanceof IndexLifecycleError
            || error instanceof ConnectionError
        ) {
            throw error;
        }

        throw new IndexLifecycleError(
            `Index '${indexName}' could not be prepared: `
            + (error instanceof Error ? error.message : String(error)),
            indexName,
            { cause: error },
        );
    }
}
