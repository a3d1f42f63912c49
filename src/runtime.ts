import {
    describeConfig,
    type SyncConfig,
} from './config';
import type { DocumentStore } from './document-store';
import {
    createBoltGraphQueryTransport,
    type GraphQueryTransport,
} from './graph-source';
import {
    loadIndexSpecFile,
    selectIndexSpecs,
} from './index-spec';
import {
    createConsoleLogger,
    type SyncLogger,
} from './logger';
import { createOpenSearchDocumentStore } from './opensearch-document-store';
import { PostgresDocumentStore } from './postgres-document-store';
import { GraphIndexSyncService } from './sync.service';
import type {
    IndexSpec,
    RunReport,
} from './types';

export type RuntimeDependencyOverrides = {
    createDocumentStore?: (config: SyncConfig) => DocumentStore;
    createGraphTransport?: (config: SyncConfig) => GraphQueryTransport;
    loadIndexSpecs?: (path: string) => IndexSpec[];
    logger?: SyncLogger;
};

export type RuntimeBootstrap = {
    close: () => Promise<void>;
    service: GraphIndexSyncService;
    specs: IndexSpec[];
};

function createDefaultDocumentStore(config: SyncConfig): DocumentStore {
    if (config.documentStore === 'postgres') {
        return new PostgresDocumentStore(config.postgres.url ?? '', {
            schemaName: config.postgres.schema,
        });
    }

    return createOpenSearchDocumentStore(config.opensearch);
}

/**
 * Index specs are loaded and selected before any connection is opened.
 */
export function createRuntime(
    config: SyncConfig,
    dependencies: RuntimeDependencyOverrides = {},
): RuntimeBootstrap {
    const logger = dependencies.logger
        ?? createConsoleLogger({ verbose: config.verbose });
    const loadSpecs = dependencies.loadIndexSpecs ?? loadIndexSpecFile;
    const specs = selectIndexSpecs(
        loadSpecs(config.indexSpecFile),
        config.selectedIndices,
    );
    const createTransport = dependencies.createGraphTransport
        || ((input: SyncConfig) => {
            return createBoltGraphQueryTransport(input.graph);
        });
    const createStore = dependencies.createDocumentStore
        || createDefaultDocumentStore;
    const transport = createTransport(config);
    const store = createStore(config);
    const service = new GraphIndexSyncService(transport, store, {
        allowIndexCreation: config.allowIndexCreation,
        clearExistingIndices: config.clearExistingIndices,
        defaultPageSize: config.defaultPageSize,
        logger,
        readOnlyProcedures: config.readOnlyProcedures,
        testMode: config.testMode,
    });

    return {
        close: async () => {
            const results = await Promise.allSettled([
                transport.close(),
                store.close(),
            ]);

            for (const result of results) {
                if (result.status === 'rejected') {
                    logger.warn('connection close failed', {
                        error: result.reason instanceof Error
                            ? result.reason.message
                            : String(result.reason),
                    });
                }
            }
        },
        service,
        specs,
    };
}

export async function runSync(
    config: SyncConfig,
    dependencies: RuntimeDependencyOverrides = {},
): Promise<RunReport> {
    const logger = dependencies.logger
        ?? createConsoleLogger({ verbose: config.verbose });

    logger.info('graph-index-sync configuration', describeConfig(config));

    const runtime = createRuntime(config, {
        ...dependencies,
        logger,
    });

    try {
        return await runtime.service.run(runtime.specs);
    } finally {
        await runtime.close();
    }
}
