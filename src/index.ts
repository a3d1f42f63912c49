#!/usr/bin/env node
import {
    EXIT_INTERRUPTED,
    runCli,
} from './cli';

export { runCli } from './cli';
export {
    parseConfigFileLayer,
    resolveSyncConfig,
    type SyncConfig,
} from './config';
export {
    InMemoryDocumentStore,
    type DocumentStore,
} from './document-store';
export * from './errors';
export {
    InMemoryGraphQueryTransport,
    type GraphQueryTransport,
} from './graph-source';
export { parseIndexSpecs } from './index-spec';
export {
    streamQueryPages,
    streamQueryRows,
} from './paginated-executor';
export { classifyQuery } from './query-classifier';
export {
    createRuntime,
    runSync,
} from './runtime';
export {
    exitCodeForReport,
    GraphIndexSyncService,
} from './sync.service';
export type * from './types';

async function main(): Promise<void> {
    const onSignal = (signal: NodeJS.Signals): void => {
        console.error('graph-index-sync interrupted', {
            signal,
        });
        process.exit(EXIT_INTERRUPTED);
    };

    process.once('SIGINT', onSignal);

    const exitCode = await runCli(process.argv.slice(2));

    process.removeListener('SIGINT', onSignal);
    process.exitCode = exitCode;
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('graph-index-sync failed', error);
        process.exitCode = 1;
    });
}
