import { Command, InvalidArgumentError } from 'commander';
import {
    loadConfigFileLayer,
    resolveSyncConfig,
    splitList,
    type DocumentStoreMode,
    type SyncConfigLayer,
} from './config';
import { parseSyncEnv } from './env';
import { ConfigurationError } from './errors';
import {
    createConsoleLogger,
    type SyncLogger,
} from './logger';
import {
    runSync,
    type RuntimeDependencyOverrides,
} from './runtime';
import { exitCodeForReport } from './sync.service';

export const EXIT_INTERRUPTED = 130;

type CliOptions = {
    allowIndexCreation?: boolean;
    clearExistingIndices?: boolean;
    config?: string;
    documentStore?: DocumentStoreMode;
    graphPassword?: string;
    graphUri?: string;
    graphUsername?: string;
    indexSpecFile?: string;
    opensearchNode?: string;
    opensearchPassword?: string;
    opensearchUsername?: string;
    opensearchVerifyCerts?: boolean;
    pageSize?: number;
    pgSchema?: string;
    pgUrl?: string;
    readOnlyProcedures?: string[];
    selectedIndices?: string[];
    testMode?: boolean;
    verbose?: boolean;
};

export type CliInvocation = {
    configPath?: string;
    layer: SyncConfigLayer;
};

function parsePageSize(value: string): number {
    const parsed = Number(value);

    if (!Number.isSafeInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('must be a positive integer');
    }

    return parsed;
}

function parseStoreMode(value: string): DocumentStoreMode {
    if (value === 'opensearch' || value === 'postgres') {
        return value;
    }

    throw new InvalidArgumentError('must be one of opensearch|postgres');
}

function trimOption(value: string): string {
    return value.trim();
}

export function buildProgram(): Command {
    return new Command()
        .name('graph-index-sync')
        .description(
            'Load read-only graph query results into a document index, '
            + 'then merge update query results into it',
        )
        .option('--config <path>', 'configuration YAML file', trimOption)
        .option('--graph-uri <uri>', 'Bolt URI of the graph database', trimOption)
        .option('--graph-username <name>', 'graph database username', trimOption)
        .option('--graph-password <password>', 'graph database password', trimOption)
        .option(
            '--document-store <mode>',
            'document store: opensearch or postgres',
            parseStoreMode,
        )
        .option('--opensearch-node <url>', 'OpenSearch node URL', trimOption)
        .option('--opensearch-username <name>', 'OpenSearch username', trimOption)
        .option('--opensearch-password <password>', 'OpenSearch password', trimOption)
        .option('--opensearch-verify-certs', 'verify OpenSearch TLS certificates')
        .option('--no-opensearch-verify-certs', 'do not verify OpenSearch TLS certificates')
        .option('--pg-url <url>', 'Postgres connection URL', trimOption)
        .option('--pg-schema <schema>', 'Postgres schema for the document store', trimOption)
        .option('--index-spec-file <path>', 'index specification YAML file', trimOption)
        .option('--clear-existing-indices', 'delete target indices before loading')
        .option('--no-clear-existing-indices', 'keep existing target indices')
        .option('--allow-index-creation', 'create missing target indices')
        .option('--no-allow-index-creation', 'fail indices whose target is missing')
        .option(
            '--selected-indices <names>',
            'comma-separated index names to process',
            splitList,
        )
        .option(
            '--read-only-procedures <names>',
            'comma-separated procedures, besides the built-in list, queries may CALL',
            splitList,
        )
        .option('--test-mode', 'fetch only the first page of every query')
        .option('--page-size <n>', 'default page size for queries', parsePageSize)
        .option('-v, --verbose', 'enable debug logging')
        .exitOverride()
        .showHelpAfterError();
}

export function parseCliArgs(argv: string[]): CliInvocation {
    const program = buildProgram();

    program.parse(argv, { from: 'user' });

    const options = program.opts<CliOptions>();

    return {
        configPath: options.config,
        layer: {
            allowIndexCreation: options.allowIndexCreation,
            clearExistingIndices: options.clearExistingIndices,
            defaultPageSize: options.pageSize,
            documentStore: options.documentStore,
            graph: {
                password: options.graphPassword,
                uri: options.graphUri,
                username: options.graphUsername,
            },
            indexSpecFile: options.indexSpecFile,
            opensearch: {
                node: options.opensearchNode,
                password: options.opensearchPassword,
                username: options.opensearchUsername,
                verifyCerts: options.opensearchVerifyCerts,
            },
            postgres: {
                schema: options.pgSchema,
                url: options.pgUrl,
            },
            readOnlyProcedures: options.readOnlyProcedures,
            selectedIndices: options.selectedIndices,
            testMode: options.testMode,
            verbose: options.verbose,
        },
    };
}

export type CliDependencies = RuntimeDependencyOverrides & {
    env?: NodeJS.ProcessEnv;
};

/**
 * Resolves configuration (file, then environment, then arguments), runs the
 * sync and maps the outcome to a process exit code.
 */
export async function runCli(
    argv: string[],
    dependencies: CliDependencies = {},
): Promise<number> {
    const { env = process.env, ...runtimeDependencies } = dependencies;
    let logger: SyncLogger = dependencies.logger ?? createConsoleLogger();

    try {
        const invocation = parseCliArgs(argv);
        const config = resolveSyncConfig([
            loadConfigFileLayer(invocation.configPath),
            parseSyncEnv(env),
            invocation.layer,
        ]);

        logger = dependencies.logger
            ?? createConsoleLogger({ verbose: config.verbose });

        const report = await runSync(config, {
            ...runtimeDependencies,
            logger,
        });

        for (const index of report.indices) {
            logger.info('index summary', {
                index_name: index.indexName,
                queries: index.queries.map((query) => ({
                    failed: query.failed,
                    query_name: query.queryName,
                    upserted: query.upserted,
                })),
                reason: index.reason,
                state: index.state,
            });
        }

        return exitCodeForReport(report);
    } catch (error: unknown) {
        if (error instanceof ConfigurationError) {
            logger.error('configuration error', {
                error: error.message,
            });
            return 1;
        }

        if (isCommanderExit(error)) {
            return error.exitCode;
        }

        logger.error('graph-index-sync failed', {
            error: error instanceof Error ? error.message : String(error),
        });
        return 1;
    }
}

function isCommanderExit(
    error: unknown,
): error is { exitCode: number } {
    return typeof error === 'object'
        && error !== null
        && 'code' in error
        && typeof error.code === 'string'
        && error.code.startsWith('commander.')
        && 'exitCode' in error
        && typeof error.exitCode === 'number';
}
