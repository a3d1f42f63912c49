import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
    DEFAULT_GRAPH_URI,
    DEFAULT_OPENSEARCH_NODE,
    DEFAULT_PAGE_SIZE,
    DEFAULT_PG_SCHEMA,
} from './constants';
import { ConfigurationError } from './errors';

export type DocumentStoreMode =
    | 'opensearch'
    | 'postgres';

export type GraphConnectionConfig = {
    password?: string;
    uri: string;
    username?: string;
};

export type OpenSearchConnectionConfig = {
    node: string;
    password?: string;
    username?: string;
    verifyCerts: boolean;
};

export type PostgresConnectionConfig = {
    schema: string;
    url?: string;
};

export type SyncConfig = {
    allowIndexCreation: boolean;
    clearExistingIndices: boolean;
    defaultPageSize: number;
    documentStore: DocumentStoreMode;
    graph: GraphConnectionConfig;
    indexSpecFile: string;
    opensearch: OpenSearchConnectionConfig;
    postgres: PostgresConnectionConfig;
    readOnlyProcedures: string[];
    selectedIndices: string[];
    testMode: boolean;
    verbose: boolean;
};

/**
 * One source of settings. A layer only carries the keys its source set, so
 * applying it never clears a value an earlier layer provided.
 */
export type SyncConfigLayer = {
    allowIndexCreation?: boolean;
    clearExistingIndices?: boolean;
    defaultPageSize?: number;
    documentStore?: DocumentStoreMode;
    graph?: Partial<GraphConnectionConfig>;
    indexSpecFile?: string;
    opensearch?: Partial<OpenSearchConnectionConfig>;
    postgres?: Partial<PostgresConnectionConfig>;
    readOnlyProcedures?: string[];
    selectedIndices?: string[];
    testMode?: boolean;
    verbose?: boolean;
};

type ResolvedLayer = Omit<SyncConfig, 'indexSpecFile'> & {
    indexSpecFile?: string;
};

export const DEFAULT_CONFIG_FILE = 'config.yaml';

export function splitList(value: string): string[] {
    return value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}

export function resolveSyncConfig(layers: SyncConfigLayer[]): SyncConfig {
    let resolved: ResolvedLayer = {
        allowIndexCreation: true,
        clearExistingIndices: false,
        defaultPageSize: DEFAULT_PAGE_SIZE,
        documentStore: 'opensearch',
        graph: {
            uri: DEFAULT_GRAPH_URI,
        },
        opensearch: {
            node: DEFAULT_OPENSEARCH_NODE,
            verifyCerts: false,
        },
        postgres: {
            schema: DEFAULT_PG_SCHEMA,
        },
        readOnlyProcedures: [],
        selectedIndices: [],
        testMode: false,
        verbose: false,
    };

    for (const layer of layers) {
        resolved = {
            allowIndexCreation: layer.allowIndexCreation
                ?? resolved.allowIndexCreation,
            clearExistingIndices: layer.clearExistingIndices
                ?? resolved.clearExistingIndices,
            defaultPageSize: layer.defaultPageSize ?? resolved.defaultPageSize,
            documentStore: layer.documentStore ?? resolved.documentStore,
            graph: {
                password: layer.graph?.password ?? resolved.graph.password,
                uri: layer.graph?.uri ?? resolved.graph.uri,
                username: layer.graph?.username ?? resolved.graph.username,
            },
            indexSpecFile: layer.indexSpecFile ?? resolved.indexSpecFile,
            opensearch: {
                node: layer.opensearch?.node ?? resolved.opensearch.node,
                password: layer.opensearch?.password
                    ?? resolved.opensearch.password,
                username: layer.opensearch?.username
                    ?? resolved.opensearch.username,
                verifyCerts: layer.opensearch?.verifyCerts
                    ?? resolved.opensearch.verifyCerts,
            },
            postgres: {
                schema: layer.postgres?.schema ?? resolved.postgres.schema,
                url: layer.postgres?.url ?? resolved.postgres.url,
            },
            readOnlyProcedures: layer.readOnlyProcedures
                ?? resolved.readOnlyProcedures,
            selectedIndices: layer.selectedIndices ?? resolved.selectedIndices,
            testMode: layer.testMode ?? resolved.testMode,
            verbose: layer.verbose ?? resolved.verbose,
        };
    }

    if (!resolved.indexSpecFile) {
        throw new ConfigurationError('index_spec_file not specified in configuration');
    }

    if (resolved.documentStore === 'postgres' && !resolved.postgres.url) {
        throw new ConfigurationError(
            'postgres.url is required when document_store is postgres',
        );
    }

    return {
        ...resolved,
        indexSpecFile: resolved.indexSpecFile,
    };
}

const trimmed = z.string().trim();

const ConfigFileSchema = z.object({
    allow_index_creation: z.boolean().optional(),
    clear_existing_indices: z.boolean().optional(),
    default_page_size: z.number().int().positive().optional(),
    document_store: z.enum(['opensearch', 'postgres']).optional(),
    graph: z.object({
        password: trimmed.optional(),
        uri: trimmed.optional(),
        username: trimmed.optional(),
    }).default({}),
    index_spec_file: trimmed.optional(),
    opensearch: z.object({
        node: trimmed.optional(),
        password: trimmed.optional(),
        username: trimmed.optional(),
        verify_certs: z.boolean().optional(),
    }).default({}),
    postgres: z.object({
        schema: trimmed.optional(),
        url: trimmed.optional(),
    }).default({}),
    read_only_procedures: z.union([z.array(trimmed), trimmed]).optional(),
    selected_indices: z.union([z.array(trimmed), trimmed]).optional(),
    test_mode: z.boolean().optional(),
});

export function parseConfigFileLayer(raw: unknown): SyncConfigLayer {
    const parsed = ConfigFileSchema.safeParse(raw ?? {});

    if (!parsed.success) {
        throw new ConfigurationError(
            'Invalid configuration file: '
            + parsed.error.issues
                .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
                .join('; '),
        );
    }

    const file = parsed.data;
    const procedures = file.read_only_procedures;
    const selected = file.selected_indices;

    return {
        allowIndexCreation: file.allow_index_creation,
        clearExistingIndices: file.clear_existing_indices,
        defaultPageSize: file.default_page_size,
        documentStore: file.document_store,
        graph: file.graph,
        indexSpecFile: file.index_spec_file || undefined,
        opensearch: {
            node: file.opensearch.node,
            password: file.opensearch.password,
            username: file.opensearch.username,
            verifyCerts: file.opensearch.verify_certs,
        },
        postgres: file.postgres,
        readOnlyProcedures: typeof procedures === 'string'
            ? splitList(procedures)
            : procedures?.filter((name) => name.length > 0),
        selectedIndices: typeof selected === 'string'
            ? splitList(selected)
            : selected?.filter((name) => name.length > 0),
        testMode: file.test_mode,
    };
}

/**
 * Reads the YAML configuration file. Without an explicit path the default
 * file is used when present; an explicit path that does not exist is an
 * error.
 */
export function loadConfigFileLayer(
    path: string | undefined,
): SyncConfigLayer {
    const target = path ?? DEFAULT_CONFIG_FILE;

    if (!existsSync(target)) {
        if (path !== undefined) {
            throw new ConfigurationError(`Configuration file not found: ${path}`);
        }

        return {};
    }

    let raw: unknown;

    try {
        raw = parseYaml(readFileSync(target, 'utf8'));
    } catch (error: unknown) {
        throw new ConfigurationError(
            `Configuration file could not be parsed: ${target} (`
            + `${error instanceof Error ? error.message : String(error)})`,
        );
    }

    return parseConfigFileLayer(raw);
}

/**
 * The settings worth echoing at startup; connection details and secrets are
 * left out.
 */
export function describeConfig(config: SyncConfig): Record<string, unknown> {
    return {
        allow_index_creation: config.allowIndexCreation,
        clear_existing_indices: config.clearExistingIndices,
        default_page_size: config.defaultPageSize,
        document_store: config.documentStore,
        index_spec_file: config.indexSpecFile,
        selected_indices: config.selectedIndices.length > 0
            ? config.selectedIndices
            : null,
        test_mode: config.testMode,
    };
}
