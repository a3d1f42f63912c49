import { splitList, type DocumentStoreMode, type SyncConfigLayer } from './config';
import { ENV_PREFIX } from './constants';
import { ConfigurationError } from './errors';

function envKey(name: string): string {
    return `${ENV_PREFIX}${name}`;
}

function readOptionalString(
    value: string | undefined,
): string | undefined {
    if (value === undefined) {
        return undefined;
    }

    const trimmed = String(value).trim();

    return trimmed || undefined;
}

function parseBoolean(
    value: string | undefined,
    key: string,
): boolean | undefined {
    const normalized = readOptionalString(value)?.toLowerCase();

    if (!normalized) {
        return undefined;
    }

    if (
        normalized === '1'
        || normalized === 'true'
        || normalized === 'yes'
        || normalized === 'on'
    ) {
        return true;
    }

    if (
        normalized === '0'
        || normalized === 'false'
        || normalized === 'no'
        || normalized === 'off'
    ) {
        return false;
    }

    throw new ConfigurationError(`${key} must be true or false when provided`);
}

function parsePositiveInt(
    value: string | undefined,
    key: string,
): number | undefined {
    const normalized = readOptionalString(value);

    if (!normalized) {
        return undefined;
    }

    const parsed = Number(normalized);

    if (!Number.isSafeInteger(parsed) || parsed <= 0) {
        throw new ConfigurationError(`${key} must be a positive integer`);
    }

    return parsed;
}

function parseDocumentStoreMode(
    value: string | undefined,
): DocumentStoreMode | undefined {
    const normalized = readOptionalString(value);

    if (!normalized) {
        return undefined;
    }

    if (normalized === 'opensearch' || normalized === 'postgres') {
        return normalized;
    }

    throw new ConfigurationError(
        `${envKey('DOCUMENT_STORE')} must be one of opensearch|postgres `
        + 'when provided',
    );
}

export function parseSyncEnv(env: NodeJS.ProcessEnv): SyncConfigLayer {
    const read = (name: string): string | undefined => env[envKey(name)];
    const readOnlyProcedures = readOptionalString(read('READ_ONLY_PROCEDURES'));
    const selectedIndices = readOptionalString(read('SELECTED_INDICES'));

    return {
        allowIndexCreation: parseBoolean(
            read('ALLOW_INDEX_CREATION'),
            envKey('ALLOW_INDEX_CREATION'),
        ),
        clearExistingIndices: parseBoolean(
            read('CLEAR_EXISTING_INDICES'),
            envKey('CLEAR_EXISTING_INDICES'),
        ),
        defaultPageSize: parsePositiveInt(
            read('DEFAULT_PAGE_SIZE'),
            envKey('DEFAULT_PAGE_SIZE'),
        ),
        documentStore: parseDocumentStoreMode(read('DOCUMENT_STORE')),
        graph: {
            password: readOptionalString(read('GRAPH_PASSWORD')),
            uri: readOptionalString(read('GRAPH_URI')),
            username: readOptionalString(read('GRAPH_USERNAME')),
        },
        indexSpecFile: readOptionalString(read('INDEX_SPEC_FILE')),
        opensearch: {
            node: readOptionalString(read('OPENSEARCH_NODE')),
            password: readOptionalString(read('OPENSEARCH_PASSWORD')),
            username: readOptionalString(read('OPENSEARCH_USERNAME')),
            verifyCerts: parseBoolean(
                read('OPENSEARCH_VERIFY_CERTS'),
                envKey('OPENSEARCH_VERIFY_CERTS'),
            ),
        },
        postgres: {
            schema: readOptionalString(read('PG_SCHEMA')),
            url: readOptionalString(read('PG_URL')),
        },
        readOnlyProcedures: readOnlyProcedures === undefined
            ? undefined
            : splitList(readOnlyProcedures),
        selectedIndices: selectedIndices === undefined
            ? undefined
            : splitList(selectedIndices),
        testMode: parseBoolean(read('TEST_MODE'), envKey('TEST_MODE')),
    };
}
