import neo4j, {
    isDate,
    isDateTime,
    isDuration,
    isInt,
    isLocalDateTime,
    isLocalTime,
    isNode,
    isPath,
    isPoint,
    isRelationship,
    isTime,
    type Driver,
} from 'neo4j-driver';
import {
    PAGINATION_LIMIT_PARAM,
    PAGINATION_SKIP_PARAM,
} from './constants';
import { ConnectionError } from './errors';
import type {
    DocumentValue,
    QueryVariables,
    ResultRow,
} from './types';

export type GraphPageRequest = {
    limit: number;
    skip: number;
    text: string;
    variables: QueryVariables;
};

export interface GraphQueryTransport {
    close(): Promise<void>;
    execute(request: GraphPageRequest): Promise<ResultRow[]>;
}

export type BoltGraphConfig = {
    password?: string;
    uri: string;
    username?: string;
};

function describeCause(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function toDocumentValue(value: unknown): DocumentValue {
    if (value === null || value === undefined) {
        return null;
    }

    if (
        typeof value === 'string'
        || typeof value === 'boolean'
    ) {
        return value;
    }

    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : String(value);
    }

    if (typeof value === 'bigint') {
        return Number.isSafeInteger(Number(value))
            ? Number(value)
            : value.toString();
    }

    if (typeof value !== 'object') {
        return String(value);
    }

    if (isInt(value)) {
        return value.inSafeRange() ? value.toNumber() : value.toString();
    }

    if (
        isDate(value)
        || isDateTime(value)
        || isLocalDateTime(value)
        || isTime(value)
        || isLocalTime(value)
        || isDuration(value)
    ) {
        return value.toString();
    }

    if (isPoint(value)) {
        return {
            srid: toDocumentValue(value.srid),
            x: value.x,
            y: value.y,
            z: value.z ?? null,
        };
    }

    if (isNode(value) || isRelationship(value)) {
        return toDocumentValue(value.properties);
    }

    if (isPath(value)) {
        return [
            toDocumentValue(value.start.properties),
            ...value.segments.map((segment) => {
                return toDocumentValue(segment.end.properties);
            }),
        ];
    }

    if (Array.isArray(value)) {
        return value.map(toDocumentValue);
    }

    if (value instanceof Date) {
        return value.toISOString();
    }

    const converted: Record<string, DocumentValue> = {};

    for (const [key, entry] of Object.entries(value)) {
        converted[key] = toDocumentValue(entry);
    }

    return converted;
}

/**
 * Integral numbers go over Bolt as integers; the driver would otherwise send
 * every JavaScript number as a float.
 */
function toBoltParameter(value: DocumentValue): unknown {
    if (typeof value === 'number' && Number.isSafeInteger(value)) {
        return neo4j.int(value);
    }

    if (Array.isArray(value)) {
        return value.map(toBoltParameter);
    }

    if (value !== null && typeof value === 'object') {
        const converted: Record<string, unknown> = {};

        for (const [key, entry] of Object.entries(value)) {
            converted[key] = toBoltParameter(entry);
        }

        return converted;
    }

    return value;
}

export function buildBoltParameters(
    request: GraphPageRequest,
): Record<string, unknown> {
    const parameters: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(request.variables)) {
        parameters[key] = toBoltParameter(value);
    }

    parameters[PAGINATION_SKIP_PARAM] = neo4j.int(request.skip);
    parameters[PAGINATION_LIMIT_PARAM] = neo4j.int(request.limit);

    return parameters;
}

export class BoltGraphQueryTransport implements GraphQueryTransport {
    constructor(private readonly driver: Driver) {}

    async execute(request: GraphPageRequest): Promise<ResultRow[]> {
        const session = this.driver.session({
            defaultAccessMode: neo4j.session.READ,
        });

        try {
            const result = await session.run(
                request.text,
                buildBoltParameters(request),
            );

            return result.records.map((record) => {
                const row: ResultRow = {};

                for (const key of record.keys) {
                    row[String(key)] = toDocumentValue(record.get(key));
                }

                return row;
            });
        } catch (error: unknown) {
            throw new ConnectionError(
                `Graph query failed at skip ${request.skip}: `
                + describeCause(error),
                { cause: error },
            );
        } finally {
            await session.close();
        }
    }

    async close(): Promise<void> {
        await this.driver.close();
    }
}

export function createBoltGraphQueryTransport(
    config: BoltGraphConfig,
): BoltGraphQueryTransport {
    const auth = config.username && config.password
        ? neo4j.auth.basic(config.username, config.password)
        : undefined;

    return new BoltGraphQueryTransport(neo4j.driver(config.uri, auth));
}

export type InMemoryGraphQueryTransportOptions = {
    failWith?: (request: GraphPageRequest) => Error | null;
};

/**
 * Serves fixed row sets keyed by query text, honouring skip and limit the way
 * the database would.
 */
export class InMemoryGraphQueryTransport implements GraphQueryTransport {
    readonly requests: GraphPageRequest[] = [];

    private readonly rowsByQuery = new Map<string, ResultRow[]>();

    private closed = false;

    constructor(
        rowsByQuery: Record<string, ResultRow[]> = {},
        private readonly options: InMemoryGraphQueryTransportOptions = {},
    ) {
        for (const [text, rows] of Object.entries(rowsByQuery)) {
            this.rowsByQuery.set(text, rows);
        }
    }

    setRows(text: string, rows: ResultRow[]): void {
        this.rowsByQuery.set(text, rows);
    }

    isClosed(): boolean {
        return this.closed;
    }

    async execute(request: GraphPageRequest): Promise<ResultRow[]> {
        this.requests.push({
            ...request,
            variables: { ...request.variables },
        });

        const failure = this.options.failWith?.(request) ?? null;

        if (failure !== null) {
            throw failure;
        }

        const rows = this.rowsByQuery.get(request.text) ?? [];

        return rows
            .slice(request.skip, request.skip + request.limit)
            .map((row) => ({ ...row }));
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}
