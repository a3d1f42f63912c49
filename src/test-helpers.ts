import type {
    LogFields,
    SyncLogger,
} from './logger';
import type {
    IndexSpec,
    QuerySpec,
    ResultRow,
} from './types';

export type RecordedLog = {
    fields?: LogFields;
    level: 'debug' | 'error' | 'info' | 'warn';
    message: string;
};

export type RecordingLogger = SyncLogger & {
    entries: RecordedLog[];
    messages: (level: RecordedLog['level']) => string[];
};

export function createRecordingLogger(): RecordingLogger {
    const entries: RecordedLog[] = [];
    const record = (level: RecordedLog['level']) => {
        return (message: string, fields?: LogFields): void => {
            entries.push({
                fields,
                level,
                message,
            });
        };
    };

    return {
        debug: record('debug'),
        entries,
        error: record('error'),
        info: record('info'),
        messages: (level) => entries
            .filter((entry) => entry.level === level)
            .map((entry) => entry.message),
        warn: record('warn'),
    };
}

export function pagedQuery(
    match: string,
    overrides: Partial<QuerySpec> = {},
): QuerySpec {
    return {
        name: overrides.name ?? 'initial',
        pageSize: overrides.pageSize,
        text: overrides.text
            ?? `${match} SKIP $skip LIMIT $limit`,
        variables: overrides.variables ?? {},
    };
}

export function buildIndexSpec(
    overrides: Partial<IndexSpec> = {},
): IndexSpec {
    return {
        idField: overrides.idField ?? 'id',
        indexName: overrides.indexName ?? 'people',
        initialQuery: overrides.initialQuery ?? pagedQuery(
            'MATCH (p:Person) RETURN p.id AS id, p.name AS name',
        ),
        updateQueries: overrides.updateQueries ?? [],
    };
}

export function buildRows(
    count: number,
    build: (position: number) => ResultRow = (position) => ({
        id: `p-${position}`,
        name: `Person ${position}`,
    }),
): ResultRow[] {
    return Array.from({ length: count }, (_, position) => build(position + 1));
}
