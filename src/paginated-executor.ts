import { DEFAULT_PAGE_SIZE } from './constants';
import { ValidationError } from './errors';
import type { GraphQueryTransport } from './graph-source';
import type { SyncLogger } from './logger';
import type {
    QuerySpec,
    ResultRow,
} from './types';

export type ResultPage = {
    pageNumber: number;
    rows: ResultRow[];
    skip: number;
};

export type PageStreamOptions = {
    defaultPageSize?: number;
    logger?: SyncLogger;
    /** Stop after this many pages even when the last one was full. */
    maxPages?: number;
};

export function resolvePageSize(
    query: QuerySpec,
    defaultPageSize: number = DEFAULT_PAGE_SIZE,
): number {
    const pageSize = query.pageSize ?? defaultPageSize;

    if (!Number.isSafeInteger(pageSize) || pageSize <= 0) {
        throw new ValidationError(
            `Query '${query.name}' page size must be a positive integer`,
            query.name,
        );
    }

    return pageSize;
}

/**
 * Runs one query page by page, advancing skip by the page size until a page
 * comes back short or empty. Variables are passed unchanged on every page.
 */
export async function* streamQueryPages(
    transport: GraphQueryTransport,
    query: QuerySpec,
    options: PageStreamOptions = {},
): AsyncGenerator<ResultPage, void, undefined> {
    const pageSize = resolvePageSize(query, options.defaultPageSize);
    let skip = 0;
    let pageNumber = 0;

    while (true) {
        const rows = await transport.execute({
            limit: pageSize,
            skip,
            text: query.text,
            variables: query.variables,
        });

        if (rows.length === 0) {
            break;
        }

        pageNumber += 1;
        options.logger?.debug('graph query page fetched', {
            page: pageNumber,
            query_name: query.name,
            rows: rows.length,
            skip,
        });

        yield {
            pageNumber,
            rows,
            skip,
        };

        if (rows.length < pageSize) {
            break;
        }

        if (
            options.maxPages !== undefined
            && pageNumber >= options.maxPages
        ) {
            break;
        }

        skip += pageSize;
    }
}

export async function* streamQueryRows(
    transport: GraphQueryTransport,
    query: QuerySpec,
    options: PageStreamOptions = {},
): AsyncGenerator<ResultRow, void, undefined> {
    for await (const page of streamQueryPages(transport, query, options)) {
        yield* page.rows;
    }
}
