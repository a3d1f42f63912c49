import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
    INITIAL_QUERY_NAME,
    PAGINATION_LIMIT_PARAM,
    PAGINATION_SKIP_PARAM,
} from './constants';
import { ConfigurationError } from './errors';
import type {
    DocumentValue,
    IndexSpec,
    QuerySpec,
} from './types';

const DocumentValueSchema: z.ZodType<DocumentValue> = z.lazy(() => {
    return z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(DocumentValueSchema),
        z.record(DocumentValueSchema),
    ]);
});

const trimmedString = z.string().trim().min(1);

const QueryFileSchema = z.object({
    name: trimmedString.optional(),
    page_size: z.number().int().positive().optional(),
    query: trimmedString,
    variables: z.record(DocumentValueSchema).default({}),
});

const IndexFileSchema = z.object({
    id_field: trimmedString,
    index_name: trimmedString,
    initial_query: QueryFileSchema,
    update_queries: z.array(QueryFileSchema).nullish(),
});

export const IndexSpecFileSchema = z.object({
    indices: z.array(IndexFileSchema).min(1),
});

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => {
            const path = issue.path.length > 0
                ? issue.path.join('.')
                : '(root)';

            return `${path}: ${issue.message}`;
        })
        .join('; ');
}

function toQuerySpec(
    query: z.infer<typeof QueryFileSchema>,
    fallbackName: string,
): QuerySpec {
    return {
        name: query.name ?? fallbackName,
        pageSize: query.page_size,
        text: query.query,
        variables: query.variables,
    };
}

/**
 * Checks the cross-entry rules a schema cannot express: unique index names
 * and variables that would collide with the pagination parameters.
 */
export function assertValidIndexSpecs(specs: IndexSpec[]): void {
    if (specs.length === 0) {
        throw new ConfigurationError('No indices defined in index spec');
    }

    const seen = new Set<string>();

    for (const spec of specs) {
        if (!spec.indexName.trim()) {
            throw new ConfigurationError('index_name must not be empty');
        }

        if (!spec.idField.trim()) {
            throw new ConfigurationError(
                `id_field must not be empty for index '${spec.indexName}'`,
            );
        }

        if (seen.has(spec.indexName)) {
            throw new ConfigurationError(
                `Duplicate index_name '${spec.indexName}' in index spec`,
            );
        }

        seen.add(spec.indexName);

        for (const query of [spec.initialQuery, ...spec.updateQueries]) {
            if (!query.text.trim()) {
                throw new ConfigurationError(
                    `Query '${query.name}' of index '${spec.indexName}' `
                    + 'has empty query text',
                );
            }

            for (const reserved of [PAGINATION_SKIP_PARAM, PAGINATION_LIMIT_PARAM]) {
                if (reserved in query.variables) {
                    throw new ConfigurationError(
                        `Query '${query.name}' of index '${spec.indexName}' `
                        + `must not declare reserved variable '${reserved}'`,
                    );
                }
            }
        }
    }
}

export function parseIndexSpecs(raw: unknown): IndexSpec[] {
    const parsed = IndexSpecFileSchema.safeParse(raw ?? {});

    if (!parsed.success) {
        throw new ConfigurationError(
            `Invalid index spec: ${formatIssues(parsed.error)}`,
        );
    }

    const specs = parsed.data.indices.map((entry): IndexSpec => {
        return {
            idField: entry.id_field,
            indexName: entry.index_name,
            initialQuery: toQuerySpec(entry.initial_query, INITIAL_QUERY_NAME),
            updateQueries: (entry.update_queries ?? []).map((query, position) => {
                return toQuerySpec(query, `update_${position + 1}`);
            }),
        };
    });

    assertValidIndexSpecs(specs);

    return specs;
}

export function loadIndexSpecFile(path: string): IndexSpec[] {
    let text: string;

    try {
        text = readFileSync(path, 'utf8');
    } catch (error: unknown) {
        throw new ConfigurationError(
            `Index spec file could not be read: ${path} (`
            + `${error instanceof Error ? error.message : String(error)})`,
        );
    }

    let raw: unknown;

    try {
        raw = parseYaml(text);
    } catch (error: unknown) {
        throw new ConfigurationError(
            `Index spec file is not valid YAML: ${path} (`
            + `${error instanceof Error ? error.message : String(error)})`,
        );
    }

    return parseIndexSpecs(raw);
}

/**
 * Keeps only the named indices, in spec order. An empty selection keeps
 * everything.
 */
export function selectIndexSpecs(
    specs: IndexSpec[],
    selected: string[],
): IndexSpec[] {
    if (selected.length === 0) {
        return specs;
    }

    const known = new Set(specs.map((spec) => spec.indexName));
    const unknown = selected.filter((name) => !known.has(name));

    if (unknown.length > 0) {
        throw new ConfigurationError(
            `Selected indices not found in index spec: ${unknown.join(', ')}`,
        );
    }

    const wanted = new Set(selected);

    return specs.filter((spec) => wanted.has(spec.indexName));
}
