import {
    PAGINATION_LIMIT_PARAM,
    PAGINATION_SKIP_PARAM,
} from './constants';
import { ValidationError } from './errors';
import type { QuerySpec } from './types';

export type QueryClassification =
    | {
        allowed: true;
        parameters: string[];
    }
    | {
        allowed: false;
        reason: string;
    };

type QueryToken =
    | {
        kind: 'word';
        offset: number;
        value: string;
    }
    | {
        kind: 'parameter';
        value: string;
    }
    | {
        kind: 'identifier';
    }
    | {
        kind: 'literal';
    }
    | {
        kind: 'symbol';
        value: string;
    };

type ScanResult =
    | {
        ok: true;
        tokens: QueryToken[];
    }
    | {
        ok: false;
        reason: string;
    };

const WRITE_CLAUSES = new Set([
    'ALTER',
    'CREATE',
    'DELETE',
    'DENY',
    'DETACH',
    'DROP',
    'FOREACH',
    'GRANT',
    'MERGE',
    'REMOVE',
    'REVOKE',
    'SET',
]);

const READ_CLAUSES = new Set([
    'MATCH',
    'RETURN',
]);

/** Procedures a query may CALL; anything else is rejected. */
export const READ_ONLY_PROCEDURES: readonly string[] = [
    'db.constraints',
    'db.index.fulltext.queryNodes',
    'db.index.fulltext.queryRelationships',
    'db.index.vector.queryNodes',
    'db.indexes',
    'db.labels',
    'db.propertyKeys',
    'db.relationshipTypes',
    'db.schema.nodeTypeProperties',
    'db.schema.relTypeProperties',
    'db.schema.visualization',
    'dbms.components',
];

export type ClassifyQueryOptions = {
    /** Extra procedure names, fully qualified, that are known not to write. */
    readOnlyProcedures?: readonly string[];
};

function isWordStart(char: string): boolean {
    return /[A-Za-z_]/u.test(char);
}

function isWordPart(char: string): boolean {
    return /[A-Za-z0-9_]/u.test(char);
}

function isDigit(char: string | undefined): boolean {
    return char !== undefined && /[0-9]/u.test(char);
}

function readDigits(
    text: string,
    start: number,
    digit: RegExp,
): number {
    let end = start;

    while (end < text.length) {
        if (digit.test(text[end])) {
            end += 1;
            continue;
        }

        // 1_000
        if (text[end] === '_' && digit.test(text[end + 1] ?? '')) {
            end += 2;
            continue;
        }

        break;
    }

    return end;
}

/**
 * Reads an integer (decimal, 0x hex or 0o octal) or a float with optional
 * fraction and exponent. Letters after the number are left for the next
 * token, so `1CREATE` scans as a literal followed by a word.
 */
function readNumber(text: string, start: number): number {
    const prefix = text.slice(start, start + 2).toLowerCase();

    if (prefix === '0x' && /[0-9A-Fa-f]/u.test(text[start + 2] ?? '')) {
        return readDigits(text, start + 2, /[0-9A-Fa-f]/u);
    }

    if (prefix === '0o' && /[0-7]/u.test(text[start + 2] ?? '')) {
        return readDigits(text, start + 2, /[0-7]/u);
    }

    let end = readDigits(text, start, /[0-9]/u);

    if (text[end] === '.' && isDigit(text[end + 1])) {
        end = readDigits(text, end + 1, /[0-9]/u);
    }

    if (text[end] === 'e' || text[end] === 'E') {
        const sign = text[end + 1] === '+' || text[end + 1] === '-' ? 1 : 0;

        if (isDigit(text[end + 1 + sign])) {
            end = readDigits(text, end + 1 + sign, /[0-9]/u);
        }
    }

    return end;
}

function readWord(text: string, start: number): number {
    let end = start;

    while (end < text.length && isWordPart(text[end])) {
        end += 1;
    }

    return end;
}

function skipQuoted(
    text: string,
    start: number,
    quote: string,
): number | null {
    let index = start + 1;

    while (index < text.length) {
        const char = text[index];

        if (char === '\\' && quote !== '`') {
            index += 2;
            continue;
        }

        if (char === quote) {
            // `` inside a backtick identifier is an escaped backtick
            if (quote === '`' && text[index + 1] === '`') {
                index += 2;
                continue;
            }

            return index + 1;
        }

        index += 1;
    }

    return null;
}

function scanQuery(text: string): ScanResult {
    const tokens: QueryToken[] = [];
    let index = 0;

    while (index < text.length) {
        const char = text[index];
        const next = text[index + 1];

        if (/\s/u.test(char)) {
            index += 1;
            continue;
        }

        if (char === '/' && next === '/') {
            const lineEnd = text.indexOf('\n', index);
            index = lineEnd === -1 ? text.length : lineEnd + 1;
            continue;
        }

        if (char === '/' && next === '*') {
            const commentEnd = text.indexOf('*/', index + 2);

            if (commentEnd === -1) {
                return {
                    ok: false,
                    reason: 'unterminated block comment',
                };
            }

            index = commentEnd + 2;
            continue;
        }

        if (char === '\'' || char === '"' || char === '`') {
            const end = skipQuoted(text, index, char);

            if (end === null) {
                return {
                    ok: false,
                    reason: char === '`'
                        ? 'unterminated quoted identifier'
                        : 'unterminated string literal',
                };
            }

            tokens.push(char === '`' ? { kind: 'identifier' } : { kind: 'literal' });
            index = end;
            continue;
        }

        if (char === '$') {
            if (next === '`') {
                const end = skipQuoted(text, index + 1, '`');

                if (end === null) {
                    return {
                        ok: false,
                        reason: 'unterminated quoted parameter',
                    };
                }

                tokens.push({
                    kind: 'parameter',
                    value: text.slice(index + 2, end - 1).replace(/``/gu, '`'),
                });
                index = end;
                continue;
            }

            const end = readWord(text, index + 1);

            tokens.push({
                kind: 'parameter',
                value: text.slice(index + 1, end),
            });
            index = end;
            continue;
        }

        if (isDigit(char)) {
            tokens.push({ kind: 'literal' });
            index = readNumber(text, index);
            continue;
        }

        if (isWordStart(char)) {
            const end = readWord(text, index);

            tokens.push({
                kind: 'word',
                offset: index,
                value: text.slice(index, end),
            });
            index = end;
            continue;
        }

        tokens.push({
            kind: 'symbol',
            value: char,
        });
        index += 1;
    }

    return {
        ok: true,
        tokens,
    };
}

/**
 * A word is in clause position unless the surrounding tokens make it a
 * property key, label, relationship type, map key or alias.
 */
function isClausePosition(
    tokens: QueryToken[],
    position: number,
): boolean {
    const previous = tokens[position - 1];
    const following = tokens[position + 1];

    if (previous?.kind === 'symbol'
        && (previous.value === '.' || previous.value === ':')) {
        return false;
    }

    if (previous?.kind === 'word' && previous.value.toUpperCase() === 'AS') {
        return false;
    }

    // map key (`{set: 1}`) or pattern variable (`(create:Person)`)
    return !(following?.kind === 'symbol' && following.value === ':');
}

function isSubqueryCall(tokens: QueryToken[], position: number): boolean {
    const next = tokens[position + 1];

    // CALL { ... } and CALL (x) { ... }; their clauses are scanned like any other
    return next?.kind === 'symbol' && (next.value === '{' || next.value === '(');
}

function readProcedureName(
    tokens: QueryToken[],
    start: number,
): string[] {
    const segments: string[] = [];
    let position = start;

    while (position < tokens.length) {
        const token = tokens[position];

        if (token.kind !== 'word') {
            break;
        }

        segments.push(token.value);

        const separator = tokens[position + 1];

        if (separator?.kind !== 'symbol' || separator.value !== '.') {
            break;
        }

        position += 2;
    }

    return segments;
}

/**
 * Decides whether a Cypher query is read-only by scanning its clause
 * keywords; text inside string literals, quoted identifiers and comments
 * never counts. A procedure CALL is only accepted for names on the
 * read-only list or in `options.readOnlyProcedures`.
 */
export function classifyQuery(
    text: string,
    options: ClassifyQueryOptions = {},
): QueryClassification {
    const scan = scanQuery(text);

    if (!scan.ok) {
        return {
            allowed: false,
            reason: `Query could not be scanned: ${scan.reason}`,
        };
    }

    const { tokens } = scan;
    const procedures = new Set([
        ...READ_ONLY_PROCEDURES,
        ...(options.readOnlyProcedures ?? []),
    ]);
    const parameters = new Set<string>();
    let hasReadClause = false;

    for (let position = 0; position < tokens.length; position += 1) {
        const token = tokens[position];

        if (token.kind === 'parameter') {
            parameters.add(token.value);
            continue;
        }

        if (token.kind !== 'word' || !isClausePosition(tokens, position)) {
            continue;
        }

        const keyword = token.value.toUpperCase();

        if (WRITE_CLAUSES.has(keyword)) {
            return {
                allowed: false,
                reason: `Query contains write clause '${keyword}' at offset `
                    + `${token.offset}; only read-only queries are allowed`,
            };
        }

        if (keyword === 'CALL' && !isSubqueryCall(tokens, position)) {
            const procedure = readProcedureName(tokens, position + 1).join('.');

            if (!procedures.has(procedure)) {
                return {
                    allowed: false,
                    reason: `Query calls procedure '${procedure}' at offset `
                        + `${token.offset}, which is not known to be read-only`,
                };
            }
        }

        if (READ_CLAUSES.has(keyword)) {
            hasReadClause = true;
        }
    }

    if (!hasReadClause) {
        return {
            allowed: false,
            reason: 'Query must contain a MATCH or RETURN clause',
        };
    }

    return {
        allowed: true,
        parameters: [...parameters].sort(),
    };
}

export function assertReadOnlyQuery(
    query: QuerySpec,
    options: ClassifyQueryOptions = {},
): void {
    const classification = classifyQuery(query.text, options);

    if (!classification.allowed) {
        throw new ValidationError(
            `Query '${query.name}' rejected: ${classification.reason}`,
            query.name,
        );
    }

    const missing = [PAGINATION_SKIP_PARAM, PAGINATION_LIMIT_PARAM]
        .filter((name) => !classification.parameters.includes(name));

    if (missing.length > 0) {
        throw new ValidationError(
            `Query '${query.name}' must reference `
            + missing.map((name) => `$${name}`).join(' and ')
            + ' for pagination',
            query.name,
        );
    }
}
