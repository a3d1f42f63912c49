import { RowProjectionError } from './errors';
import type {
    DocumentValue,
    ResultRow,
    SyncDocument,
} from './types';

function readIdentity(
    value: DocumentValue | undefined,
    idField: string,
): string {
    if (value === undefined) {
        throw new RowProjectionError(
            `Row is missing identity field '${idField}'`,
            idField,
        );
    }

    if (typeof value === 'number' && Number.isFinite(value)) {
        return String(value);
    }

    if (typeof value === 'string') {
        if (!value.trim()) {
            throw new RowProjectionError(
                `Row has an empty identity field '${idField}'`,
                idField,
            );
        }

        return value;
    }

    if (value === null) {
        throw new RowProjectionError(
            `Row has a null identity field '${idField}'`,
            idField,
        );
    }

    throw new RowProjectionError(
        `Identity field '${idField}' must be a string or number, `
        + `got ${Array.isArray(value) ? 'array' : typeof value}`,
        idField,
    );
}

/**
 * Copies every column of the row into the document verbatim; the identity
 * column stays among the fields.
 */
export function projectRow(
    row: ResultRow,
    idField: string,
): SyncDocument {
    const id = readIdentity(row[idField], idField);

    return {
        fields: { ...row },
        id,
    };
}
