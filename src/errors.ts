export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class ValidationError extends Error {
    constructor(
        message: string,
        readonly queryName: string,
    ) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class ConnectionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConnectionError';
    }
}

export class IndexLifecycleError extends Error {
    constructor(
        message: string,
        readonly indexName: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'IndexLifecycleError';
    }
}

export class RowProjectionError extends Error {
    constructor(
        message: string,
        readonly idField: string,
    ) {
        super(message);
        this.name = 'RowProjectionError';
    }
}

export class UpsertError extends Error {
    constructor(
        message: string,
        readonly documentId: string,
    ) {
        super(message);
        this.name = 'UpsertError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return `${error.name}: ${error.message}`;
    }

    return String(error);
}
