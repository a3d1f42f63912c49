export type LogFields = Record<string, unknown>;

export interface SyncLogger {
    debug(message: string, fields?: LogFields): void;
    error(message: string, fields?: LogFields): void;
    info(message: string, fields?: LogFields): void;
    warn(message: string, fields?: LogFields): void;
}

export type ConsoleLoggerOptions = {
    verbose?: boolean;
};

function emit(
    write: (...args: unknown[]) => void,
    message: string,
    fields: LogFields | undefined,
): void {
    if (fields === undefined) {
        write(message);
        return;
    }

    write(message, fields);
}

export function createConsoleLogger(
    options: ConsoleLoggerOptions = {},
): SyncLogger {
    const verbose = options.verbose ?? false;

    return {
        debug(message, fields) {
            if (!verbose) {
                return;
            }

            emit(console.log, message, fields);
        },
        error(message, fields) {
            emit(console.error, message, fields);
        },
        info(message, fields) {
            emit(console.log, message, fields);
        },
        warn(message, fields) {
            emit(console.warn, message, fields);
        },
    };
}
