/**
 * Logger contract shared by connectors, the registry and the plugin loader.
 *
 * Any object with `info` / `warn` / `error` methods works, including
 * `console`. Messages never carry secret values.
 *
 * @module
 */

/** Logger for diagnostic messages. */
export interface Logger {
    info: (msg: string) => void;
    warn: (msg: string) => void;
    error: (msg: string) => void;
}

const PREFIX = "[service-connectors]";

/**
 * Default logger: drops `info`, writes warnings and errors to the console.
 */
export const defaultLogger: Logger = {
    info() { /* dropped */ },
    warn(msg) {
        console.warn(`${PREFIX} ${msg}`);
    },
    error(msg) {
        console.error(`${PREFIX} ${msg}`);
    },
};

/** Logger that discards everything. */
export const silentLogger: Logger = {
    info() { /* dropped */ },
    warn() { /* dropped */ },
    error() { /* dropped */ },
};

/** Render an unknown thrown value as a one-line message. */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
