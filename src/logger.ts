/** the subset of console the controller writes to */
export type Logger = {
    debug: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
};

export const consoleLogger: Logger = {
    debug: (message, ...args) => console.debug(message, ...args),
    warn: (message, ...args) => console.warn(message, ...args),
    error: (message, ...args) => console.error(message, ...args),
};

const noop = (): void => {};

/** discards everything */
export const silentLogger: Logger = {
    debug: noop,
    warn: noop,
    error: noop,
};
