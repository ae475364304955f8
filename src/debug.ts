// src/debug.ts

let globalDebug = false;

export function setDebug(enabled: boolean): void {
    globalDebug = enabled;
}

export function isDebugEnabled(): boolean {
    return globalDebug;
}

export type Logger = (...args: unknown[]) => void;

/**
 * Returns a `console.log` wrapper that prefixes each line with the namespace
 * and a timestamp. Output is suppressed unless debugging is switched on,
 * either globally through `setDebug` or for this logger through `enabled`.
 */
export function createLogger(namespace: string, enabled?: () => boolean): Logger {
    return (...args: unknown[]) => {
        if (!globalDebug && !(enabled && enabled())) return;
        const now = new Date();
        const timeString = `${now.getHours()}:${now.getMinutes()}:${now.getSeconds()}.${now.getMilliseconds()}`;
        console.log(`[${namespace} ${timeString}]`, ...args);
    };
}
