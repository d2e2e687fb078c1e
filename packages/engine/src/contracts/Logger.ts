/**
 * @fileoverview Logger Contract
 *
 * The logger shape accepted by training, classification and evaluation.
 *
 * @module @spam-bayes/engine/contracts/Logger
 */

/**
 * Logger interface.
 */
export interface Logger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
export const defaultLogger: Logger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};

/**
 * Wrap a logger so every message carries a scope prefix.
 *
 * @param logger - The underlying logger
 * @param scope - Prefix, e.g. "trainer"
 */
export function createScopedLogger(logger: Logger, scope: string): Logger {
    return {
        debug: (msg, data) => logger.debug(`[${scope}] ${msg}`, data),
        info : (msg, data) => logger.info(`[${scope}] ${msg}`, data),
        warn : (msg, data) => logger.warn(`[${scope}] ${msg}`, data),
        error: (msg, data) => logger.error(`[${scope}] ${msg}`, data),
    };
}
