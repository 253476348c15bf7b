/**
 * @fileoverview Console logger
 *
 * Default {@link EngineLogger} used when the host does not supply one.
 *
 * @module @evalconf/engine/impl/consoleLogger
 */

import type { EngineLogger, LogLevel } from "../contracts/Logger.js";

const LEVEL_RANK: Record<LogLevel, number> = {
    debug : 10,
    info  : 20,
    warn  : 30,
    error : 40,
    silent: 100,
};

/**
 * Create a console-backed logger that prefixes every line with the component.
 *
 * @param component - Component name shown as `[component]`
 * @param level - Minimum level that is written (default "info")
 * @returns Logger writing to the console
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger("ConfigEngine", "debug");
 * logger.debug("loading script", { source: "experiment.eval.js" });
 * // [ConfigEngine] loading script { source: 'experiment.eval.js' }
 * ```
 */
export function createConsoleLogger(component: string, level: LogLevel = "info"): EngineLogger {
    const enabled = (candidate: LogLevel): boolean => LEVEL_RANK[candidate] >= LEVEL_RANK[level];

    return {
        debug: (msg, data) => {
            if (enabled("debug")) console.debug(`[${component}] ${msg}`, data ?? "");
        },
        info: (msg, data) => {
            if (enabled("info")) console.info(`[${component}] ${msg}`, data ?? "");
        },
        warn: (msg, data) => {
            if (enabled("warn")) console.warn(`[${component}] ${msg}`, data ?? "");
        },
        error: (msg, data) => {
            if (enabled("error")) console.error(`[${component}] ${msg}`, data ?? "");
        },
    };
}

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * Derive a logger for a sub-component from a parent logger.
 *
 * @param parent - Logger to write through
 * @param scope - Scope shown as a `[scope]` prefix on each message
 */
export function scopedLogger(parent: EngineLogger, scope: string): EngineLogger {
    return {
        debug: (msg, data) => parent.debug(`[${scope}] ${msg}`, data),
        info : (msg, data) => parent.info(`[${scope}] ${msg}`, data),
        warn : (msg, data) => parent.warn(`[${scope}] ${msg}`, data),
        error: (msg, data) => parent.error(`[${scope}] ${msg}`, data),
    };
}
