/**
 * Logger Contract
 *
 * Structured logger used by every engine component. Hosts pass their own
 * implementation; components fall back to a console logger.
 */

/**
 * Logger interface for the engine and its components.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Log levels in increasing severity.
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
