/**
 * Configuration Error Taxonomy
 *
 * Every error the engine raises extends {@link EvalConfigError} and carries
 * a stable `code`. Soft failures (missing builders, unresolvable default
 * manifest entries) are never thrown; see BuilderRegistry.
 */

/**
 * Stable error codes.
 */
export type EvalConfigErrorCode =
    | "IO_ERROR"
    | "SCRIPT_COMPILE_ERROR"
    | "CONFIGURATION_ERROR"
    | "INVALID_ARGUMENT"
    | "TYPE_LOAD_ERROR";

/**
 * Base class for all engine errors.
 */
export abstract class EvalConfigError extends Error {
    abstract readonly code: EvalConfigErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A script or manifest could not be read.
 */
export class ResourceReadError extends EvalConfigError {
    readonly code = "IO_ERROR";

    constructor(
        readonly resource: string,
        options?: { cause?: unknown }
    ) {
        super(`cannot read ${resource}: ${describeError(options?.cause)}`, options);
    }
}

/**
 * A script is not valid JavaScript.
 */
export class ScriptCompileError extends EvalConfigError {
    readonly code = "SCRIPT_COMPILE_ERROR";

    constructor(
        readonly script: string,
        options?: { cause?: unknown }
    ) {
        super(`cannot compile script ${script}: ${describeError(options?.cause)}`, options);
    }
}

/**
 * A script failed while running, or a named builder manifest is malformed.
 *
 * The original failure is kept as `cause`.
 */
export class ConfigurationError extends EvalConfigError {
    readonly code = "CONFIGURATION_ERROR";
}

/**
 * Programming error in direct API use.
 */
export class InvalidArgumentError extends EvalConfigError {
    readonly code = "INVALID_ARGUMENT";
}

/**
 * A type name could not be resolved by the type loader.
 */
export class TypeLoadError extends EvalConfigError {
    readonly code = "TYPE_LOAD_ERROR";

    constructor(readonly typeName: string) {
        super(`unknown type ${typeName}`);
    }
}

/**
 * Render a thrown value as a one-line message.
 *
 * Script errors come from another realm, so `instanceof Error` cannot be
 * relied on; any object with a string `message` is treated as an error.
 *
 * @param error - Thrown value
 * @returns Error message, or the value converted to a string
 */
export function describeError(error: unknown): string {
    if (
        typeof error === "object" &&
        error !== null &&
        "message" in error &&
        typeof error.message === "string"
    ) {
        return error.message;
    }
    return String(error);
}
