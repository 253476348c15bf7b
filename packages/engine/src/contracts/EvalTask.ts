/**
 * Evaluation Task Contract
 *
 * Tasks are declared by configuration scripts and collected by the engine.
 * The engine treats them as opaque: only `name` (for logging) and object
 * identity are used. What a task computes is up to the domain.
 */

/**
 * A task declared during a script run.
 *
 * @example
 * ```typescript
 * class TrainTestTask implements EvalTask {
 *     constructor(readonly name: string, readonly folds: number) {}
 * }
 * ```
 */
export interface EvalTask {
    /** Human-readable task name, used in logs and events */
    readonly name: string;
}

/**
 * Type guard to check if an object can be registered as a task.
 *
 * @param obj - The object to check
 * @returns True if the object has a string `name`
 */
export function isEvalTask(obj: unknown): obj is EvalTask {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "name" in obj &&
        typeof obj.name === "string"
    );
}
