/**
 * Environment Contract
 *
 * The packaged output of one successful script run: the tasks the script
 * declared, in declaration order, and the script's completion value.
 */

import type { EvalTask } from "./EvalTask.js";

/**
 * Immutable result of loading a configuration script.
 */
export interface Environment {
    /** Tasks registered during the run, in declaration order */
    readonly tasks: readonly EvalTask[];

    /** Completion value of the script (may be undefined or null) */
    readonly result: unknown;
}

/**
 * Create a frozen environment snapshot.
 *
 * The task list is copied, so later changes to `tasks` do not leak into
 * the environment.
 *
 * @param tasks - Tasks collected by the run
 * @param result - The script's completion value
 * @returns Frozen environment
 */
export function createEnvironment(tasks: readonly EvalTask[], result: unknown): Environment {
    return Object.freeze({
        tasks: Object.freeze([...tasks]),
        result,
    });
}
