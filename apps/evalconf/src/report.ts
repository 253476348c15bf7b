/**
 * @fileoverview Plain-text report of a script run
 *
 * @module report
 */

import type { Environment, EvalTask } from "@evalconf/engine";

/**
 * Describe a task with its own `describe()` when it has one, else its name.
 */
export function describeTask(task: EvalTask): string {
    const describe: unknown = Reflect.get(task, "describe");
    if (typeof describe === "function") {
        const text: unknown = describe.call(task);
        if (typeof text === "string") {
            return text;
        }
    }
    return task.name;
}

function formatResult(result: unknown): string {
    if (result === undefined) {
        return "(none)";
    }
    if (typeof result === "string") {
        return result;
    }
    try {
        return JSON.stringify(result) ?? String(result);
    }
    catch (error) {
        // BigInt values and cyclic objects have no JSON form
        if (error instanceof TypeError) {
            return String(result);
        }
        throw error;
    }
}

/**
 * Render the tasks a script declared and its result, one line each.
 *
 * @example
 * ```
 * 2 tasks declared
 *   1. baseline-crossfold: 5-fold crossfold on csv data/ratings.csv (delimiter ',', header); metrics rmse
 *   2. baseline-smoke
 * result: baseline
 * ```
 */
export function formatEnvironment(environment: Environment): string[] {
    const count = environment.tasks.length;
    return [
        `${count} ${count === 1 ? "task" : "tasks"} declared`,
        ...environment.tasks.map((task, index) => `  ${index + 1}. ${describeTask(task)}`),
        `result: ${formatResult(environment.result)}`,
    ];
}
