/**
 * @fileoverview Run scopes
 *
 * A run scope collects the tasks declared during one script run. Each run
 * owns its scope exclusively; the scope is closed when the run ends and its
 * tasks are handed over to the run's Environment.
 *
 * Code that declares tasks without holding a reference to the run (builders,
 * domain helpers) goes through {@link ScopeTracker}, which finds the scope
 * of the run that is currently executing via AsyncLocalStorage. Concurrent
 * runs each see their own scope; a nested run hides its parent's scope
 * until it returns.
 *
 * @module @evalconf/engine/runtime/RunScope
 */

import { AsyncLocalStorage } from "async_hooks";
import type { EvalTask } from "../contracts/EvalTask.js";

let nextRunId = 0;

/**
 * Task accumulator for a single run.
 */
export class RunScope {
    /** Identifier used to correlate logs and events of this run */
    readonly id: string;

    private tasks: EvalTask[] | null = [];

    constructor() {
        nextRunId++;
        this.id = `run_${Date.now().toString(36)}_${nextRunId}`;
    }

    /**
     * Whether the scope still accepts tasks.
     */
    get active(): boolean {
        return this.tasks !== null;
    }

    /**
     * Number of tasks registered so far (0 once ended).
     */
    get size(): number {
        return this.tasks?.length ?? 0;
    }

    /**
     * Append a task in declaration order.
     *
     * @param task - Task to record
     * @returns False if the scope has already ended and the task was dropped
     */
    register(task: EvalTask): boolean {
        if (this.tasks === null) {
            return false;
        }
        this.tasks.push(task);
        return true;
    }

    /**
     * Close the scope and hand over its tasks.
     *
     * The returned array is owned by the caller; the scope keeps no reference
     * to it. Calling `end` again returns an empty list.
     *
     * @returns Tasks in declaration order
     */
    end(): EvalTask[] {
        const tasks = this.tasks ?? [];
        this.tasks = null;
        return tasks;
    }
}

/**
 * Tracks which run scope belongs to the code currently executing.
 *
 * @example
 * ```typescript
 * const tracker = new ScopeTracker();
 * const scope = tracker.begin();
 *
 * tracker.run(scope, () => {
 *     tracker.register(new TrainTestTask("baseline")); // recorded in scope
 * });
 *
 * tracker.register(new TrainTestTask("stray"));        // no active run: ignored
 * scope.end();                                         // [TrainTestTask("baseline")]
 * ```
 */
export class ScopeTracker {
    private readonly storage = new AsyncLocalStorage<RunScope>();

    /**
     * Allocate an empty scope for a new run.
     */
    begin(): RunScope {
        return new RunScope();
    }

    /**
     * Execute `fn` with `scope` as the current run scope.
     *
     * The binding covers everything `fn` calls, including async continuations
     * it starts, and is removed when `fn` returns or throws.
     */
    run<T>(scope: RunScope, fn: () => T): T {
        return this.storage.run(scope, fn);
    }

    /**
     * The scope of the run currently executing, if any and still open.
     */
    current(): RunScope | undefined {
        const scope = this.storage.getStore();
        return scope?.active ? scope : undefined;
    }

    /**
     * Record a task in the current run.
     *
     * Outside of any active run this does nothing, so task-declaring code can
     * be called both from scripts and from plain host code.
     *
     * @param task - Task to record
     * @returns True if the task was attributed to a run
     */
    register(task: EvalTask): boolean {
        return this.current()?.register(task) ?? false;
    }
}
