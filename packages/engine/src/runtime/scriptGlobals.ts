/**
 * @fileoverview Script DSL
 *
 * Globals visible to configuration scripts. Scripts are plain JavaScript;
 * everything engine-specific they can do goes through these bindings.
 *
 * ```javascript
 * const ratings = build(type("DataSource"), { path: "data/ratings.csv" });
 * task(build("crossfold", { name: "baseline", source: ratings, folds: 5 }));
 * "configured";
 * ```
 *
 * @module @evalconf/engine/runtime/scriptGlobals
 */

import type { Builder, BuilderType, TargetType } from "../contracts/Builder.js";
import { isTargetType } from "../contracts/Builder.js";
import type { EvalTask } from "../contracts/EvalTask.js";
import { isEvalTask } from "../contracts/EvalTask.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { ConfigurationError } from "../contracts/ConfigErrors.js";
import type { RunScope } from "./RunScope.js";

/**
 * Engine operations that scripts call back into.
 */
export interface ScriptHost {
    /** Find a builder by short name */
    getBuilder(name: string): BuilderType | undefined;

    /** Find a builder for a type */
    getBuilderForType<T>(type: TargetType<T>): BuilderType<T> | undefined;

    /** Load a type by fully-qualified or imported short name */
    loadType(name: string): TargetType;

    /** Logger exposed to scripts */
    readonly logger: EngineLogger;
}

/**
 * Observer for tasks declared through the `task` global.
 */
export type TaskListener = (scope: RunScope, task: EvalTask) => void;

/**
 * Globals installed into a script's context.
 */
export interface ScriptGlobals {
    readonly engine: ScriptHost;
    readonly logger: EngineLogger;
    type(name: string): TargetType;
    build(target: unknown, configure?: unknown): unknown;
    task(task: unknown): EvalTask;
}

/**
 * Create the DSL bindings for one run.
 *
 * The `task` binding writes straight into `scope`; it holds the run's handle
 * rather than looking up the current run.
 *
 * @param host - Engine the script calls back into
 * @param scope - Scope of the run being executed
 * @param onTask - Called for every task accepted by `scope`
 * @returns Object used as the script's global context
 */
export function createScriptGlobals(host: ScriptHost, scope: RunScope, onTask?: TaskListener): ScriptGlobals {
    return {
        engine: host,
        logger: host.logger,

        type(name: string): TargetType {
            return host.loadType(name);
        },

        build(target: unknown, configure?: unknown): unknown {
            const builder = instantiate(host, target);
            applyConfiguration(builder, configure);
            return builder.build();
        },

        task(task: unknown): EvalTask {
            if (!isEvalTask(task)) {
                throw new ConfigurationError("task() expects an object with a string 'name'");
            }
            if (scope.register(task)) {
                onTask?.(scope, task);
            }
            return task;
        },
    };
}

function instantiate(host: ScriptHost, target: unknown): Builder {
    let builderType: BuilderType | undefined;
    let label: string;

    if (typeof target === "string") {
        builderType = host.getBuilder(target);
        label = `name '${target}'`;
    }
    else if (isTargetType(target)) {
        builderType = host.getBuilderForType(target);
        label = `type ${target.name}`;
    }
    else {
        throw new ConfigurationError("build() expects a builder name or a type");
    }

    if (!builderType) {
        throw new ConfigurationError(`no builder found for ${label}`);
    }
    return new builderType();
}

function applyConfiguration(builder: Builder, configure: unknown): void {
    if (configure === undefined || configure === null) {
        return;
    }
    if (typeof configure === "function") {
        configure(builder);
        return;
    }
    if (typeof configure === "object") {
        Object.assign(builder, configure);
        return;
    }
    throw new ConfigurationError("build() configuration must be a function or an object");
}
