/**
 * @fileoverview Script Runner
 *
 * Compiles configuration scripts and runs them against a fresh run scope.
 *
 * Run lifecycle:
 * 1. Open a scope for the run
 * 2. Run the script with the DSL globals bound to that scope
 * 3. Close the scope, on success and on failure alike
 * 4. Package the tasks and the script's completion value as an Environment
 *
 * Scripts run synchronously and to completion. There is no timeout: a script
 * that never returns blocks the caller of `execute`.
 *
 * @module @evalconf/engine/runtime/ScriptRunner
 */

import { readFile } from "fs/promises";
import { basename } from "path";
import { Readable } from "stream";
import { text } from "stream/consumers";
import { Script, createContext } from "vm";
import type { Environment } from "../contracts/Environment.js";
import { createEnvironment } from "../contracts/Environment.js";
import type { EvalTask } from "../contracts/EvalTask.js";
import type { EngineLogger } from "../contracts/Logger.js";
import {
    ConfigurationError,
    ResourceReadError,
    ScriptCompileError,
    describeError,
} from "../contracts/ConfigErrors.js";
import { createConsoleLogger } from "../impl/consoleLogger.js";
import type { RunScope, ScopeTracker } from "./RunScope.js";
import type { ScriptHost, TaskListener } from "./scriptGlobals.js";
import { createScriptGlobals } from "./scriptGlobals.js";

/**
 * Script given as text, e.g. embedded in a larger config file.
 */
export interface InlineScript {
    /** Name used in logs and error messages */
    readonly name: string;

    /** Script source */
    readonly text: string;
}

/**
 * Where a script comes from: a file path, a readable stream, or inline text.
 */
export type ScriptSource = string | Readable | InlineScript;

/**
 * A parsed script ready to run. Can be executed any number of times.
 */
export interface CompiledScript {
    readonly name: string;
    readonly program: Script;
}

/**
 * Observer for run lifecycle events.
 */
export interface ScriptRunListener {
    started?(script: CompiledScript, scope: RunScope): void;
    taskRegistered?: TaskListener;
    completed?(script: CompiledScript, scope: RunScope, environment: Environment): void;
    failed?(script: CompiledScript, scope: RunScope, error: ConfigurationError): void;
}

/**
 * Script runner configuration.
 */
export interface ScriptRunnerConfig {
    /** Engine the scripts call back into */
    host: ScriptHost;

    /** Tracker that binds each run's scope to the code it executes */
    tracker: ScopeTracker;

    /** Lifecycle observer */
    listener?: ScriptRunListener;

    /** Logger for loading and running scripts */
    logger?: EngineLogger;
}

/**
 * Script Runner
 *
 * @example
 * ```typescript
 * const runner = new ScriptRunner({ host: engine, tracker: new ScopeTracker() });
 * const script = await runner.load("./experiments/baseline.eval.js");
 * const env = runner.execute(script);
 * console.log(env.tasks.map(t => t.name), env.result);
 * ```
 */
export class ScriptRunner {
    private readonly host: ScriptHost;
    private readonly tracker: ScopeTracker;
    private readonly listener: ScriptRunListener;
    private readonly logger: EngineLogger;

    constructor(config: ScriptRunnerConfig) {
        this.host = config.host;
        this.tracker = config.tracker;
        this.listener = config.listener ?? {};
        this.logger = config.logger ?? createConsoleLogger("ScriptRunner");
    }

    /**
     * Read and compile a script.
     *
     * @param source - File path, readable stream, or inline script
     * @returns The compiled script
     * @throws ResourceReadError if the source cannot be read
     * @throws ScriptCompileError if the source is not valid JavaScript
     */
    async load(source: ScriptSource): Promise<CompiledScript> {
        const { name, code } = await readSource(source);
        return this.compile(name, code);
    }

    /**
     * Compile script text.
     *
     * @param name - Name used as the script's file name in stack traces
     * @param code - Script source
     * @throws ScriptCompileError if the source is not valid JavaScript
     */
    compile(name: string, code: string): CompiledScript {
        try {
            const program = new Script(code, { filename: name });
            this.logger.debug("Script compiled", { script: name });
            return { name, program };
        }
        catch (error) {
            throw new ScriptCompileError(name, { cause: error });
        }
    }

    /**
     * Run a compiled script and collect what it declares.
     *
     * @param script - Script returned by `load` or `compile`
     * @returns Tasks registered by the script and its completion value
     * @throws ConfigurationError if the script throws; the original error is the cause
     */
    execute(script: CompiledScript): Environment {
        const scope = this.tracker.begin();
        this.listener.started?.(script, scope);
        this.logger.debug("Running script", { script: script.name, runId: scope.id });

        const context = createContext(createScriptGlobals(this.host, scope, this.listener.taskRegistered));

        let result: unknown;
        let tasks: EvalTask[] = [];
        try {
            result = this.tracker.run(scope, () => script.program.runInContext(context));
        }
        catch (error) {
            const failure = new ConfigurationError(
                `error running configuration script ${script.name}: ${describeError(error)}`,
                { cause: error }
            );
            this.logger.debug("Script failed", {
                script        : script.name,
                runId         : scope.id,
                discardedTasks: scope.size,
                error         : describeError(error),
            });
            this.listener.failed?.(script, scope, failure);
            throw failure;
        }
        finally {
            tasks = scope.end();
        }

        const environment = createEnvironment(tasks, result);
        this.listener.completed?.(script, scope, environment);
        return environment;
    }
}

async function readSource(source: ScriptSource): Promise<{ name: string; code: string }> {
    if (typeof source === "string") {
        try {
            return { name: source, code: await readFile(source, "utf-8") };
        }
        catch (error) {
            throw new ResourceReadError(source, { cause: error });
        }
    }

    if (source instanceof Readable) {
        const name = streamName(source);
        try {
            return { name, code: await text(source) };
        }
        catch (error) {
            throw new ResourceReadError(name, { cause: error });
        }
    }

    return { name: source.name, code: source.text };
}

function streamName(stream: Readable): string {
    const path: unknown = Reflect.get(stream, "path");
    return typeof path === "string" ? basename(path) : "<stream>";
}
