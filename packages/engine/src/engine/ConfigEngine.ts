/**
 * @fileoverview ConfigEngine
 *
 * Entry point for loading evaluation configuration scripts.
 *
 * The engine owns the long-lived builder state (explicit registrations and
 * manifest defaults) and hands every script run a fresh run scope. Scripts
 * and the domain code they call reach back into the engine to find builders
 * and to declare tasks.
 *
 * @module @evalconf/engine/engine/ConfigEngine
 */

import { resolve } from "path";
import { Readable } from "stream";
import type { BuilderType, TargetType } from "../contracts/Builder.js";
import type { Environment } from "../contracts/Environment.js";
import type { EvalTask } from "../contracts/EvalTask.js";
import type { EngineLogger } from "../contracts/Logger.js";
import type { ResourceLocator } from "../contracts/ResourceLocator.js";
import type { TypeLoader } from "../contracts/TypeLoader.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { InvalidArgumentError } from "../contracts/ConfigErrors.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { DirectoryResourceLocator } from "../impl/DirectoryResourceLocator.js";
import type { StaticTypeLoader } from "../impl/StaticTypeLoader.js";
import { createConsoleLogger, scopedLogger } from "../impl/consoleLogger.js";
import { BuilderRegistry } from "../registry/BuilderRegistry.js";
import { NamedBuilderCatalog } from "../registry/NamedBuilderCatalog.js";
import { ScopeTracker } from "../runtime/RunScope.js";
import type { ScriptHost } from "../runtime/scriptGlobals.js";
import { ScriptRunner } from "../runtime/ScriptRunner.js";
import type { ScriptSource } from "../runtime/ScriptRunner.js";
import type { ModuleDirectory } from "../plugins/ModuleLoader.js";
import { ModuleLoader } from "../plugins/ModuleLoader.js";

/**
 * Engine configuration options.
 */
export interface EngineConfig {
    /** Resolves type names used in manifests and scripts */
    readonly typeLoader: TypeLoader;

    /** Finds builder manifests */
    readonly resourceLocator: ResourceLocator;

    /**
     * Namespaces searched, in order, when a script loads a type by short
     * name, e.g. `["evalconf.data", "evalconf.eval"]`.
     */
    readonly imports?: readonly string[];

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: EngineLogger;
}

/**
 * Options for {@link ConfigEngine.create}.
 */
export interface EngineSetup {
    /** Directories searched for manifests (default: the working directory) */
    readonly resourceRoots?: readonly string[];

    /** Module directories whose exported classes become named types */
    readonly moduleDirs?: readonly ModuleDirectory[];

    /** Type loader to extend (default: a new one) */
    readonly types?: StaticTypeLoader;

    readonly imports?: readonly string[];
    readonly eventBus?: EventBus;
    readonly logger?: EngineLogger;
}

/**
 * ConfigEngine - loads configuration scripts and resolves builders.
 *
 * @example
 * ```typescript
 * const engine = await ConfigEngine.create({
 *     resourceRoots: ["./resources"],
 *     moduleDirs   : [{ path: "./plugins", namespace: "evalconf" }],
 *     imports      : ["evalconf.data"],
 * });
 *
 * engine.eventBus.subscribe("task:registered", (event) => {
 *     console.log("Declared:", event.data?.task);
 * });
 *
 * const env = await engine.load("./experiments/baseline.eval.js");
 * ```
 */
export class ConfigEngine implements ScriptHost {
    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    public readonly logger: EngineLogger;

    private readonly types: TypeLoader;
    private readonly imports: readonly string[];
    private readonly registry: BuilderRegistry;
    private readonly catalog: NamedBuilderCatalog;
    private readonly tracker = new ScopeTracker();
    private readonly runner: ScriptRunner;

    /**
     * Create an engine and register the default builders from every
     * discoverable manifest.
     */
    constructor(config: EngineConfig) {
        this.logger = config.logger ?? createConsoleLogger("ConfigEngine");
        this.eventBus = config.eventBus ?? new InMemoryEventBus(scopedLogger(this.logger, "EventBus"));
        this.types = config.typeLoader;
        this.imports = config.imports ?? [];

        this.registry = new BuilderRegistry({
            logger    : scopedLogger(this.logger, "BuilderRegistry"),
            onRegister: (type, builder) => this.emit(createEvent("builder:registered", {
                type   : type.name,
                builder: builder.name,
            })),
        });

        this.catalog = new NamedBuilderCatalog({
            locator: config.resourceLocator,
            types  : this.types,
            logger : scopedLogger(this.logger, "NamedBuilderCatalog"),
        });

        this.runner = new ScriptRunner({
            host    : this,
            tracker : this.tracker,
            logger  : scopedLogger(this.logger, "ScriptRunner"),
            listener: {
                started: (script, scope) => this.emit(createEvent("run:started", {
                    script: script.name,
                }, scope.id)),
                taskRegistered: (scope, task) => this.emit(createEvent("task:registered", {
                    task: task.name,
                }, scope.id)),
                completed: (script, scope, environment) => this.emit(createEvent("run:completed", {
                    script   : script.name,
                    taskCount: environment.tasks.length,
                }, scope.id)),
                failed: (script, scope, error) => this.emit(createEvent("run:failed", {
                    script: script.name,
                    error : error.message,
                }, scope.id)),
            },
        });

        const registered = this.registry.loadDefaults(config.resourceLocator, this.types);
        this.emit(createEvent("defaults:loaded", { registered }));
    }

    /**
     * Discover types from module directories, then construct the engine.
     *
     * @param setup - Resource roots, module directories and engine options
     * @returns Engine with default builders loaded
     */
    static async create(setup: EngineSetup = {}): Promise<ConfigEngine> {
        const logger = setup.logger ?? createConsoleLogger("ConfigEngine");
        const modules = new ModuleLoader({
            types : setup.types,
            logger: scopedLogger(logger, "ModuleLoader"),
        });
        await modules.loadFromDirectories(setup.moduleDirs ?? []);

        return new ConfigEngine({
            typeLoader     : modules.types,
            resourceLocator: new DirectoryResourceLocator(setup.resourceRoots ?? [process.cwd()]),
            imports        : setup.imports,
            eventBus       : setup.eventBus,
            logger,
        });
    }

    /**
     * Load and run a configuration script.
     *
     * @param source - Script file path, readable stream, or inline script
     * @returns Tasks the script declared and its completion value
     * @throws ResourceReadError if the source cannot be read
     * @throws ScriptCompileError if the script does not parse
     * @throws ConfigurationError if the script fails while running
     */
    async load(source: ScriptSource): Promise<Environment> {
        this.logger.debug("Loading script", { source: describeSource(source) });
        const script = await this.runner.load(source);
        return this.runner.execute(script);
    }

    /**
     * Compile and run script text synchronously.
     *
     * Usable from inside another script; the inner run gets its own scope
     * and its tasks do not appear in the outer run.
     *
     * @param name - Script name for logs and errors
     * @param code - Script source
     */
    run(name: string, code: string): Environment {
        this.logger.debug("Running inline script", { source: name });
        return this.runner.execute(this.runner.compile(name, code));
    }

    /**
     * Find a builder with a particular name if it exists.
     *
     * @param name - Short builder name
     * @returns The builder class, or undefined if no manifest names it
     * @throws ConfigurationError if the manifest exists but is broken
     */
    getBuilder(name: string): BuilderType | undefined {
        return this.catalog.find(name);
    }

    /**
     * Get a builder for a type: explicit registrations first, then the
     * type's default builder marker.
     *
     * @param type - A type that needs to be built
     * @returns A builder class, or undefined if none can be found
     */
    getBuilderForType<T>(type: TargetType<T>): BuilderType<T> | undefined {
        return this.registry.resolve(type);
    }

    /**
     * Register a builder class for a type that cannot carry a default
     * builder marker itself. Replaces any earlier registration.
     *
     * @throws InvalidArgumentError if `type` or `builder` is missing
     */
    registerBuilder<T>(type: TargetType<T> | null | undefined, builder: BuilderType<T> | null | undefined): void {
        this.registry.register(type, builder);
    }

    /**
     * Register a task in the script run currently executing.
     *
     * Does nothing outside a run, so domain code may call it whether or not
     * it was invoked from a script.
     *
     * @param task - The task to register
     */
    registerTask(task: EvalTask): void {
        if (task === null || task === undefined) {
            throw new InvalidArgumentError("task cannot be null");
        }

        this.logger.debug("Registering task", { task: task.name });
        const scope = this.tracker.current();
        if (scope?.register(task)) {
            this.emit(createEvent("task:registered", { task: task.name }, scope.id));
        }
        else {
            this.logger.debug("No active run, task ignored", { task: task.name });
        }
    }

    /**
     * Load a type by fully-qualified name, or by short name against the
     * configured imports.
     *
     * @throws TypeLoadError if no type matches
     */
    loadType(name: string): TargetType {
        if (this.types.has(name)) {
            return this.types.load(name);
        }
        for (const namespace of this.imports) {
            const qualified = `${namespace}.${name}`;
            if (this.types.has(qualified)) {
                return this.types.load(qualified);
            }
        }
        return this.types.load(name);
    }

    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}

function describeSource(source: ScriptSource): string {
    if (typeof source === "string") {
        return resolve(source);
    }
    if (source instanceof Readable) {
        return "<stream>";
    }
    return source.name;
}
