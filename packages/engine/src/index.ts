/**
 * @fileoverview evalconf engine
 *
 * Loads evaluation configuration scripts, collects the tasks they declare,
 * and finds the builders that construct the objects they configure.
 *
 * The engine provides:
 * - Type-keyed builder resolution (registrations, then default builder markers)
 * - Default builders discovered from `eval-config/builders.properties` manifests
 * - Named builders from `eval-config/methods/<name>.properties` manifests
 * - Per-run task collection, isolated between concurrent and nested runs
 *
 * @module @evalconf/engine
 * @example
 * ```typescript
 * import { ConfigEngine } from "@evalconf/engine";
 *
 * const engine = await ConfigEngine.create({ resourceRoots: ["./resources"] });
 * const { tasks, result } = await engine.load("./experiment.eval.js");
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

// Builders
export type { Builder, BuilderType, TargetType } from "./contracts/index.js";
export {
    DEFAULT_BUILDER,
    defaultBuilder,
    getDefaultBuilder,
    isBuilderType,
    isTargetType,
} from "./contracts/index.js";

// Tasks and environments
export type { EvalTask, Environment } from "./contracts/index.js";
export { isEvalTask, createEnvironment } from "./contracts/index.js";

// Host capabilities
export type {
    ResourceHandle,
    ResourceLocator,
    TypeLoader,
    EngineLogger,
    LogLevel,
} from "./contracts/index.js";

// Errors
export type { EvalConfigErrorCode } from "./contracts/index.js";
export {
    EvalConfigError,
    ResourceReadError,
    ScriptCompileError,
    ConfigurationError,
    InvalidArgumentError,
    TypeLoadError,
    describeError,
} from "./contracts/index.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    RegistryEventType,
    RunEventType,
    Subscription,
} from "./contracts/index.js";
export { createEvent } from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    InMemoryEventBus,
    DirectoryResourceLocator,
    StaticTypeLoader,
    createConsoleLogger,
    isLogLevel,
    scopedLogger,
} from "./impl/index.js";

// ============================================================================
// Registry and runtime exports
// ============================================================================

export {
    BuilderRegistry,
    NamedBuilderCatalog,
    parseProperties,
    BUILDERS_MANIFEST_PATH,
    NAMED_BUILDER_PREFIX,
    type BuilderRegistryConfig,
    type NamedBuilderCatalogConfig,
} from "./registry/index.js";

export {
    RunScope,
    ScopeTracker,
    ScriptRunner,
    type CompiledScript,
    type InlineScript,
    type ScriptHost,
    type ScriptRunListener,
    type ScriptSource,
} from "./runtime/index.js";

// ============================================================================
// Plugin and engine exports
// ============================================================================

export { ModuleLoader, type ModuleDirectory } from "./plugins/index.js";

export {
    ConfigEngine,
    type EngineConfig,
    type EngineSetup,
} from "./engine/index.js";
