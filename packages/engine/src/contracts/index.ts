/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces, types and guards shared by the registry, the runtime and
 * the engine facade.
 *
 * @module @evalconf/engine/contracts
 */

// Builders and target types
export type { Builder, BuilderType, TargetType } from "./Builder.js";
export {
    DEFAULT_BUILDER,
    defaultBuilder,
    getDefaultBuilder,
    isBuilderType,
    isTargetType,
} from "./Builder.js";

// Tasks and run output
export type { EvalTask } from "./EvalTask.js";
export { isEvalTask } from "./EvalTask.js";
export type { Environment } from "./Environment.js";
export { createEnvironment } from "./Environment.js";

// Host capabilities
export type { ResourceHandle, ResourceLocator } from "./ResourceLocator.js";
export type { TypeLoader } from "./TypeLoader.js";
export type { EngineLogger, LogLevel } from "./Logger.js";

// Errors
export type { EvalConfigErrorCode } from "./ConfigErrors.js";
export {
    EvalConfigError,
    ResourceReadError,
    ScriptCompileError,
    ConfigurationError,
    InvalidArgumentError,
    TypeLoadError,
    describeError,
} from "./ConfigErrors.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    RegistryEventType,
    RunEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
