/**
 * @fileoverview Implementation barrel exports
 *
 * @module @evalconf/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export { DirectoryResourceLocator } from "./DirectoryResourceLocator.js";
export { StaticTypeLoader } from "./StaticTypeLoader.js";
export { createConsoleLogger, isLogLevel, scopedLogger } from "./consoleLogger.js";
