/**
 * @fileoverview Plugin barrel exports
 *
 * @module @evalconf/engine/plugins
 */

export {
    ModuleLoader,
    type ModuleDirectory,
    type ModuleLoaderConfig,
} from "./ModuleLoader.js";
