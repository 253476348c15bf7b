/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadEngineConfig,
    loadEngineConfigWithFallback,
    getDefaultEngineConfig,
    type EngineFileConfig,
} from "./loadEngineConfig.js";
