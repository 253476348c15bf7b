/**
 * @fileoverview Engine barrel exports
 *
 * @module @evalconf/engine/engine
 */

export {
    ConfigEngine,
    type EngineConfig,
    type EngineSetup,
} from "./ConfigEngine.js";
