/**
 * @fileoverview Runtime barrel exports
 *
 * @module @evalconf/engine/runtime
 */

export { RunScope, ScopeTracker } from "./RunScope.js";
export {
    ScriptRunner,
    type CompiledScript,
    type InlineScript,
    type ScriptRunListener,
    type ScriptRunnerConfig,
    type ScriptSource,
} from "./ScriptRunner.js";
export {
    createScriptGlobals,
    type ScriptGlobals,
    type ScriptHost,
    type TaskListener,
} from "./scriptGlobals.js";
