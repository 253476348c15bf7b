/**
 * @fileoverview evalconf - Main Entry Point
 *
 * Loads an evaluation configuration script and prints the tasks it declares.
 *
 * Usage: `evalconf [script]` (default: scripts/baseline.eval.js)
 *
 * Environment:
 * - `EVALCONF_CONFIG`: path to engine.yml (default: config/engine.yml)
 * - `EVALCONF_LOG_LEVEL`: overrides `logLevel` from engine.yml
 *
 * @module evalconf
 */

// Load .env before reading any environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { EvalConfigError, createConsoleLogger, isLogLevel } from "@evalconf/engine";
import { loadEngineConfigWithFallback } from "./config/index.js";
import { createEngine } from "./createEngine.js";
import { formatEnvironment } from "./report.js";

const APP_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..");

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const scriptPath = process.argv[2] ?? join(APP_ROOT, "scripts", "baseline.eval.js");
    const configPath = process.env.EVALCONF_CONFIG ?? join(APP_ROOT, "config", "engine.yml");

    const bootLogger = createConsoleLogger("evalconf");
    const config = loadEngineConfigWithFallback(configPath, bootLogger);

    let level = config.logLevel;
    const envLevel = process.env.EVALCONF_LOG_LEVEL;
    if (envLevel !== undefined) {
        if (isLogLevel(envLevel)) {
            level = envLevel;
        }
        else {
            bootLogger.warn("Ignoring unknown EVALCONF_LOG_LEVEL", { value: envLevel });
        }
    }

    const logger = createConsoleLogger("evalconf", level);
    const engine = await createEngine(config, logger);

    engine.eventBus.subscribe("run:completed", (event) => {
        logger.info("Script finished", event.data);
    });

    try {
        const environment = await engine.load(scriptPath);
        for (const line of formatEnvironment(environment)) {
            console.log(line);
        }
    }
    catch (error) {
        if (error instanceof EvalConfigError) {
            console.error(`[FATAL] ${error.code}: ${error.message}`);
            process.exitCode = 1;
            return;
        }
        throw error;
    }
}

main().catch((error: unknown) => {
    console.error("[FATAL] Unexpected failure:", error);
    process.exitCode = 1;
});
