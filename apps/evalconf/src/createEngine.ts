/**
 * @fileoverview Engine wiring for the CLI
 *
 * @module createEngine
 */

import { ConfigEngine, type EngineLogger } from "@evalconf/engine";
import type { EngineFileConfig } from "./config/index.js";
import { DOMAIN_IMPORTS, registerDomainTypes } from "./domain/index.js";

/**
 * Build a ConfigEngine that knows the built-in domain types, the user's
 * module directories and every configured resource root.
 *
 * @param config - Settings from engine.yml
 * @param logger - Logger shared by the engine and the scripts it runs
 */
export async function createEngine(config: EngineFileConfig, logger: EngineLogger): Promise<ConfigEngine> {
    return ConfigEngine.create({
        types        : registerDomainTypes(),
        resourceRoots: config.resourceRoots,
        moduleDirs   : config.moduleDirs,
        imports      : [...DOMAIN_IMPORTS, ...config.imports],
        logger,
    });
}
