/**
 * @fileoverview Module Loader
 *
 * Discovery step that turns code modules into named types. Every class a
 * module exports is defined in a StaticTypeLoader under
 * `<namespace>.<ExportName>`, so manifests and scripts can refer to it by
 * that name.
 *
 * Runs once, before the engine is constructed.
 *
 * @module @evalconf/engine/plugins/ModuleLoader
 */

import { existsSync, readdirSync, statSync } from "fs";
import { basename, extname, join, resolve } from "path";
import { pathToFileURL } from "url";
import { isTargetType } from "../contracts/Builder.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { describeError } from "../contracts/ConfigErrors.js";
import { StaticTypeLoader } from "../impl/StaticTypeLoader.js";
import { createConsoleLogger } from "../impl/consoleLogger.js";

/**
 * A module directory and the namespace its files are defined under.
 */
export interface ModuleDirectory {
    /** Directory to scan for `.js` / `.mjs` modules */
    readonly path: string;

    /** Namespace prefix; each file adds its own stem (`<namespace>.<stem>`) */
    readonly namespace: string;
}

/**
 * Module loader configuration.
 */
export interface ModuleLoaderConfig {
    /** Type loader to define discovered classes in (default: a new one) */
    types?: StaticTypeLoader;

    /** Logger for module loading */
    logger?: EngineLogger;
}

const MODULE_EXTENSIONS = new Set([".js", ".mjs"]);

/**
 * Module Loader
 *
 * @example
 * ```typescript
 * const loader = new ModuleLoader();
 *
 * // defines evalconf.data.CsvDataSource, evalconf.data.CsvDataSourceBuilder, ...
 * await loader.loadFromDirectory({ path: "./plugins", namespace: "evalconf" });
 *
 * const engine = new ConfigEngine({ typeLoader: loader.types, ... });
 * ```
 */
export class ModuleLoader {
    readonly types: StaticTypeLoader;
    private readonly logger: EngineLogger;

    constructor(config: ModuleLoaderConfig = {}) {
        this.types = config.types ?? new StaticTypeLoader();
        this.logger = config.logger ?? createConsoleLogger("ModuleLoader");
    }

    /**
     * Import one module and define the classes it exports.
     *
     * Named exports are defined under their export name. A default export is
     * defined under the class's own name; an anonymous one is skipped.
     *
     * @param filePath - Path to the module
     * @param namespace - Prefix for the defined names
     * @returns Fully-qualified names defined from this module
     */
    async loadModule(filePath: string, namespace: string): Promise<string[]> {
        const exports: Record<string, unknown> = await import(pathToFileURL(resolve(filePath)).href);
        const defined: string[] = [];

        for (const [key, exported] of Object.entries(exports)) {
            if (!isTargetType(exported)) {
                continue;
            }

            const exportName = key === "default" ? exported.name : key;
            if (!exportName || exportName === "default") {
                this.logger.warn("Skipping anonymous default export", { filePath });
                continue;
            }

            const name = `${namespace}.${exportName}`;
            this.types.define(name, exported);
            defined.push(name);
            this.logger.debug("Defined type", { name, filePath });
        }

        return defined;
    }

    /**
     * Import every module in a directory.
     *
     * A file that fails to import is logged and skipped; the rest still load.
     *
     * @param directory - Directory and namespace
     * @returns Fully-qualified names defined from the directory
     */
    async loadFromDirectory(directory: ModuleDirectory): Promise<string[]> {
        const { path: dirPath, namespace } = directory;
        const defined: string[] = [];

        if (!existsSync(dirPath)) {
            this.logger.warn("Module directory does not exist", { dirPath });
            return defined;
        }
        if (!statSync(dirPath).isDirectory()) {
            this.logger.warn("Module path is not a directory", { dirPath });
            return defined;
        }

        const files = readdirSync(dirPath).sort();
        for (const file of files) {
            const ext = extname(file).toLowerCase();
            if (!MODULE_EXTENSIONS.has(ext)) {
                continue;
            }

            const filePath = join(dirPath, file);
            try {
                defined.push(...await this.loadModule(filePath, `${namespace}.${basename(file, extname(file))}`));
            }
            catch (error) {
                this.logger.error("Failed to load module", {
                    filePath,
                    error: describeError(error),
                });
            }
        }

        this.logger.info("Modules loaded from directory", {
            dirPath,
            types: defined.length,
        });

        return defined;
    }

    /**
     * Import the modules of several directories, in order.
     */
    async loadFromDirectories(directories: readonly ModuleDirectory[]): Promise<string[]> {
        const defined: string[] = [];
        for (const directory of directories) {
            defined.push(...await this.loadFromDirectory(directory));
        }
        return defined;
    }
}
