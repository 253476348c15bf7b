/**
 * @fileoverview Engine Configuration Loader
 *
 * Loads the CLI's engine settings (resource roots, module directories,
 * script imports, log level) from a YAML file.
 *
 * @module config/loadEngineConfig
 */

import { readFileSync, existsSync } from "fs";
import { dirname, resolve } from "path";
import { parse as parseYaml } from "yaml";
import {
    describeError,
    isLogLevel,
    type EngineLogger,
    type LogLevel,
    type ModuleDirectory,
} from "@evalconf/engine";

/**
 * Engine settings with every path made absolute.
 */
export interface EngineFileConfig {
    /** Minimum level written by the console logger */
    logLevel: LogLevel;

    /** Directories searched, in order, for eval-config/ manifests */
    resourceRoots: string[];

    /** Directories whose modules define script-visible types */
    moduleDirs: ModuleDirectory[];

    /** Extra namespaces for short type names in scripts */
    imports: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStringList(raw: Record<string, unknown>, key: string): string[] | undefined {
    const value = raw[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
        throw new Error(`Invalid engine config: '${key}' must be a list of strings`);
    }
    return value;
}

function readModuleDirs(raw: Record<string, unknown>, baseDir: string): ModuleDirectory[] {
    const value = raw.moduleDirs;
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new Error("Invalid engine config: 'moduleDirs' must be a list");
    }

    return value.map((entry: unknown, index) => {
        if (!isRecord(entry) || typeof entry.path !== "string") {
            throw new Error(`Invalid module directory at index ${index}: missing or invalid 'path'`);
        }
        if (typeof entry.namespace !== "string" || entry.namespace.length === 0) {
            throw new Error(`Invalid module directory at index ${index}: missing or invalid 'namespace'`);
        }
        return {
            path     : resolve(baseDir, entry.path),
            namespace: entry.namespace,
        };
    });
}

/**
 * Load engine settings from a YAML file.
 *
 * Relative paths are resolved against the directory holding the file.
 * Omitted keys take their defaults from {@link getDefaultEngineConfig}.
 *
 * @param filePath - Path to engine.yml
 * @returns Validated settings
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadEngineConfig("./config/engine.yml");
 * console.log(config.resourceRoots);
 * // ["/srv/evalconf/resources", ...]
 * ```
 */
export function loadEngineConfig(filePath: string): EngineFileConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Engine config file not found: ${filePath}`);
    }

    const baseDir = dirname(resolve(filePath));
    const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8"));
    const defaults = getDefaultEngineConfig(baseDir);

    if (parsed === null || parsed === undefined) {
        return defaults;
    }
    if (!isRecord(parsed)) {
        throw new Error("Invalid engine config format: expected a mapping");
    }

    let logLevel = defaults.logLevel;
    if (parsed.logLevel !== undefined) {
        if (typeof parsed.logLevel !== "string" || !isLogLevel(parsed.logLevel)) {
            throw new Error(`Invalid engine config: unknown log level '${String(parsed.logLevel)}'`);
        }
        logLevel = parsed.logLevel;
    }

    const roots = readStringList(parsed, "resourceRoots");

    return {
        logLevel,
        resourceRoots: roots ? roots.map(root => resolve(baseDir, root)) : defaults.resourceRoots,
        moduleDirs   : readModuleDirs(parsed, baseDir),
        imports      : readStringList(parsed, "imports") ?? defaults.imports,
    };
}

/**
 * Load engine settings, falling back to the defaults when the file is
 * missing or invalid.
 *
 * @param filePath - Path to engine.yml
 * @param logger - Receives a warning when the defaults are used
 */
export function loadEngineConfigWithFallback(filePath: string, logger: EngineLogger): EngineFileConfig {
    try {
        return loadEngineConfig(filePath);
    }
    catch (error) {
        logger.warn("Failed to load engine config, using defaults", {
            filePath,
            error: describeError(error),
        });
        return getDefaultEngineConfig(dirname(resolve(filePath)));
    }
}

/**
 * Default settings: the `resources` directory next to the config directory,
 * no module directories, no extra imports.
 *
 * @param baseDir - Directory the config file lives in
 */
export function getDefaultEngineConfig(baseDir: string): EngineFileConfig {
    return {
        logLevel     : "info",
        resourceRoots: [resolve(baseDir, "..", "resources")],
        moduleDirs   : [],
        imports      : [],
    };
}
