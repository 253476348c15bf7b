/**
 * @fileoverview Named Builder Catalog
 *
 * Finds builders by short name (e.g. `crossfold`) through per-name
 * manifests at `eval-config/methods/<name>.properties`.
 *
 * A missing manifest means "no such builder" and is not an error. A manifest
 * that exists but does not name a loadable builder class is a configuration
 * error: a broken declaration should fail loudly rather than look absent.
 *
 * @module @evalconf/engine/registry/NamedBuilderCatalog
 */

import type { BuilderType } from "../contracts/Builder.js";
import { isBuilderType } from "../contracts/Builder.js";
import type { ResourceLocator } from "../contracts/ResourceLocator.js";
import type { TypeLoader } from "../contracts/TypeLoader.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { ConfigurationError, InvalidArgumentError, describeError } from "../contracts/ConfigErrors.js";
import { createConsoleLogger } from "../impl/consoleLogger.js";
import { NAMED_BUILDER_KEY, namedBuilderPath, parseProperties } from "./manifest.js";

/**
 * Named builder catalog configuration.
 */
export interface NamedBuilderCatalogConfig {
    /** Resource lookup used to find manifests */
    locator: ResourceLocator;

    /** Type loader used to resolve builder names */
    types: TypeLoader;

    /** Logger for lookups */
    logger?: EngineLogger;
}

/**
 * Named Builder Catalog
 *
 * Lookups are not cached: every `find` reads the manifest again, so a
 * manifest that appears later is picked up and a missed lookup is retried.
 *
 * @example
 * ```typescript
 * // resources/eval-config/methods/crossfold.properties:
 * //   builder=evalconf.eval.CrossfoldTaskBuilder
 * const catalog = new NamedBuilderCatalog({ locator, types });
 * catalog.find("crossfold"); // CrossfoldTaskBuilder
 * catalog.find("nope");      // undefined
 * ```
 */
export class NamedBuilderCatalog {
    private readonly locator: ResourceLocator;
    private readonly types: TypeLoader;
    private readonly logger: EngineLogger;

    constructor(config: NamedBuilderCatalogConfig) {
        this.locator = config.locator;
        this.types = config.types;
        this.logger = config.logger ?? createConsoleLogger("NamedBuilderCatalog");
    }

    /**
     * Find a builder with a particular name if it exists.
     *
     * @param name - Builder name; `/` groups names into subdirectories of the methods directory
     * @returns The builder class, or undefined if no manifest exists for `name`
     * @throws InvalidArgumentError if `name` is empty, contains a backslash, or has an empty, `.` or `..` segment
     * @throws ConfigurationError if the manifest does not name a loadable builder
     * @throws ResourceReadError if the manifest cannot be read
     */
    find(name: string): BuilderType | undefined {
        if (!isValidName(name)) {
            throw new InvalidArgumentError(`invalid builder name: ${JSON.stringify(name)}`);
        }

        const path = namedBuilderPath(name);
        this.logger.debug("Looking up named builder", { name, path });

        const [manifest] = this.locator.find(path);
        if (!manifest) {
            this.logger.debug("Named builder manifest not found", { path });
            return undefined;
        }

        const builderName = parseProperties(manifest.read()).get(NAMED_BUILDER_KEY);
        if (!builderName) {
            throw new ConfigurationError(
                `manifest ${manifest.origin} for builder ${name} has no '${NAMED_BUILDER_KEY}' entry`
            );
        }

        let builder: unknown;
        try {
            builder = this.types.load(builderName);
        }
        catch (error) {
            throw new ConfigurationError(
                `cannot find builder class ${builderName} for ${name}: ${describeError(error)}`,
                { cause: error }
            );
        }

        if (!isBuilderType(builder)) {
            throw new ConfigurationError(`class ${builderName} named by ${manifest.origin} is not a builder`);
        }

        return builder;
    }
}

function isValidName(name: string): boolean {
    if (name.length === 0 || name.includes("\\")) {
        return false;
    }
    return name.split("/").every(segment => segment.length > 0 && segment !== "." && segment !== "..");
}
