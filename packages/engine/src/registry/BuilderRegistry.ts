/**
 * @fileoverview Builder Registry
 *
 * Type-keyed builder lookup. Resolution order, first match wins:
 * 1. Explicit mapping added with `register` (or loaded from manifests)
 * 2. Default builder marker declared on the type itself
 * 3. Nothing: `resolve` returns undefined, which callers treat as a normal outcome
 *
 * @module @evalconf/engine/registry/BuilderRegistry
 */

import type { BuilderType, TargetType } from "../contracts/Builder.js";
import { getDefaultBuilder, isBuilderType } from "../contracts/Builder.js";
import type { ResourceLocator } from "../contracts/ResourceLocator.js";
import type { TypeLoader } from "../contracts/TypeLoader.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { InvalidArgumentError, TypeLoadError } from "../contracts/ConfigErrors.js";
import { createConsoleLogger } from "../impl/consoleLogger.js";
import { BUILDERS_MANIFEST_PATH, parseProperties } from "./manifest.js";

/**
 * Builder registry configuration.
 */
export interface BuilderRegistryConfig {
    /** Logger for registration and manifest loading */
    logger?: EngineLogger;

    /** Called after every successful registration */
    onRegister?: (type: TargetType, builder: BuilderType) => void;
}

/**
 * Builder Registry
 *
 * Holds the explicit type → builder mappings for the lifetime of an engine.
 * Re-registering a type replaces its builder.
 *
 * @example
 * ```typescript
 * const registry = new BuilderRegistry();
 *
 * registry.register(DataSource, CsvDataSourceBuilder);
 * registry.resolve(DataSource); // CsvDataSourceBuilder
 * ```
 */
export class BuilderRegistry {
    private readonly builders: Map<TargetType, BuilderType> = new Map();
    private readonly logger: EngineLogger;
    private readonly onRegister?: (type: TargetType, builder: BuilderType) => void;

    constructor(config: BuilderRegistryConfig = {}) {
        this.logger = config.logger ?? createConsoleLogger("BuilderRegistry");
        this.onRegister = config.onRegister;
    }

    /**
     * Register a builder class for a type.
     *
     * Used for types that cannot carry a default builder marker themselves.
     *
     * @param type - The type to build
     * @param builder - A builder class producing instances of `type`
     * @returns This registry, for chaining
     * @throws InvalidArgumentError if either argument is missing or `builder` is not a builder class
     */
    register<T>(type: TargetType<T> | null | undefined, builder: BuilderType<T> | null | undefined): this {
        if (type === null || type === undefined) {
            throw new InvalidArgumentError("type cannot be null");
        }
        if (builder === null || builder === undefined) {
            throw new InvalidArgumentError("builder cannot be null");
        }
        const candidate: unknown = builder;
        if (!isBuilderType(candidate)) {
            throw new InvalidArgumentError(`${builder.name || "anonymous class"} is not a builder`);
        }

        this.builders.set(type, builder);
        this.logger.debug("Builder registered", { type: type.name, builder: builder.name });
        this.onRegister?.(type, builder);
        return this;
    }

    /**
     * Find the builder for a type.
     *
     * @param type - A type that needs to be built
     * @returns A builder class for `type`, or undefined if none is known
     */
    resolve<T>(type: TargetType<T>): BuilderType<T> | undefined;
    resolve(type: TargetType): BuilderType | undefined {
        return this.builders.get(type) ?? getDefaultBuilder(type);
    }

    /**
     * Whether an explicit mapping exists for `type` (markers are not consulted).
     */
    has(type: TargetType): boolean {
        return this.builders.has(type);
    }

    /**
     * Number of explicit mappings.
     */
    get size(): number {
        return this.builders.size;
    }

    /**
     * Snapshot of the explicit mappings, in registration order.
     */
    entries(): Array<[TargetType, BuilderType]> {
        return Array.from(this.builders.entries());
    }

    /**
     * Register the default builders declared in every discoverable
     * `eval-config/builders.properties` manifest.
     *
     * All manifests are merged first, in discovery order, so a later manifest
     * overrides an earlier one for the same type name. Entries are then
     * resolved eagerly; an entry naming an unknown type, an unknown builder,
     * or a class that is not a builder is logged and skipped.
     *
     * @param locator - Resource lookup used to discover manifests
     * @param types - Type loader used to resolve names in the manifests
     * @returns Number of mappings registered
     * @throws ResourceReadError if a discovered manifest cannot be read
     */
    loadDefaults(locator: ResourceLocator, types: TypeLoader): number {
        const merged = new Map<string, string>();

        for (const manifest of locator.find(BUILDERS_MANIFEST_PATH)) {
            this.logger.debug("Reading builder manifest", { origin: manifest.origin });
            for (const [typeName, builderName] of parseProperties(manifest.read())) {
                merged.set(typeName, builderName);
            }
        }

        let registered = 0;
        for (const [typeName, builderName] of merged) {
            const type = this.tryLoad(types, typeName);
            if (!type) {
                this.logger.warn("Builder registered for nonexistent type", { type: typeName });
                continue;
            }

            const builder = this.tryLoad(types, builderName);
            if (!builder) {
                this.logger.error("Builder class not found", { type: typeName, builder: builderName });
                continue;
            }
            if (!isBuilderType(builder)) {
                this.logger.error("Class is not a builder", { type: typeName, builder: builderName });
                continue;
            }

            this.register(type, builder);
            registered++;
        }

        this.logger.info("Default builders loaded", { entries: merged.size, registered });
        return registered;
    }

    private tryLoad(types: TypeLoader, name: string): TargetType | undefined {
        try {
            return types.load(name);
        }
        catch (error) {
            if (error instanceof TypeLoadError) {
                return undefined;
            }
            throw error;
        }
    }
}
