/**
 * @fileoverview Table-backed type loader
 *
 * Maps fully-qualified type names to constructors registered up front,
 * either by hand or by the ModuleLoader discovery step.
 *
 * @module @evalconf/engine/impl/StaticTypeLoader
 */

import type { TargetType } from "../contracts/Builder.js";
import { isTargetType } from "../contracts/Builder.js";
import type { TypeLoader } from "../contracts/TypeLoader.js";
import { InvalidArgumentError, TypeLoadError } from "../contracts/ConfigErrors.js";

/**
 * Type loader over a static name → constructor table.
 *
 * @example
 * ```typescript
 * const types = new StaticTypeLoader()
 *     .define("evalconf.data.DataSource", DataSource)
 *     .define("evalconf.data.CsvDataSourceBuilder", CsvDataSourceBuilder);
 *
 * types.load("evalconf.data.DataSource"); // DataSource
 * ```
 */
export class StaticTypeLoader implements TypeLoader {
    private readonly types: Map<string, TargetType> = new Map();

    /**
     * Register a constructor under a fully-qualified name.
     *
     * Re-defining a name replaces the previous entry.
     *
     * @param name - Fully-qualified type name
     * @param type - Class constructor
     * @returns This loader, for chaining
     * @throws InvalidArgumentError if the name is blank or `type` is not a class
     */
    define(name: string, type: TargetType): this {
        if (name.trim().length === 0) {
            throw new InvalidArgumentError("type name cannot be empty");
        }
        if (!isTargetType(type)) {
            throw new InvalidArgumentError(`type ${name} is not a constructor`);
        }

        this.types.set(name, type);
        return this;
    }

    load(name: string): TargetType {
        const type = this.types.get(name);
        if (!type) {
            throw new TypeLoadError(name);
        }
        return type;
    }

    has(name: string): boolean {
        return this.types.has(name);
    }

    /**
     * Registered names, in definition order.
     */
    names(): string[] {
        return Array.from(this.types.keys());
    }
}
