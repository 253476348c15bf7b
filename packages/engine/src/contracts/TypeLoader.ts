/**
 * Type Loader Contract
 *
 * Maps stable, fully-qualified type names (e.g. `evalconf.data.CsvDataSource`)
 * to runtime constructors. Manifests and scripts refer to types only by name;
 * the type loader is the single place those names become classes.
 */

import type { TargetType } from "./Builder.js";

/**
 * Type loading capability supplied by the host.
 */
export interface TypeLoader {
    /**
     * Load the type registered under a fully-qualified name.
     *
     * @param name - Fully-qualified type name
     * @returns The constructor registered under `name`
     * @throws TypeLoadError if no type is known by that name
     */
    load(name: string): TargetType;

    /**
     * Check whether a fully-qualified name is known.
     */
    has(name: string): boolean;
}
