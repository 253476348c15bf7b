/**
 * @fileoverview Registry barrel exports
 *
 * @module @evalconf/engine/registry
 */

export { BuilderRegistry, type BuilderRegistryConfig } from "./BuilderRegistry.js";
export { NamedBuilderCatalog, type NamedBuilderCatalogConfig } from "./NamedBuilderCatalog.js";
export {
    BUILDERS_MANIFEST_PATH,
    NAMED_BUILDER_PREFIX,
    NAMED_BUILDER_SUFFIX,
    NAMED_BUILDER_KEY,
    namedBuilderPath,
    parseProperties,
} from "./manifest.js";
