/**
 * Builder Contract
 *
 * A builder is a mutable object that collects configuration from a script
 * and then constructs one instance of its target type.
 *
 * Types and builders are referenced by their class constructors. A type can
 * name its own fallback builder with the {@link DEFAULT_BUILDER} marker; the
 * registry consults the marker only when no explicit mapping exists.
 */

/**
 * Builder instance shape.
 *
 * @typeParam T - Type of the object produced by `build()`
 */
export interface Builder<T = unknown> {
    /** Construct the configured object. */
    build(): T;
}

/**
 * A (possibly abstract) class whose instances are of type `T`.
 *
 * Identity of the constructor object is the registry key.
 */
export type TargetType<T = unknown> = abstract new (...args: never[]) => T;

/**
 * A class whose instances are builders for `T`.
 *
 * Builders are instantiated with no arguments; configuration happens
 * through the builder's own setters after construction.
 */
export type BuilderType<T = unknown> = new () => Builder<T>;

/**
 * Well-known key for the default builder marker.
 *
 * @example
 * ```typescript
 * class CsvDataSource {
 *     static [DEFAULT_BUILDER] = CsvDataSourceBuilder;
 * }
 * ```
 */
export const DEFAULT_BUILDER: unique symbol = Symbol.for("evalconf.defaultBuilder");

/**
 * Type guard for the builder capability contract.
 *
 * A builder type is a constructor whose prototype exposes a `build` method.
 *
 * @param value - Candidate builder class
 * @returns True if `value` can be instantiated as a builder
 */
export function isBuilderType(value: unknown): value is BuilderType {
    if (typeof value !== "function") {
        return false;
    }

    const prototype: unknown = value.prototype;

    return (
        typeof prototype === "object" &&
        prototype !== null &&
        "build" in prototype &&
        typeof prototype.build === "function"
    );
}

/**
 * Type guard for constructors usable as target types.
 */
export function isTargetType(value: unknown): value is TargetType {
    return typeof value === "function" && typeof value.prototype === "object" && value.prototype !== null;
}

/**
 * Read the default builder marker declared directly on `type`.
 *
 * Markers are not inherited: a subclass of a marked class has no default
 * builder unless it declares its own. A marker that does not satisfy the
 * builder contract is ignored.
 *
 * @param type - Target type to inspect
 * @returns The marked builder class, or undefined
 */
export function getDefaultBuilder(type: TargetType): BuilderType | undefined {
    if (!Object.prototype.hasOwnProperty.call(type, DEFAULT_BUILDER)) {
        return undefined;
    }

    const marker: unknown = Reflect.get(type, DEFAULT_BUILDER);
    return isBuilderType(marker) ? marker : undefined;
}

/**
 * Attach a default builder marker to a class defined elsewhere.
 *
 * @param type - Target type to mark
 * @param builder - Builder class used when nothing is registered for `type`
 * @returns The same target type
 */
export function defaultBuilder<T, C extends TargetType<T>>(type: C, builder: BuilderType<T>): C {
    Object.defineProperty(type, DEFAULT_BUILDER, {
        value       : builder,
        configurable: true,
        enumerable  : false,
        writable    : true,
    });
    return type;
}
