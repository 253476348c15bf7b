/**
 * @fileoverview Builder manifests
 *
 * Manifests are property files (`key=value` lines) found through the resource
 * locator. Logical paths are fixed so that plugins can ship manifests
 * under any resource root.
 *
 * @module @evalconf/engine/registry/manifest
 */

/** Type-keyed manifest: target type name → builder type name. */
export const BUILDERS_MANIFEST_PATH = "eval-config/builders.properties";

/** Directory of name-keyed manifests, one `<name>.properties` per builder. */
export const NAMED_BUILDER_PREFIX = "eval-config/methods/";

/** Suffix of name-keyed manifests. */
export const NAMED_BUILDER_SUFFIX = ".properties";

/** Key in a name-keyed manifest holding the builder type name. */
export const NAMED_BUILDER_KEY = "builder";

/**
 * Parse property-file text into an ordered map.
 *
 * Format:
 * - Lines whose first non-blank character is `#` or `!` are comments; blank lines are skipped
 * - A line ending in an odd number of backslashes continues on the next line,
 *   whose leading whitespace is dropped
 * - The key ends at the first unescaped `=`, `:` or whitespace; whitespace
 *   around a single `=` or `:` separator is skipped, so `key value`,
 *   `key=value` and `key : value` are equivalent
 * - `\t`, `\n`, `\r`, `\f`, `\uXXXX` and `\<char>` escapes are decoded in keys and values
 * - Trailing whitespace of a value is dropped; a line with an empty key is ignored
 * - A repeated key keeps its latest value
 *
 * @param text - Manifest contents
 * @returns Entries in first-seen key order
 *
 * @example
 * ```typescript
 * parseProperties("# builders\nevalconf.data.DataSource = evalconf.data.CsvDataSourceBuilder\n");
 * // Map { "evalconf.data.DataSource" => "evalconf.data.CsvDataSourceBuilder" }
 * ```
 */
export function parseProperties(text: string): Map<string, string> {
    const entries = new Map<string, string>();

    for (const line of logicalLines(text)) {
        const { key, value } = splitEntry(line);
        if (key.length > 0) {
            entries.set(key, value);
        }
    }

    return entries;
}

const WHITESPACE = new Set([" ", "\t", "\f"]);

function logicalLines(text: string): string[] {
    const lines: string[] = [];
    let pending: string | null = null;

    for (const natural of text.split(/\r\n|\r|\n/)) {
        const stripped = natural.replace(/^[ \t\f]+/, "");
        if (pending === null && (stripped.length === 0 || stripped.startsWith("#") || stripped.startsWith("!"))) {
            continue;
        }

        const line: string = (pending ?? "") + stripped;
        if (endsWithContinuation(line)) {
            pending = line.slice(0, -1);
            continue;
        }
        pending = null;
        lines.push(line);
    }

    if (pending !== null) {
        lines.push(pending);
    }
    return lines;
}

function endsWithContinuation(line: string): boolean {
    let backslashes = 0;
    for (let i = line.length - 1; i >= 0 && line[i] === "\\"; i--) {
        backslashes++;
    }
    return backslashes % 2 === 1;
}

function splitEntry(line: string): { key: string; value: string } {
    let end = 0;
    while (end < line.length) {
        const char = line[end];
        if (char === "\\") {
            end += 2;
            continue;
        }
        if (char === "=" || char === ":" || WHITESPACE.has(char)) {
            break;
        }
        end++;
    }

    let start = Math.min(end, line.length);
    while (start < line.length && WHITESPACE.has(line[start])) {
        start++;
    }
    if (line[start] === "=" || line[start] === ":") {
        start++;
    }
    while (start < line.length && WHITESPACE.has(line[start])) {
        start++;
    }

    return {
        key  : unescape(line.slice(0, end)),
        value: unescape(line.slice(start).replace(/(?<!\\)[ \t\f]+$/, "")),
    };
}

function unescape(raw: string): string {
    return raw.replace(/\\(u[0-9a-fA-F]{4}|[\s\S])/g, (_match, escape: string) => {
        switch (escape) {
            case "t":
                return "\t";
            case "n":
                return "\n";
            case "r":
                return "\r";
            case "f":
                return "\f";
            default:
                return escape.length === 5 ? String.fromCharCode(parseInt(escape.slice(1), 16)) : escape;
        }
    });
}

/**
 * Logical path of the manifest for a named builder.
 */
export function namedBuilderPath(name: string): string {
    return `${NAMED_BUILDER_PREFIX}${name}${NAMED_BUILDER_SUFFIX}`;
}
