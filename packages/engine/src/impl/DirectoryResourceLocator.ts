/**
 * @fileoverview Directory-backed resource locator
 *
 * Resolves logical resource paths against an ordered list of root
 * directories, the way a module path is searched.
 *
 * @module @evalconf/engine/impl/DirectoryResourceLocator
 */

import { existsSync, readFileSync, statSync } from "fs";
import { join, resolve } from "path";
import type { ResourceHandle, ResourceLocator } from "../contracts/ResourceLocator.js";
import { ResourceReadError } from "../contracts/ConfigErrors.js";

/**
 * Resource locator over a list of directories.
 *
 * Roots are searched in the order given; a resource present under several
 * roots yields one handle per root.
 *
 * @example
 * ```typescript
 * const locator = new DirectoryResourceLocator(["./resources", "./plugins/resources"]);
 * const manifests = locator.find("eval-config/builders.properties");
 * ```
 */
export class DirectoryResourceLocator implements ResourceLocator {
    private readonly roots: readonly string[];

    constructor(roots: readonly string[]) {
        this.roots = roots.map(root => resolve(root));
    }

    find(path: string): ResourceHandle[] {
        const segments = path.split("/").filter(segment => segment.length > 0);
        const handles: ResourceHandle[] = [];

        for (const root of this.roots) {
            const filePath = join(root, ...segments);
            if (!existsSync(filePath) || !statSync(filePath).isFile()) {
                continue;
            }

            handles.push({
                origin: filePath,
                read  : () => {
                    try {
                        return readFileSync(filePath, "utf-8");
                    }
                    catch (error) {
                        throw new ResourceReadError(filePath, { cause: error });
                    }
                },
            });
        }

        return handles;
    }
}
