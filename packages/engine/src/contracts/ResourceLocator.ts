/**
 * Resource Locator Contract
 *
 * Resolves logical resource paths (e.g. `eval-config/builders.properties`)
 * against the host's resource roots. The same logical path may exist under
 * several roots; all of them are returned in discovery order.
 */

/**
 * One discovered copy of a resource.
 */
export interface ResourceHandle {
    /** Where the resource was found (file path, URL, or a test label) */
    readonly origin: string;

    /**
     * Read the resource as UTF-8 text.
     *
     * @throws ResourceReadError if the resource cannot be read
     */
    read(): string;
}

/**
 * Resource lookup capability supplied by the host.
 */
export interface ResourceLocator {
    /**
     * Find every copy of a logical resource path.
     *
     * @param path - Forward-slash separated logical path
     * @returns Handles in discovery order; empty when the resource does not exist
     */
    find(path: string): ResourceHandle[];
}
