/**
 * Core types for the cavemcp.json Project configuration file.
 *
 * A project maps logical cave names to cave files on disk and carries the
 * defaults used when new caves are created.
 */

/**
 * An entry in the project's cave registry.
 */
export interface CaveRegistryEntry {
    /** Cave file path relative to cavemcp.json */
    path: string;
}

/**
 * Default settings applied when creating new caves.
 */
export interface ProjectDefaults {
    /** Width of new caves, in cells */
    width?: number;
    /** Height of new caves, in cells */
    height?: number;
    /** Element name every cell of a new cave starts with */
    initial_fill?: string;
}

/**
 * The complete structure of the cavemcp.json file.
 */
export interface ProjectConfig {
    /** Schema version, e.g., "1.0" */
    cavemcp_version: string;
    /** Display name of the project */
    name: string;
    /** ISO 8601 creation timestamp */
    created?: string;

    /** Fallback properties for new caves */
    defaults?: ProjectDefaults;

    /** Dictionary mapping logical cave names to their registry entries */
    caves: Record<string, CaveRegistryEntry>;
}
