import { type ProjectConfig, type CaveRegistryEntry, type ProjectDefaults } from '../types/project.js';
import { parseElement } from '../types/element.js';
import { type CaveDefaults, BUILTIN_CAVE_DEFAULTS } from '../io/cave-format.js';
import { isValidCaveSize } from './cave.js';
import * as errors from '../errors.js';
import * as path from 'node:path';

export const PROJECT_FILE_NAME = 'cavemcp.json';

/**
 * Stateful wrapper for a loaded cavemcp.json Project configuration.
 * Manages the cave registry, path resolution, and defaults.
 */
export class ProjectClass {
    /** Tracks whether the project configuration has unsaved changes */
    public isDirty: boolean = false;

    /** The raw JSON-serializable config data */
    private _data: ProjectConfig;

    /** The absolute path to the cavemcp.json file */
    private _path: string;

    /**
     * Internal constructor. Use static create() or fromJSON().
     */
    private constructor(filePath: string, data: ProjectConfig) {
        this._path = filePath;
        this._data = structuredClone(data);
    }

    // ------------------------------------------------------------------------
    // Getters & Meta
    // ------------------------------------------------------------------------

    get path(): string {
        return this._path;
    }

    get name(): string {
        return this._data.name;
    }

    get defaults(): ProjectDefaults | undefined {
        return this._data.defaults ? { ...this._data.defaults } : undefined;
    }

    get caves(): Record<string, CaveRegistryEntry> {
        return { ...this._data.caves };
    }

    /**
     * Returns a summary of the project state for the `project info` tool.
     */
    info() {
        return {
            path: this._path,
            name: this._data.name,
            cavemcp_version: this._data.cavemcp_version,
            created: this._data.created,
            defaults: this.caveDefaults(),
            caves: this._data.caves,
        };
    }

    /**
     * Size and fill for new caves. Missing or invalid project values fall
     * back to the built-in defaults one by one.
     */
    caveDefaults(): CaveDefaults {
        const configured = this._data.defaults ?? {};
        const width = configured.width ?? BUILTIN_CAVE_DEFAULTS.width;
        const height = configured.height ?? BUILTIN_CAVE_DEFAULTS.height;
        const sizeValid = isValidCaveSize(width, height);
        const fill = configured.initial_fill !== undefined ? parseElement(configured.initial_fill) : null;
        return {
            width: sizeValid ? width : BUILTIN_CAVE_DEFAULTS.width,
            height: sizeValid ? height : BUILTIN_CAVE_DEFAULTS.height,
            initialFill: fill ?? BUILTIN_CAVE_DEFAULTS.initialFill,
        };
    }

    // ------------------------------------------------------------------------
    // Registry Management
    // ------------------------------------------------------------------------

    hasCave(name: string): boolean {
        return Object.hasOwn(this._data.caves, name);
    }

    /**
     * Registers a new cave in the project registry.
     */
    registerCave(name: string, entry: CaveRegistryEntry): void {
        if (this.hasCave(name)) {
            throw new Error(errors.caveAlreadyExists(name).content[0].text);
        }
        this._data.caves[name] = { ...entry };
        this.markDirty();
    }

    /**
     * Removes a cave from the project registry.
     * Does not delete the file on disk.
     */
    removeCave(name: string): void {
        if (!this.hasCave(name)) {
            throw new Error(errors.caveNotInRegistry(name).content[0].text);
        }
        // eslint-disable-next-line @typescript-eslint/no-dynamic-delete
        delete this._data.caves[name];
        this.markDirty();
    }

    /**
     * Resolves the absolute filepath for a registered cave.
     */
    resolveCavePath(name: string): string {
        if (!this.hasCave(name)) {
            throw new Error(errors.caveNotInRegistry(name).content[0].text);
        }
        return path.resolve(path.dirname(this._path), this._data.caves[name].path);
    }

    // ------------------------------------------------------------------------
    // Serialization
    // ------------------------------------------------------------------------

    /**
     * Returns the raw config data suitable for JSON serialization.
     */
    toJSON(): ProjectConfig {
        return structuredClone(this._data);
    }

    /**
     * Creates a new, blank project representation in memory.
     * @param filePath The absolute path where the cavemcp.json will be saved.
     * @param name The display name of the project.
     */
    static create(filePath: string, name: string): ProjectClass {
        const data: ProjectConfig = {
            cavemcp_version: '1.0',
            name,
            created: new Date().toISOString(),
            caves: {},
        };
        const proj = new ProjectClass(filePath, data);
        proj.markDirty(); // newly created, needs saving
        return proj;
    }

    /**
     * Instantiates a ProjectClass from loaded JSON data.
     * @param filePath The absolute path of the loaded cavemcp.json.
     * @param data The parsed JSON configuration.
     */
    static fromJSON(filePath: string, data: ProjectConfig): ProjectClass {
        return new ProjectClass(filePath, data);
    }

    markClean(): void {
        this.isDirty = false;
    }

    // ------------------------------------------------------------------------
    // Private Helpers
    // ------------------------------------------------------------------------

    private markDirty(): void {
        this.isDirty = true;
    }
}
