import { type LogMessage } from './logger.js';
import { type Element } from '../types/element.js';
import { loadCaveFile, saveCaveFile } from '../io/cave-io.js';
import { saveProjectFile } from '../io/project-io.js';
import { type Command, CommandHistory } from '../commands/command.js';
import { CaveEditCommand } from '../commands/cave-edit-command.js';
import { CaveDocumentClass } from './cave.js';
import { type ProjectClass } from './project.js';
import * as errors from '../errors.js';

/**
 * In-memory editing session singleton.
 * Holds the project, loaded caves and the undo/redo history.
 * Lives only for the duration of the server session.
 */
export class WorkspaceClass {
    private static _instance: WorkspaceClass | null = null;

    /** The active project configuration, or null if no project is loaded. */
    public project: ProjectClass | null = null;

    /** Loaded caves keyed by their logical registry name. */
    public readonly loadedCaves: Map<string, CaveDocumentClass> = new Map();

    /** Command history for undo/redo, shared by every loaded cave. */
    private _history = new CommandHistory();

    private constructor() {
        // Singleton: use WorkspaceClass.instance()
    }

    /**
     * Returns the singleton WorkspaceClass instance.
     */
    static instance(): WorkspaceClass {
        if (WorkspaceClass._instance === null) {
            WorkspaceClass._instance = new WorkspaceClass();
        }
        return WorkspaceClass._instance;
    }

    /**
     * Resets the singleton for testing. Clears all state.
     */
    static reset(): void {
        WorkspaceClass._instance = null;
    }

    // ------------------------------------------------------------------------
    // Project Management
    // ------------------------------------------------------------------------

    /**
     * Sets the active project. Caves of the previous project are unloaded.
     */
    setProject(project: ProjectClass): void {
        this.project = project;
        this.loadedCaves.clear();
        this._history.clear();
    }

    private requireProject(): ProjectClass {
        if (!this.project) {
            throw new Error(errors.noProjectLoaded().content[0].text);
        }
        return this.project;
    }

    // ------------------------------------------------------------------------
    // Cave Lifecycle
    // ------------------------------------------------------------------------

    /**
     * Returns a loaded cave by name. Throws if not loaded.
     */
    getCave(name: string): CaveDocumentClass {
        const cave = this.loadedCaves.get(name);
        if (cave === undefined) {
            throw new Error(errors.caveNotLoaded(name).content[0].text);
        }
        return cave;
    }

    /**
     * Creates a new, empty cave, registers it in the project as
     * `caves/<name>.cave` and loads it. Not written to disk until saved.
     */
    createCave(name: string, overrides: { width?: number; height?: number; initialFill?: Element } = {}): CaveDocumentClass {
        const project = this.requireProject();
        if (project.hasCave(name)) {
            throw new Error(errors.caveAlreadyExists(name).content[0].text);
        }
        const defaults = project.caveDefaults();
        const cave = new CaveDocumentClass({
            name,
            width: overrides.width ?? defaults.width,
            height: overrides.height ?? defaults.height,
            initialFill: overrides.initialFill ?? defaults.initialFill,
            objects: [],
        });
        project.registerCave(name, { path: `caves/${name}.cave` });
        cave.markDirty();
        this.loadedCaves.set(name, cave);
        return cave;
    }

    /**
     * Loads a registered cave from disk, replacing any loaded copy.
     * Returns the warnings collected while parsing the file.
     */
    async loadCave(name: string): Promise<LogMessage[]> {
        const project = this.requireProject();
        const filePath = project.resolveCavePath(name);
        const { data, warnings } = await loadCaveFile(filePath, name, project.caveDefaults());
        const cave = new CaveDocumentClass(data);
        this.dropHistoryOf(this.loadedCaves.get(name));
        this.loadedCaves.set(name, cave);
        return warnings;
    }

    /**
     * Writes a loaded cave to its registered path and marks it clean.
     * A project whose registry changed (e.g. by createCave) is saved too.
     */
    async saveCave(name: string): Promise<string> {
        const project = this.requireProject();
        const cave = this.getCave(name);
        const filePath = project.resolveCavePath(name);
        await saveCaveFile(filePath, cave.toData());
        cave.markClean();
        if (project.isDirty) {
            await saveProjectFile(project.path, project.toJSON());
            project.markClean();
        }
        return filePath;
    }

    /**
     * Removes a cave from the workspace.
     * Returns whether the cave had unsaved changes (for warning the caller).
     */
    unloadCave(name: string): { hadUnsavedChanges: boolean } {
        const cave = this.getCave(name);
        this.dropHistoryOf(cave);
        this.loadedCaves.delete(name);
        return { hadUnsavedChanges: cave.isDirty };
    }

    private dropHistoryOf(cave: CaveDocumentClass | undefined): void {
        if (cave === undefined) return;
        this._history.discard((cmd) => cmd instanceof CaveEditCommand && cmd.cave === cave);
    }

    // ------------------------------------------------------------------------
    // History
    // ------------------------------------------------------------------------

    /**
     * Applies an edit to a cave's object list as an undoable command.
     */
    edit(cave: CaveDocumentClass, label: string, action: () => void): void {
        this._history.push(new CaveEditCommand(cave, label, action));
    }

    undo(): Command | undefined {
        return this._history.undo();
    }

    redo(): Command | undefined {
        return this._history.redo();
    }

    get undoDepth(): number {
        return this._history.undoDepth;
    }

    get redoDepth(): number {
        return this._history.redoDepth;
    }

    // ------------------------------------------------------------------------
    // Session Info
    // ------------------------------------------------------------------------

    /**
     * Returns a summary of the current workspace state.
     */
    info() {
        return {
            project: this.project
                ? { name: this.project.name, path: this.project.path }
                : null,
            loadedCaves: [...this.loadedCaves].map(([name, cave]) => ({ name, isDirty: cave.isDirty })),
            undoDepth: this.undoDepth,
            redoDepth: this.redoDepth,
        };
    }
}

/**
 * Module-level accessor for the workspace singleton.
 * Tool handlers import this function to get the workspace.
 */
export function getWorkspace(): WorkspaceClass {
    return WorkspaceClass.instance();
}
