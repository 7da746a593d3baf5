import { type Command } from './command.js';
import { type CaveDocumentClass } from '../classes/cave.js';
import { type CaveObject } from '../types/cave-object.js';

/**
 * Undoable edit of a cave's object list.
 *
 * The object list is snapshotted (deep, through the objects' own clone) when
 * the command is created and again after the first execution; redo restores
 * the after-snapshot instead of running the action twice.
 */
export class CaveEditCommand implements Command {
    private readonly before: CaveObject[];
    private after: CaveObject[] | null = null;
    private readonly wasDirty: boolean;

    constructor(
        readonly cave: CaveDocumentClass,
        readonly label: string,
        private action: () => void,
    ) {
        this.before = cave.snapshot();
        this.wasDirty = cave.isDirty;
    }

    execute(): void {
        if (this.after !== null) {
            this.cave.restore(this.after);
            return;
        }
        try {
            this.action();
        } catch (e: unknown) {
            this.cave.restore(this.before);
            if (!this.wasDirty) this.cave.markClean();
            throw e;
        }
        this.after = this.cave.snapshot();
        this.cave.markDirty();
    }

    undo(): void {
        this.cave.restore(this.before);
    }
}
