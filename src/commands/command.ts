/**
 * Command interface for the undo/redo system.
 *
 * Concrete implementations capture an immutable snapshot of the before-state
 * at creation time. `execute()` applies the mutation; `undo()` restores
 * the captured snapshot.
 */
export interface Command {
  /** Short human-readable summary, reported by undo/redo */
  readonly label: string;
  execute(): void;
  undo(): void;
}

/**
 * Manages undo/redo stacks of Command objects.
 *
 * `push()` executes the command and adds it to the undo stack.
 * New pushes clear the redo stack (branching invalidates the redo path).
 * Stack depth is capped at `maxDepth`; the oldest commands are dropped.
 */
export class CommandHistory {
  private _undoStack: Command[] = [];
  private _redoStack: Command[] = [];
  private readonly _maxDepth: number;

  constructor(maxDepth: number = 100) {
    this._maxDepth = maxDepth;
  }

  /**
   * Executes the command and records it. If execution throws, nothing is
   * recorded and the redo stack is kept.
   */
  push(cmd: Command): void {
    cmd.execute();
    this._undoStack.push(cmd);
    this._redoStack = [];
    if (this._undoStack.length > this._maxDepth) {
      this._undoStack.shift();
    }
  }

  /**
   * Undoes the most recent command and returns it, or undefined if there is none.
   */
  undo(): Command | undefined {
    const cmd = this._undoStack.pop();
    if (cmd === undefined) return undefined;
    cmd.undo();
    this._redoStack.push(cmd);
    return cmd;
  }

  /**
   * Re-applies the most recently undone command and returns it, or undefined.
   */
  redo(): Command | undefined {
    const cmd = this._redoStack.pop();
    if (cmd === undefined) return undefined;
    cmd.execute();
    this._undoStack.push(cmd);
    return cmd;
  }

  get undoDepth(): number {
    return this._undoStack.length;
  }

  get redoDepth(): number {
    return this._redoStack.length;
  }

  /**
   * Drops every command that satisfies the predicate, e.g. those of a cave
   * that was unloaded.
   */
  discard(predicate: (cmd: Command) => boolean): void {
    this._undoStack = this._undoStack.filter((cmd) => !predicate(cmd));
    this._redoStack = this._redoStack.filter((cmd) => !predicate(cmd));
  }

  clear(): void {
    this._undoStack = [];
    this._redoStack = [];
  }
}
