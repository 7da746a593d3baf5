import { describe, it, expect } from 'vitest';
import { CommandHistory } from './command.js';
import { CaveEditCommand } from './cave-edit-command.js';
import { CaveDocumentClass } from '../classes/cave.js';
import { coord } from '../types/coordinate.js';

function makeCave(name = 'intro'): CaveDocumentClass {
  return new CaveDocumentClass({ name, width: 6, height: 4, initialFill: 'Dirt', objects: [] });
}

function addPoint(cave: CaveDocumentClass, x: number, y: number): CaveEditCommand {
  return new CaveEditCommand(cave, `add Point ${String(x)},${String(y)}`, () => {
    cave.addObject({ type: 'point', p: coord(x, y), element: 'Wall' });
  });
}

describe('CommandHistory', () => {
  it('push() runs the edit and records it', () => {
    const cave = makeCave();
    const history = new CommandHistory();
    history.push(addPoint(cave, 1, 1));
    expect(cave.objectLines()).toEqual(['Point 1 1 Wall']);
    expect(history.undoDepth).toBe(1);
    expect(history.redoDepth).toBe(0);
  });

  it('undo() and redo() return the command so its label can be reported', () => {
    const cave = makeCave();
    const history = new CommandHistory();
    history.push(addPoint(cave, 1, 1));
    history.push(addPoint(cave, 2, 2));

    expect(history.undo()?.label).toBe('add Point 2,2');
    expect(cave.objectLines()).toEqual(['Point 1 1 Wall']);
    expect(history.redo()?.label).toBe('add Point 2,2');
    expect(cave.objectLines()).toEqual(['Point 1 1 Wall', 'Point 2 2 Wall']);
  });

  it('returns undefined with nothing to undo or redo', () => {
    const history = new CommandHistory();
    expect(history.undo()).toBeUndefined();
    expect(history.redo()).toBeUndefined();
  });

  it('a new edit after an undo discards the redo path', () => {
    const cave = makeCave();
    const history = new CommandHistory();
    history.push(addPoint(cave, 1, 1));
    history.push(addPoint(cave, 2, 2));
    history.undo();
    expect(history.redoDepth).toBe(1);

    history.push(addPoint(cave, 3, 3));
    expect(history.redoDepth).toBe(0);
    expect(history.redo()).toBeUndefined();
    expect(cave.objectLines()).toEqual(['Point 1 1 Wall', 'Point 3 3 Wall']);
  });

  it('walks back and forth through several edits', () => {
    const cave = makeCave();
    const history = new CommandHistory();
    history.push(addPoint(cave, 0, 0));
    history.push(
      new CaveEditCommand(cave, 'move #0 to (5,3)', () => {
        cave.replaceObject(0, { type: 'point', p: coord(5, 3), element: 'Wall' });
      }),
    );
    history.push(addPoint(cave, 2, 1));

    history.undo();
    history.undo();
    expect(cave.objectLines()).toEqual(['Point 0 0 Wall']);
    history.redo();
    expect(cave.objectLines()).toEqual(['Point 5 3 Wall']);
    history.undo();
    history.undo();
    expect(cave.objectLines()).toEqual([]);
    history.redo();
    history.redo();
    history.redo();
    expect(cave.objectLines()).toEqual(['Point 5 3 Wall', 'Point 2 1 Wall']);
  });

  it('keeps at most maxDepth edits and forgets the oldest', () => {
    const cave = makeCave();
    const history = new CommandHistory(2);
    history.push(addPoint(cave, 1, 0));
    history.push(addPoint(cave, 2, 0));
    history.push(addPoint(cave, 3, 0));
    expect(history.undoDepth).toBe(2);

    expect(history.undo()?.label).toBe('add Point 3,0');
    expect(history.undo()?.label).toBe('add Point 2,0');
    expect(history.undo()).toBeUndefined();
    expect(cave.objectLines()).toEqual(['Point 1 0 Wall']);
  });

  it('records nothing when the edit fails, and keeps the redo path', () => {
    const cave = makeCave();
    const history = new CommandHistory();
    history.push(addPoint(cave, 1, 1));
    history.push(addPoint(cave, 2, 2));
    history.undo();

    const failing = new CaveEditCommand(cave, 'remove #4', () => {
      cave.removeObject(4);
    });
    expect(() => {
      history.push(failing);
    }).toThrow("Object 4 is out of range. Cave 'intro' has 1 object(s).");
    expect(history.undoDepth).toBe(1);
    expect(history.redoDepth).toBe(1);
    expect(cave.objectLines()).toEqual(['Point 1 1 Wall']);
  });

  it('discard() drops the edits of one cave from both stacks', () => {
    const intro = makeCave('intro');
    const finale = makeCave('finale');
    const history = new CommandHistory();
    history.push(addPoint(intro, 1, 1));
    history.push(addPoint(finale, 2, 2));
    history.push(addPoint(intro, 3, 3));
    history.undo();

    history.discard((cmd) => cmd instanceof CaveEditCommand && cmd.cave === intro);
    expect(history.undoDepth).toBe(1);
    expect(history.redoDepth).toBe(0);
    expect(history.undo()?.label).toBe('add Point 2,2');
    expect(finale.objectLines()).toEqual([]);
    expect(intro.objectLines()).toEqual(['Point 1 1 Wall']);
  });

  it('clear() empties both stacks', () => {
    const cave = makeCave();
    const history = new CommandHistory();
    history.push(addPoint(cave, 1, 1));
    history.push(addPoint(cave, 2, 2));
    history.undo();
    history.clear();
    expect(history.undoDepth).toBe(0);
    expect(history.redoDepth).toBe(0);
  });
});
