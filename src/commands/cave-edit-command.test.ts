import { describe, it, expect } from 'vitest';
import { CaveEditCommand } from './cave-edit-command.js';
import { CaveDocumentClass } from '../classes/cave.js';
import { coord } from '../types/coordinate.js';

function makeCave(): CaveDocumentClass {
  return new CaveDocumentClass({
    name: 'intro',
    width: 8,
    height: 8,
    initialFill: 'Dirt',
    objects: [{ type: 'point', p: coord(1, 1), element: 'Wall' }],
  });
}

describe('CaveEditCommand', () => {
  it('applies the action and marks the cave dirty', () => {
    const cave = makeCave();
    const cmd = new CaveEditCommand(cave, 'add Point', () => {
      cave.addObject({ type: 'point', p: coord(2, 2), element: 'Key' });
    });
    cmd.execute();
    expect(cave.objectLines()).toEqual(['Point 1 1 Wall', 'Point 2 2 Key']);
    expect(cave.isDirty).toBe(true);
  });

  it('undo restores the list as it was when the command was created', () => {
    const cave = makeCave();
    const cmd = new CaveEditCommand(cave, 'remove Point', () => {
      cave.removeObject(0);
    });
    cmd.execute();
    cmd.undo();
    expect(cave.objectLines()).toEqual(['Point 1 1 Wall']);
  });

  it('redo restores the result without running the action again', () => {
    const cave = makeCave();
    let runs = 0;
    const cmd = new CaveEditCommand(cave, 'add Point', () => {
      runs++;
      cave.addObject({ type: 'point', p: coord(runs, runs), element: 'Key' });
    });
    cmd.execute();
    cmd.undo();
    cmd.execute();
    expect(runs).toBe(1);
    expect(cave.objectLines()).toEqual(['Point 1 1 Wall', 'Point 1 1 Key']);
  });

  it('is not affected by later in-place edits of live objects', () => {
    const cave = makeCave();
    const cmd = new CaveEditCommand(cave, 'noop', () => {});
    cmd.execute();
    const live = cave.getObject(0);
    if (live.type !== 'point') throw new Error('expected a point');
    live.element = 'Boulder';
    cmd.undo();
    expect(cave.objectLines()).toEqual(['Point 1 1 Wall']);
  });

  it('rolls back and keeps the cave clean when the action throws', () => {
    const cave = makeCave();
    const cmd = new CaveEditCommand(cave, 'broken', () => {
      cave.addObject({ type: 'point', p: coord(5, 5), element: 'Key' });
      cave.removeObject(9);
    });
    expect(() => {
      cmd.execute();
    }).toThrow("Object 9 is out of range. Cave 'intro' has 2 object(s).");
    expect(cave.objectLines()).toEqual(['Point 1 1 Wall']);
    expect(cave.isDirty).toBe(false);
  });
});
