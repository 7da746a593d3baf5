import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import { WorkspaceClass, getWorkspace } from './workspace.js';
import { ProjectClass } from './project.js';
import { coord } from '../types/coordinate.js';
import * as caveIo from '../io/cave-io.js';
import * as projectIo from '../io/project-io.js';

// Mock file I/O so tests don't touch disk
vi.mock('../io/cave-io.js', () => ({
  loadCaveFile: vi.fn(),
  saveCaveFile: vi.fn(),
}));

vi.mock('../io/project-io.js', () => ({
  loadProjectFile: vi.fn(),
  saveProjectFile: vi.fn(),
}));

const PROJECT_PATH = '/tmp/demo/cavemcp.json';
const INTRO_PATH = path.resolve('/tmp/demo', 'caves/intro.cave');

describe('WorkspaceClass', () => {
  let workspace: WorkspaceClass;

  beforeEach(() => {
    WorkspaceClass.reset();
    workspace = WorkspaceClass.instance();
    vi.mocked(caveIo.loadCaveFile).mockResolvedValue({
      data: { name: 'intro', width: 10, height: 6, initialFill: 'Dirt', objects: [] },
      warnings: [{ severity: 'warning', message: 'Reading cave file intro.cave, line 4: Unknown attribute, ignored: X=1' }],
    });
    vi.mocked(caveIo.saveCaveFile).mockResolvedValue(undefined);
    vi.mocked(projectIo.saveProjectFile).mockResolvedValue(undefined);
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  function setupProject(): ProjectClass {
    const project = ProjectClass.fromJSON(PROJECT_PATH, {
      cavemcp_version: '1.0',
      name: 'Demo',
      caves: { intro: { path: 'caves/intro.cave' } },
    });
    workspace.setProject(project);
    return project;
  }

  function addPoint(x: number): void {
    const cave = workspace.getCave('intro');
    workspace.edit(cave, `add point ${String(x)}`, () => {
      cave.addObject({ type: 'point', p: coord(x, 0), element: 'Diamond' });
    });
  }

  it('returns the same singleton instance', () => {
    expect(WorkspaceClass.instance()).toBe(workspace);
    expect(getWorkspace()).toBe(workspace);
  });

  it('reset clears the singleton', () => {
    setupProject();
    WorkspaceClass.reset();
    expect(WorkspaceClass.instance()).not.toBe(workspace);
    expect(WorkspaceClass.instance().project).toBeNull();
  });

  it('loads a registered cave from its resolved path', async () => {
    setupProject();
    const warnings = await workspace.loadCave('intro');

    expect(caveIo.loadCaveFile).toHaveBeenCalledWith(INTRO_PATH, 'intro', { width: 40, height: 22, initialFill: 'Dirt' });
    expect(warnings).toHaveLength(1);
    expect(workspace.getCave('intro').width).toBe(10);
  });

  it('throws when loading without a project or an unknown cave', async () => {
    await expect(workspace.loadCave('intro')).rejects.toThrow('No project loaded.');
    setupProject();
    await expect(workspace.loadCave('nope')).rejects.toThrow("Cave 'nope' not found in project registry.");
  });

  it('throws when getting an unloaded cave', () => {
    expect(() => workspace.getCave('intro')).toThrow("Cave 'intro' is not loaded in the workspace.");
  });

  it('creates a cave with the project defaults', () => {
    const project = setupProject();
    const cave = workspace.createCave('finale', { width: 12 });

    expect(cave.info()).toEqual({ name: 'finale', width: 12, height: 22, initial_fill: 'Dirt', objects: 0, isDirty: true });
    expect(project.caves.finale).toEqual({ path: 'caves/finale.cave' });
    expect(project.isDirty).toBe(true);
    expect(() => workspace.createCave('intro')).toThrow("Cave 'intro' already exists in the project registry.");
  });

  it('saves the cave and a changed project registry', async () => {
    const project = setupProject();
    const cave = workspace.createCave('finale');

    const saved = await workspace.saveCave('finale');

    expect(saved).toBe(path.resolve('/tmp/demo', 'caves/finale.cave'));
    expect(caveIo.saveCaveFile).toHaveBeenCalledWith(saved, cave.toData());
    expect(projectIo.saveProjectFile).toHaveBeenCalledWith(PROJECT_PATH, project.toJSON());
    expect(cave.isDirty).toBe(false);
    expect(project.isDirty).toBe(false);
  });

  it('does not rewrite an unchanged project', async () => {
    setupProject();
    await workspace.loadCave('intro');
    await workspace.saveCave('intro');
    expect(projectIo.saveProjectFile).not.toHaveBeenCalled();
  });

  it('unloads a cave and reports unsaved changes', async () => {
    setupProject();
    await workspace.loadCave('intro');
    addPoint(1);

    expect(workspace.unloadCave('intro')).toEqual({ hadUnsavedChanges: true });
    expect(workspace.loadedCaves.size).toBe(0);
    expect(workspace.undoDepth).toBe(0);
  });

  describe('history', () => {
    it('records edits and undoes them in reverse order', async () => {
      setupProject();
      await workspace.loadCave('intro');
      addPoint(1);
      addPoint(2);
      expect(workspace.undoDepth).toBe(2);

      expect(workspace.undo()?.label).toBe('add point 2');
      expect(workspace.getCave('intro').objectLines()).toEqual(['Point 1 0 Diamond']);
      expect(workspace.redo()?.label).toBe('add point 2');
      expect(workspace.getCave('intro').objectCount).toBe(2);
    });

    it('returns undefined when there is nothing to undo or redo', () => {
      expect(workspace.undo()).toBeUndefined();
      expect(workspace.redo()).toBeUndefined();
    });

    it('drops the history of a reloaded cave', async () => {
      setupProject();
      await workspace.loadCave('intro');
      addPoint(1);
      await workspace.loadCave('intro');
      expect(workspace.undoDepth).toBe(0);
    });

    it('does not record a failed edit', async () => {
      setupProject();
      await workspace.loadCave('intro');
      const cave = workspace.getCave('intro');
      expect(() => {
        workspace.edit(cave, 'remove #3', () => {
          cave.removeObject(3);
        });
      }).toThrow("Object 3 is out of range. Cave 'intro' has 0 object(s).");
      expect(workspace.undoDepth).toBe(0);
    });
  });

  it('setProject unloads caves and clears history', async () => {
    setupProject();
    await workspace.loadCave('intro');
    addPoint(1);
    setupProject();
    expect(workspace.loadedCaves.size).toBe(0);
    expect(workspace.undoDepth).toBe(0);
  });

  it('info returns correct workspace summary', async () => {
    setupProject();
    await workspace.loadCave('intro');
    addPoint(3);

    expect(workspace.info()).toEqual({
      project: { name: 'Demo', path: PROJECT_PATH },
      loadedCaves: [{ name: 'intro', isDirty: true }],
      undoDepth: 1,
      redoDepth: 0,
    });
  });
});
