import { describe, it, expect, beforeEach } from 'vitest';
import { handleCaveTool } from './cave.js';
import { type ToolResponse } from './respond.js';
import { WorkspaceClass } from '../classes/workspace.js';
import { ProjectClass } from '../classes/project.js';
import { geometryFrom } from '../objects/geometry.js';

function body(result: ToolResponse): unknown {
    return JSON.parse(result.content[0].text);
}

describe('cave tool', () => {
    let workspace: WorkspaceClass;

    beforeEach(() => {
        WorkspaceClass.reset();
        workspace = WorkspaceClass.instance();
    });

    function setupProject(): void {
        workspace.setProject(ProjectClass.create('/tmp/demo/cavemcp.json', 'Demo'));
    }

    // ─── create ──────────────────────────────────────────────────────

    it('create adds a cave with the given size', async () => {
        setupProject();
        const result = await handleCaveTool({ action: 'create', cave_name: 'intro', width: 8, height: 4 });
        expect(body(result)).toEqual({
            message: "Cave 'intro' created.",
            name: 'intro',
            width: 8,
            height: 4,
            initial_fill: 'Dirt',
            objects: 0,
            isDirty: true,
        });
        expect(workspace.project?.hasCave('intro')).toBe(true);
    });

    it('create requires a project and a name', async () => {
        const noProject = await handleCaveTool({ action: 'create', cave_name: 'intro' });
        expect(noProject.content[0].text).toBe('No project loaded. Call project init or project open first.');

        setupProject();
        const noName = await handleCaveTool({ action: 'create' });
        expect(noName.content[0].text).toBe('Invalid argument: cave create requires "cave_name".');
    });

    it('create rejects a duplicate name', async () => {
        setupProject();
        await handleCaveTool({ action: 'create', cave_name: 'intro' });
        const result = await handleCaveTool({ action: 'create', cave_name: 'intro' });
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe("Cave 'intro' already exists in the project registry.");
    });

    // ─── info / render ───────────────────────────────────────────────

    it('info errors when no cave is loaded', async () => {
        const result = await handleCaveTool({ action: 'info' });
        expect(result.content[0].text).toBe('No caves loaded in workspace.');
    });

    it('info errors for a cave that is not loaded', async () => {
        const result = await handleCaveTool({ action: 'info', cave_name: 'finale' });
        expect(result.content[0].text).toBe("Cave 'finale' is not loaded in the workspace.");
    });

    it('info defaults to the first loaded cave', async () => {
        setupProject();
        await handleCaveTool({ action: 'create', cave_name: 'intro', width: 8, height: 4 });
        await handleCaveTool({ action: 'create', cave_name: 'finale' });
        const result = await handleCaveTool({ action: 'info' });
        expect(body(result)).toMatchObject({ name: 'intro', width: 8 });
    });

    it('render draws the objects and lists the glyphs in use', async () => {
        setupProject();
        await handleCaveTool({ action: 'create', cave_name: 'intro', width: 5, height: 3, initial_fill: 'Empty' });
        const cave = workspace.getCave('intro');
        cave.addObject({ type: 'rectangle', corners: geometryFrom(0, 0, 4, 2), element: 'Wall' });

        const result = await handleCaveTool({ action: 'render', cave_name: 'intro' });
        expect(body(result)).toEqual({
            width: 5,
            height: 3,
            rows: ['wwwww', 'w   w', 'wwwww'],
            legend: { ' ': 'Empty', w: 'Wall' },
        });
    });

    // ─── resize / set_fill ───────────────────────────────────────────

    it('resize changes the size', async () => {
        setupProject();
        await handleCaveTool({ action: 'create', cave_name: 'intro' });
        const result = await handleCaveTool({ action: 'resize', width: 12, height: 9 });
        expect(body(result)).toMatchObject({ message: "Cave 'intro' resized.", width: 12, height: 9 });
    });

    it('resize requires both dimensions', async () => {
        setupProject();
        await handleCaveTool({ action: 'create', cave_name: 'intro' });
        const result = await handleCaveTool({ action: 'resize', width: 12 });
        expect(result.content[0].text).toBe('Invalid argument: cave resize requires "width" and "height".');
    });

    it('resize rejects an invalid size', async () => {
        setupProject();
        await handleCaveTool({ action: 'create', cave_name: 'intro' });
        const result = await handleCaveTool({ action: 'resize', width: 0, height: 9 });
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe('Cave size 0x9 is invalid. Width and height must be integers in 1-1000.');
    });

    it('set_fill changes the initial element', async () => {
        setupProject();
        await handleCaveTool({ action: 'create', cave_name: 'intro', width: 2, height: 1 });
        const result = await handleCaveTool({ action: 'set_fill', initial_fill: 'Boulder' });
        expect(body(result)).toMatchObject({
            message: "Cave 'intro' now starts filled with Boulder.",
            initial_fill: 'Boulder',
        });
        expect(workspace.getCave('intro').render().toRows()).toEqual(['rr']);
    });

    it('set_fill requires an element', async () => {
        setupProject();
        await handleCaveTool({ action: 'create', cave_name: 'intro' });
        const result = await handleCaveTool({ action: 'set_fill' });
        expect(result.content[0].text).toBe('Invalid argument: cave set_fill requires "initial_fill".');
    });
});
