import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type CaveDocumentClass, MAX_CAVE_SIZE } from '../classes/cave.js';
import { type WorkspaceClass, getWorkspace } from '../classes/workspace.js';
import { ELEMENTS, type Element, elementGlyph } from '../types/element.js';
import { type ToolResponse, jsonResult } from './respond.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `cave` tool.
 *
 * - `create`: cave_name required; width, height, initial_fill default to the project defaults
 * - `info`, `render`: operate on cave_name, or the first loaded cave
 * - `resize`: width and height required
 * - `set_fill`: initial_fill required
 */
const caveInputSchema = {
    action: z.enum(['create', 'info', 'render', 'resize', 'set_fill']).describe(
        'Action to perform: create (new cave in the project), info, render (text preview), resize, set_fill (initial element)'
    ),
    cave_name: z.string().regex(/^[A-Za-z0-9_-]+$/).optional().describe(
        'Logical cave name. Defaults to the first loaded cave (except for create).'
    ),
    width: z.number().int().min(1).max(MAX_CAVE_SIZE).optional().describe('Cave width in cells'),
    height: z.number().int().min(1).max(MAX_CAVE_SIZE).optional().describe('Cave height in cells'),
    initial_fill: z.enum(ELEMENTS).optional().describe('Element every cell holds before objects are drawn'),
};

const caveInputZodSchema = z.object(caveInputSchema);
export type CaveToolArgs = z.infer<typeof caveInputZodSchema>;

/**
 * Registers the `cave` tool on the MCP server.
 */
export function registerCaveTool(server: McpServer): void {
    server.registerTool(
        'cave',
        {
            title: 'Cave',
            description: 'Create caves and inspect or render them. Resize and set_fill are not recorded in the undo history.',
            inputSchema: caveInputSchema,
        },
        handleCaveTool,
    );
}

/**
 * Resolves the target cave: the named one, or the first loaded cave.
 */
export function resolveCave(
    workspace: WorkspaceClass,
    caveName: string | undefined,
): CaveDocumentClass | ToolResponse {
    if (caveName !== undefined) {
        return workspace.loadedCaves.get(caveName) ?? errors.caveNotLoaded(caveName);
    }
    const first = workspace.loadedCaves.values().next();
    if (first.done === true) {
        return errors.domainError('No caves loaded in workspace.');
    }
    return first.value;
}

export async function handleCaveTool(args: CaveToolArgs): Promise<ToolResponse> {
    const workspace = getWorkspace();

    if (args.action === 'create') {
        return handleCreate(workspace, args);
    }

    const cave = resolveCave(workspace, args.cave_name);
    if ('content' in cave) return cave;

    try {
        switch (args.action) {
            case 'info':
                return jsonResult(cave.info());
            case 'render':
                return handleRender(cave);
            case 'resize':
                return handleResize(cave, args.width, args.height);
            case 'set_fill':
                return handleSetFill(cave, args.initial_fill);
        }
    } catch (e: unknown) {
        return errors.domainError(errors.messageOf(e));
    }
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

function handleCreate(workspace: WorkspaceClass, args: CaveToolArgs): ToolResponse {
    if (!args.cave_name) {
        return errors.invalidArgument('cave create requires "cave_name".');
    }
    if (!workspace.project) {
        return errors.noProjectLoaded();
    }

    try {
        const cave = workspace.createCave(args.cave_name, {
            width: args.width,
            height: args.height,
            initialFill: args.initial_fill,
        });
        return jsonResult({
            message: `Cave '${args.cave_name}' created.`,
            ...cave.info(),
        });
    } catch (e: unknown) {
        return errors.domainError(errors.messageOf(e));
    }
}

function handleRender(cave: CaveDocumentClass): ToolResponse {
    const rendered = cave.render();

    const used = new Set<Element>();
    for (const row of rendered.toElements()) {
        for (const element of row) used.add(element);
    }
    const legend: Record<string, string> = {};
    for (const element of ELEMENTS) {
        if (used.has(element)) legend[elementGlyph(element)] = element;
    }

    return jsonResult({
        width: rendered.width,
        height: rendered.height,
        rows: rendered.toRows(),
        legend,
    });
}

function handleResize(cave: CaveDocumentClass, width: number | undefined, height: number | undefined): ToolResponse {
    if (width === undefined || height === undefined) {
        return errors.invalidArgument('cave resize requires "width" and "height".');
    }
    cave.resize(width, height);
    return jsonResult({ message: `Cave '${cave.name}' resized.`, ...cave.info() });
}

function handleSetFill(cave: CaveDocumentClass, element: Element | undefined): ToolResponse {
    if (element === undefined) {
        return errors.invalidArgument('cave set_fill requires "initial_fill".');
    }
    cave.setInitialFill(element);
    return jsonResult({ message: `Cave '${cave.name}' now starts filled with ${element}.`, ...cave.info() });
}
