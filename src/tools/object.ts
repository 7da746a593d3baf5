import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type CaveDocumentClass } from '../classes/cave.js';
import { type WorkspaceClass, getWorkspace } from '../classes/workspace.js';
import { type CaveObject } from '../types/cave-object.js';
import {
    buildObject,
    characteristicElement,
    cloneObject,
    describeObject,
    listKinds,
    objectFieldValues,
    objectTag,
    parseObjectLine,
    serializeObject,
    setField,
} from '../objects/registry.js';
import { resolveCave } from './cave.js';
import { type ToolResponse, jsonResult } from './respond.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `object` tool.
 *
 * - `kinds`: no additional args
 * - `list`: cave_name optional
 * - `get`, `remove`, `duplicate`: index required
 * - `add`: either `line` or `type` + `fields`; `index` optional (appends)
 * - `set_field`: index, field, value required
 * - `move`: index and to required
 */
const objectInputSchema = {
    action: z.enum(['kinds', 'list', 'get', 'add', 'remove', 'set_field', 'duplicate', 'move']).describe(
        'Action to perform on the object list of a cave'
    ),
    cave_name: z.string().optional().describe('Logical cave name. Defaults to the first loaded cave.'),
    index: z.number().int().min(0).optional().describe('Object index in drawing order'),
    to: z.number().int().min(0).optional().describe('For move: destination index'),
    line: z.string().optional().describe('For add: object text line, e.g. "Rectangle 2 2 5 4 Wall"'),
    type: z.string().optional().describe('For add: object type (see kinds), used with fields'),
    fields: z.record(z.unknown()).optional().describe('For add: field values keyed by field name'),
    field: z.string().optional().describe('For set_field: field name'),
    value: z.unknown().optional().describe('For set_field: new value; coordinates as { x, y }'),
};

const objectInputZodSchema = z.object(objectInputSchema);
export type ObjectToolArgs = z.infer<typeof objectInputZodSchema>;

/**
 * Registers the `object` tool on the MCP server.
 */
export function registerObjectTool(server: McpServer): void {
    server.registerTool(
        'object',
        {
            title: 'Object',
            description: 'Add, edit, reorder and inspect the drawable objects of a cave. Every change is undoable.',
            inputSchema: objectInputSchema,
        },
        handleObjectTool,
    );
}

export async function handleObjectTool(args: ObjectToolArgs): Promise<ToolResponse> {
    const workspace = getWorkspace();

    if (args.action === 'kinds') {
        return handleKinds();
    }

    const cave = resolveCave(workspace, args.cave_name);
    if ('content' in cave) return cave;

    try {
        switch (args.action) {
            case 'list':
                return handleList(cave);
            case 'get':
                return handleGet(cave, args.index);
            case 'add':
                return handleAdd(workspace, cave, args);
            case 'remove':
                return handleRemove(workspace, cave, args.index);
            case 'set_field':
                return handleSetField(workspace, cave, args);
            case 'duplicate':
                return handleDuplicate(workspace, cave, args.index);
            case 'move':
                return handleMove(workspace, cave, args.index, args.to);
        }
    } catch (e: unknown) {
        return errors.domainError(errors.messageOf(e));
    }
}

function summarize(object: CaveObject, index: number) {
    return {
        index,
        type: object.type,
        tag: objectTag(object),
        element: characteristicElement(object),
        description: describeObject(object),
        line: serializeObject(object),
    };
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

function handleKinds(): ToolResponse {
    return jsonResult({
        kinds: listKinds().map((kind) => ({
            type: kind.type,
            tag: kind.tag,
            fields: kind.fields,
        })),
    });
}

function handleList(cave: CaveDocumentClass): ToolResponse {
    return jsonResult({
        cave: cave.name,
        objects: cave.objects.map(summarize),
    });
}

function handleGet(cave: CaveDocumentClass, index: number | undefined): ToolResponse {
    if (index === undefined) {
        return errors.invalidArgument('object get requires "index".');
    }
    const object = cave.getObject(index);
    return jsonResult({
        ...summarize(object, index),
        fields: objectFieldValues(object),
    });
}

function handleAdd(workspace: WorkspaceClass, cave: CaveDocumentClass, args: ObjectToolArgs): ToolResponse {
    let object: CaveObject;
    if (args.line !== undefined) {
        const parsed = parseObjectLine(args.line);
        if (parsed === null) {
            return errors.unparseableObjectLine(args.line);
        }
        object = parsed;
    } else if (args.type !== undefined) {
        object = buildObject(args.type, args.fields ?? {});
    } else {
        return errors.invalidArgument('object add requires either "line" or "type" with "fields".');
    }

    const at = args.index ?? cave.objectCount;
    workspace.edit(cave, `add ${objectTag(object)}`, () => {
        cave.addObject(object, at);
    });
    return jsonResult({ message: 'Object added.', ...summarize(cave.getObject(at), at) });
}

function handleRemove(workspace: WorkspaceClass, cave: CaveDocumentClass, index: number | undefined): ToolResponse {
    if (index === undefined) {
        return errors.invalidArgument('object remove requires "index".');
    }
    const removed = summarize(cave.getObject(index), index);
    workspace.edit(cave, `remove ${removed.tag} #${String(index)}`, () => {
        cave.removeObject(index);
    });
    return jsonResult({ message: 'Object removed.', removed, objects: cave.objectCount });
}

function handleSetField(workspace: WorkspaceClass, cave: CaveDocumentClass, args: ObjectToolArgs): ToolResponse {
    const { index, field } = args;
    if (index === undefined || field === undefined || !('value' in args)) {
        return errors.invalidArgument('object set_field requires "index", "field" and "value".');
    }
    const value: unknown = args.value;
    workspace.edit(cave, `set ${field} of #${String(index)}`, () => {
        // Edit a copy so that a rejected value leaves the stored object untouched.
        const edited = cloneObject(cave.getObject(index));
        setField(edited, field, value);
        cave.replaceObject(index, edited);
    });
    return jsonResult({ message: 'Field updated.', ...summarize(cave.getObject(index), index) });
}

function handleDuplicate(workspace: WorkspaceClass, cave: CaveDocumentClass, index: number | undefined): ToolResponse {
    if (index === undefined) {
        return errors.invalidArgument('object duplicate requires "index".');
    }
    const copy = cloneObject(cave.getObject(index));
    workspace.edit(cave, `duplicate #${String(index)}`, () => {
        cave.addObject(copy, index + 1);
    });
    return jsonResult({ message: 'Object duplicated.', ...summarize(cave.getObject(index + 1), index + 1) });
}

function handleMove(
    workspace: WorkspaceClass,
    cave: CaveDocumentClass,
    from: number | undefined,
    to: number | undefined,
): ToolResponse {
    if (from === undefined || to === undefined) {
        return errors.invalidArgument('object move requires "index" and "to".');
    }
    workspace.edit(cave, `move #${String(from)} to #${String(to)}`, () => {
        cave.moveObject(from, to);
    });
    return jsonResult({ message: 'Object moved.', ...summarize(cave.getObject(to), to) });
}
