import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type WorkspaceClass, getWorkspace } from '../classes/workspace.js';
import { type ToolResponse, jsonResult } from './respond.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `workspace` tool.
 *
 * Actions: info, load_cave, unload_cave, save, save_all, undo, redo
 */
const workspaceInputSchema = {
  action: z
    .enum(['info', 'load_cave', 'unload_cave', 'save', 'save_all', 'undo', 'redo'])
    .describe('Action to perform on the workspace session'),
  cave_name: z
    .string()
    .optional()
    .describe('Logical cave name (required for load_cave, unload_cave, save)'),
};

const workspaceInputZodSchema = z.object(workspaceInputSchema);
export type WorkspaceToolArgs = z.infer<typeof workspaceInputZodSchema>;

/**
 * Registers the `workspace` tool on the MCP server.
 */
export function registerWorkspaceTool(server: McpServer): void {
  server.registerTool(
    'workspace',
    {
      title: 'Workspace',
      description:
        'In-memory editing session management. Load/unload caves, save, undo/redo, and query session state.',
      inputSchema: workspaceInputSchema,
    },
    handleWorkspaceTool,
  );
}

export async function handleWorkspaceTool(args: WorkspaceToolArgs): Promise<ToolResponse> {
  const workspace = getWorkspace();

  switch (args.action) {
    case 'info':
      return jsonResult(workspace.info());
    case 'load_cave':
      return handleLoadCave(workspace, args.cave_name);
    case 'unload_cave':
      return handleUnloadCave(workspace, args.cave_name);
    case 'save':
      return handleSave(workspace, args.cave_name);
    case 'save_all':
      return handleSaveAll(workspace);
    case 'undo':
      return handleUndo(workspace);
    case 'redo':
      return handleRedo(workspace);
  }
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

async function handleLoadCave(workspace: WorkspaceClass, caveName: string | undefined): Promise<ToolResponse> {
  if (!caveName) {
    return errors.invalidArgument('workspace load_cave requires "cave_name".');
  }
  if (!workspace.project) {
    return errors.noProjectLoaded();
  }

  let warnings;
  try {
    warnings = await workspace.loadCave(caveName);
  } catch (e: unknown) {
    return errors.domainError(errors.messageOf(e));
  }

  const cave = workspace.getCave(caveName);
  return jsonResult({
    message: `Cave '${caveName}' loaded.`,
    objects: cave.objectCount,
    warnings: warnings.map((w) => w.message),
  });
}

function handleUnloadCave(workspace: WorkspaceClass, caveName: string | undefined): ToolResponse {
  if (!caveName) {
    return errors.invalidArgument('workspace unload_cave requires "cave_name".');
  }
  if (!workspace.loadedCaves.has(caveName)) {
    return errors.caveNotLoaded(caveName);
  }

  const result = workspace.unloadCave(caveName);
  return jsonResult({
    message: `Cave '${caveName}' unloaded.`,
    hadUnsavedChanges: result.hadUnsavedChanges,
  });
}

async function handleSave(workspace: WorkspaceClass, caveName: string | undefined): Promise<ToolResponse> {
  if (!caveName) {
    return errors.invalidArgument('workspace save requires "cave_name".');
  }
  if (!workspace.project) {
    return errors.noProjectLoaded();
  }
  if (!workspace.loadedCaves.has(caveName)) {
    return errors.caveNotLoaded(caveName);
  }

  try {
    const savedPath = await workspace.saveCave(caveName);
    return jsonResult({
      message: `Cave '${caveName}' saved.`,
      path: savedPath,
    });
  } catch (e: unknown) {
    return errors.domainError(errors.messageOf(e));
  }
}

async function handleSaveAll(workspace: WorkspaceClass): Promise<ToolResponse> {
  if (!workspace.project) {
    return errors.noProjectLoaded();
  }

  const saved: string[] = [];
  try {
    for (const name of workspace.loadedCaves.keys()) {
      saved.push(await workspace.saveCave(name));
    }
  } catch (e: unknown) {
    return errors.domainError(`Saved ${String(saved.length)} cave(s) before failing: ${errors.messageOf(e)}`);
  }

  return jsonResult({
    message: `Saved ${String(saved.length)} cave(s).`,
    saved,
  });
}

function handleUndo(workspace: WorkspaceClass): ToolResponse {
  const cmd = workspace.undo();
  if (cmd === undefined) {
    return errors.nothingToUndo();
  }
  return jsonResult({
    message: `Undid: ${cmd.label}`,
    undoDepth: workspace.undoDepth,
    redoDepth: workspace.redoDepth,
  });
}

function handleRedo(workspace: WorkspaceClass): ToolResponse {
  const cmd = workspace.redo();
  if (cmd === undefined) {
    return errors.nothingToRedo();
  }
  return jsonResult({
    message: `Redid: ${cmd.label}`,
    undoDepth: workspace.undoDepth,
    redoDepth: workspace.redoDepth,
  });
}
