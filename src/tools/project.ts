import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { PROJECT_FILE_NAME, ProjectClass } from '../classes/project.js';
import { type WorkspaceClass, getWorkspace } from '../classes/workspace.js';
import { loadProjectFile, saveProjectFile } from '../io/project-io.js';
import { type ToolResponse, jsonResult } from './respond.js';
import * as errors from '../errors.js';
import * as path from 'node:path';

/**
 * Zod input schema for the `project` tool.
 *
 * Uses a flat shape with an `action` enum discriminator.
 * - `init`: path required (project directory)
 * - `open`: path required (cavemcp.json file path)
 * - `info`: no additional args
 */
const projectInputSchema = {
    action: z.enum(['init', 'open', 'info']).describe(
        'Action to perform: init (create new project), open (load existing), info (show current project)'
    ),
    path: z.string().optional().describe(
        `For init: project directory path. For open: path to ${PROJECT_FILE_NAME}`
    ),
    name: z.string().optional().describe(
        'Project name (used by init; defaults to directory name)'
    ),
};

const projectInputZodSchema = z.object(projectInputSchema);
export type ProjectToolArgs = z.infer<typeof projectInputZodSchema>;

/**
 * Registers the `project` tool on the MCP server.
 */
export function registerProjectTool(server: McpServer): void {
    server.registerTool(
        'project',
        {
            title: 'Project',
            description: 'Manage the on-disk project configuration and cave registry. Actions: init, open, info.',
            inputSchema: projectInputSchema,
        },
        handleProjectTool,
    );
}

export async function handleProjectTool(args: ProjectToolArgs): Promise<ToolResponse> {
    const workspace = getWorkspace();

    switch (args.action) {
        case 'init':
            return handleInit(workspace, args.path, args.name);
        case 'open':
            return handleOpen(workspace, args.path);
        case 'info':
            return handleInfo(workspace);
    }
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

async function handleInit(
    workspace: WorkspaceClass,
    dirPath: string | undefined,
    projectName: string | undefined,
): Promise<ToolResponse> {
    if (!dirPath) {
        return errors.invalidArgument('project init requires a "path" (project directory).');
    }

    const resolvedDir = path.resolve(dirPath);
    const filePath = path.join(resolvedDir, PROJECT_FILE_NAME);
    const name = projectName ?? path.basename(resolvedDir);

    const project = ProjectClass.create(filePath, name);
    try {
        await saveProjectFile(filePath, project.toJSON());
    } catch (e: unknown) {
        return errors.domainError(`Cannot write project file ${filePath}: ${errors.messageOf(e)}`);
    }
    project.markClean();
    workspace.setProject(project);

    return jsonResult({
        message: `Project '${name}' initialized.`,
        path: filePath,
    });
}

async function handleOpen(
    workspace: WorkspaceClass,
    filePath: string | undefined,
): Promise<ToolResponse> {
    if (!filePath) {
        return errors.invalidArgument(`project open requires a "path" to ${PROJECT_FILE_NAME}.`);
    }

    const resolvedPath = path.resolve(filePath);

    let data;
    try {
        data = await loadProjectFile(resolvedPath);
    } catch (e: unknown) {
        return errors.domainError(errors.messageOf(e));
    }

    const project = ProjectClass.fromJSON(resolvedPath, data);
    workspace.setProject(project);

    return jsonResult({
        message: `Project '${project.name}' opened.`,
        path: resolvedPath,
        caves: Object.keys(data.caves).length,
    });
}

function handleInfo(workspace: WorkspaceClass): ToolResponse {
    if (!workspace.project) {
        return errors.noProjectLoaded();
    }
    return jsonResult(workspace.project.info());
}
