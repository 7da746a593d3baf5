import * as fs from 'fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { type ProjectConfig } from '../types/project.js';
import * as errors from '../errors.js';

const projectSchema = z.object({
    cavemcp_version: z.string(),
    name: z.string(),
    created: z.string().optional(),
    defaults: z.object({
        width: z.number().int().min(1).optional(),
        height: z.number().int().min(1).optional(),
        initial_fill: z.string().optional(),
    }).optional(),
    caves: z.record(z.object({ path: z.string() })),
});

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
    return e instanceof Error && 'code' in e;
}

function describeIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Loads a project configuration from a JSON file.
 *
 * @param filePath - Absolute path to the cavemcp.json file
 * @returns The parsed ProjectConfig data
 */
export async function loadProjectFile(filePath: string): Promise<ProjectConfig> {
    let fileContent: string;
    try {
        fileContent = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            throw new Error(errors.projectFileNotFound(filePath).content[0].text);
        }
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fileContent);
    } catch (e: unknown) {
        throw new Error(errors.invalidProjectFile(filePath, `Invalid JSON. ${errors.messageOf(e)}`).content[0].text);
    }

    const result = projectSchema.safeParse(parsed);
    if (!result.success) {
        throw new Error(errors.invalidProjectFile(filePath, describeIssues(result.error)).content[0].text);
    }
    return result.data;
}

/**
 * Saves a project configuration to a JSON file.
 * Automatically adds or preserves the creation timestamp.
 *
 * @param filePath - Absolute path to the cavemcp.json file
 * @param project - The ProjectConfig data to save
 */
export async function saveProjectFile(filePath: string, project: ProjectConfig): Promise<void> {
    const dataToSave = { ...project };
    if (!dataToSave.created) {
        dataToSave.created = new Date().toISOString();
    }

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(dataToSave, null, 2), 'utf8');
}
