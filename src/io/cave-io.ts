import * as fs from 'fs/promises';
import * as path from 'node:path';
import { type CaveData } from '../classes/cave.js';
import { Logger, type LogMessage } from '../classes/logger.js';
import { type CaveDefaults, BUILTIN_CAVE_DEFAULTS, formatCaveText, parseCaveText } from './cave-format.js';
import * as errors from '../errors.js';

export interface LoadedCaveFile {
  data: CaveData;
  /** Lines that were skipped or ignored, with their line numbers */
  warnings: LogMessage[];
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Loads a cave from a text file.
 * Malformed lines do not fail the load; they are returned as warnings.
 *
 * @param filePath - Absolute path to the cave file
 * @param name - Cave name used when the file has no `Name=` line
 */
export async function loadCaveFile(
  filePath: string,
  name: string,
  defaults: CaveDefaults = BUILTIN_CAVE_DEFAULTS,
): Promise<LoadedCaveFile> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(errors.caveFileNotFound(filePath).content[0].text);
    }
    throw error;
  }

  // Parsing is synchronous, so no other load can push a logger in between.
  const logger = new Logger();
  try {
    const data = logger.withContext(`Reading cave file ${path.basename(filePath)}`, () =>
      parseCaveText(text, name, defaults),
    );
    return { data, warnings: [...logger.messages] };
  } finally {
    logger.close();
  }
}

/**
 * Saves a cave to a text file, creating the directory if needed.
 */
export async function saveCaveFile(filePath: string, data: CaveData): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, formatCaveText(data), 'utf8');
}
