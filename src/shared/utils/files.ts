import fs from 'node:fs';
import path from 'node:path';
import type { ErrorLogger } from '../types/plugin';
import { IGNORED_FILE_NAMES } from '../constants/plugin';
import { ScanError } from '../errors/scan';

async function readDirectory(dir: string): Promise<fs.Dirent[]> {
  try {
    return await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ScanError(`Unable to read directory ${dir}: ${reason}`, dir);
  }
}

/**
 * Lists all files in a directory recursively, in directory read order.
 * Filters out ignored files (e.g. .DS_Store) and skips symbolic links.
 * @throws {ScanError} If a directory cannot be read.
 */
export async function* getLocalFiles(
  dir: string,
  log?: ErrorLogger,
): AsyncGenerator<string> {
  try {
    await fs.promises.access(dir, fs.constants.R_OK);
  } catch {
    throw new ScanError(`The directory ${dir} does not exist.`, dir);
  }

  const entries = await readDirectory(dir);
  for (const entry of entries) {
    if (IGNORED_FILE_NAMES.has(entry.name)) continue;
    const fullPath = path.join(dir, entry.name);
    if (entry.isSymbolicLink()) {
      log?.warning(`Ignoring symbolic link: ${fullPath}`);
      continue;
    }
    if (entry.isDirectory()) {
      yield* getLocalFiles(fullPath, log);
    } else {
      yield fullPath;
    }
  }
}
