import path from 'node:path';
import {
  type FileSelection,
  getLocalFiles,
  ScanError,
  type SelectedFile,
  toS3Path,
  type UploadLogger,
} from '@shared';
import { minimatch } from 'minimatch';

const MATCH_OPTIONS = { dot: true };

export interface ExpandSelectionsOptions {
  servicePath: string;
  log: UploadLogger;
}

export function matchesSelection(
  relativePath: string,
  selection: Pick<FileSelection, 'includes' | 'excludes'>,
): boolean {
  const included = selection.includes.some((pattern) =>
    minimatch(relativePath, pattern, MATCH_OPTIONS),
  );
  if (!included) return false;
  return !selection.excludes.some((pattern) =>
    minimatch(relativePath, pattern, MATCH_OPTIONS),
  );
}

/**
 * Lists the files of one selection as forward-slash paths relative to baseDir,
 * in directory read order.
 * @throws {ScanError} If the selection has no directory or it cannot be read.
 */
export async function scanSelection(
  baseDir: string,
  selection: FileSelection,
  log?: UploadLogger,
): Promise<string[]> {
  if (!selection.dir) {
    throw new ScanError('No directory specified for file set');
  }

  const files: string[] = [];
  for await (const localFile of getLocalFiles(baseDir, log)) {
    const relativePath = toS3Path(path.relative(baseDir, localFile));
    if (matchesSelection(relativePath, selection)) {
      files.push(relativePath);
    }
  }
  return files;
}

/**
 * Yields every selected file, selection by selection in declaration order.
 * A selection that fails to scan is logged and skipped; the others still run.
 */
export async function* expandSelections(
  selections: readonly FileSelection[],
  options: ExpandSelectionsOptions,
): AsyncGenerator<SelectedFile> {
  const { servicePath, log } = options;

  for (const selection of selections) {
    const baseDir = path.resolve(servicePath, selection.dir);

    let files: string[];
    try {
      files = await scanSelection(baseDir, selection, log);
    } catch (error) {
      if (!(error instanceof ScanError)) throw error;
      log.error(`Could not upload file(s) from ${baseDir}`);
      log.error(error.message);
      continue;
    }

    if (files.length > 0) {
      log.notice(`Uploading ${files.length} file(s) from ${baseDir}`);
    }

    for (const relativePath of files) {
      yield {
        baseDir,
        relativePath,
        localPath: path.join(baseDir, relativePath),
      };
    }
  }
}
