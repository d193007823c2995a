import fs from 'fs/promises';
import path from 'path';
import { Dirent } from 'fs';
import { logger } from '../utils/logging.js';
import { getErrorCode, getErrorMessage, toError } from '../utils/errorHandling.js';
import { ErrorCode, GeneralError } from '../errors/index.js';
import { MetadataRecord } from '../types/metadata.js';

export interface MetadataSource {
  getMetadata(filePath: string): Promise<Readonly<MetadataRecord>>;
}

export type CrawlEntry =
  | { filePath: string; record: Readonly<MetadataRecord> }
  | { filePath: string; error: Error };

/**
 * Walk `root` depth-first and extract metadata from every regular file.
 * Directory entries are visited in name order. A file that fails is
 * reported as an `error` entry and the walk continues.
 *
 * @throws GeneralError when `root` is missing or not a directory
 */
export async function* crawlDirectory(
  root: string,
  service: MetadataSource
): AsyncGenerator<CrawlEntry> {
  await assertDirectory(root);
  yield* walk(root, service);
}

async function assertDirectory(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(root)).isDirectory();
  } catch (error) {
    throw new GeneralError(
      `Directory not found: ${root}`,
      getErrorCode(error) === 'ENOENT' ? ErrorCode.FS_FILE_NOT_FOUND : ErrorCode.FS_READ_FAILED,
      { service: 'DirectoryScanService', operation: 'crawlDirectory', filePath: root },
      toError(error)
    );
  }

  if (!isDirectory) {
    throw new GeneralError(`Path is not a directory: ${root}`, ErrorCode.FS_NOT_A_DIRECTORY, {
      service: 'DirectoryScanService',
      operation: 'crawlDirectory',
      filePath: root,
    });
  }
}

async function* walk(dir: string, service: MetadataSource): AsyncGenerator<CrawlEntry> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    // Unreadable sub-directories are skipped
    logger.warn('Cannot read directory', { dir, error: getErrorMessage(error) });
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      yield* walk(entryPath, service);
    } else if (entry.isFile() || (entry.isSymbolicLink() && (await isFileLink(entryPath)))) {
      yield await extract(entryPath, service);
    }
  }
}

// Links to directories are not followed; dangling links are reported like files
async function isFileLink(linkPath: string): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isFile();
  } catch {
    return true;
  }
}

async function extract(filePath: string, service: MetadataSource): Promise<CrawlEntry> {
  try {
    return { filePath, record: await service.getMetadata(filePath) };
  } catch (error) {
    logger.error('Failed to extract metadata', { filePath, error: getErrorMessage(error) });
    return { filePath, error: toError(error) };
  }
}
