/**
 * Binary Availability Checker
 *
 * Locates external executables on the search path and reads their version,
 * so scanners can decide whether they are usable before running.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import path from 'path';
import { logger } from './logging.js';
import { getErrorMessage } from './errorHandling.js';
import { Capability } from '../types/metadata.js';

const execFilePromise = promisify(execFile);

export interface BinaryCheckResult {
  binary: string;
  available: boolean;
  version?: string;
  error?: string;
}

/**
 * Whether `filePath` is a regular file the current user may execute
 */
export async function isExecutable(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) return false;
    await fs.access(filePath, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find an executable in the directories of `searchPath` (defaults to PATH)
 *
 * On Windows, names without a known extension are tried with every
 * extension listed in PATHEXT.
 *
 * @returns Absolute path of the first match, or null
 */
export async function findExecutable(
  executable: string,
  searchPath: string = process.env.PATH ?? '',
  platform: NodeJS.Platform = process.platform
): Promise<string | null> {
  let extensions = [''];
  if (platform === 'win32') {
    const pathExt = (process.env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM')
      .toLowerCase()
      .split(';')
      .filter(ext => ext.length > 0);
    if (!pathExt.includes(path.extname(executable).toLowerCase())) {
      extensions = pathExt;
    }
  }

  // Names with a directory part are not looked up on the search path
  const directories = executable.includes('/') || executable.includes(path.sep)
    ? ['']
    : searchPath.split(path.delimiter).filter(dir => dir.length > 0);

  for (const extension of extensions) {
    for (const directory of directories) {
      const candidate = path.resolve(directory, executable + extension);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}

/**
 * Run a binary with its version flag and pull the version number out of
 * the banner
 */
export async function checkBinary(
  binary: string,
  versionArgs: string[] = ['--version']
): Promise<BinaryCheckResult> {
  try {
    const { stdout, stderr } = await execFilePromise(binary, versionArgs, {
      timeout: 5000,
    });

    const output = stdout || stderr;
    const versionMatch = output.match(/version\s+([\w.-]+)|v(\d[\d.]*)|(\d+\.[\d.]+)/i);
    const version = versionMatch
      ? versionMatch[1] || versionMatch[2] || versionMatch[3]
      : 'unknown';

    return {
      binary,
      available: true,
      version,
    };
  } catch (error) {
    return {
      binary,
      available: false,
      error: getErrorMessage(error),
    };
  }
}

/**
 * Locate `name` and read its version, as a capability
 *
 * @param name - Executable name or path
 * @param hint - Remediation shown to the operator when it is missing
 */
export async function detectExecutable(
  name: string,
  hint: string,
  versionArgs: string[] = ['-version']
): Promise<Capability> {
  const location = await findExecutable(name);
  if (location === null) {
    logger.debug('Executable not found', { binary: name });
    return {
      status: 'unavailable',
      name,
      reason: `Cannot find '${name}' executable (in PATH)`,
      hint,
    };
  }

  const result = await checkBinary(location, versionArgs);
  if (!result.available) {
    logger.debug('Executable found but not runnable', { binary: location, error: result.error });
    return {
      status: 'unavailable',
      name,
      reason: `'${location}' could not be run: ${result.error ?? 'unknown error'}`,
      hint,
    };
  }

  logger.debug('Executable found', { binary: location, version: result.version });
  return {
    status: 'available',
    name,
    version: result.version ?? 'unknown',
    location,
  };
}
