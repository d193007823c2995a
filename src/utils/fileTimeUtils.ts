import fs from 'fs/promises';
import type { Stats } from 'fs';
import { logger } from './logging.js';
import { ErrorCode, GeneralError } from '../errors/index.js';

/**
 * File Time Utility
 *
 * Renders file timestamps as fixed-format strings (`YYYY-MM-DD HH:MM:SS`)
 * in local time or UTC, never as epoch numbers.
 */

export type TimestampMode = 'modified' | 'created';

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS`
 *
 * @param date - Date to render
 * @param localTime - Local system time when true, UTC otherwise
 */
export function formatTimestamp(date: Date, localTime = true): string {
  const parts = localTime
    ? [date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes(), date.getSeconds()]
    : [
        date.getUTCFullYear(),
        date.getUTCMonth() + 1,
        date.getUTCDate(),
        date.getUTCHours(),
        date.getUTCMinutes(),
        date.getUTCSeconds(),
      ];

  const [year, month, day, hours, minutes, seconds] = parts;
  return `${pad(year, 4)}-${pad(month)}-${pad(day)} ${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

/**
 * Pick the creation time reported by the platform
 *
 * Strategy:
 * 1. Use birthtime when the filesystem reports one (epoch 0 means "unknown")
 * 2. Otherwise fall back to ctime, the inode change time
 */
export function getCreationTime(stats: Stats): Date {
  if (stats.birthtimeMs > 0) {
    return stats.birthtime;
  }

  logger.debug('Birth time unavailable, using change time', {
    ctime: stats.ctimeMs,
  });
  return stats.ctime;
}

/**
 * Read a file timestamp as reported by the operating system
 *
 * @param filePath - Path to the file
 * @param mode - 'modified' (mtime) or 'created' (birthtime, else ctime)
 * @param localTime - Local system time when true, UTC otherwise
 * @returns Formatted `YYYY-MM-DD HH:MM:SS` string
 */
export async function getFileTimestamp(
  filePath: string,
  mode: TimestampMode = 'modified',
  localTime = true
): Promise<string> {
  const stats = await fs.stat(filePath);
  return formatStatsTimestamp(stats, mode, localTime);
}

/**
 * Same as {@link getFileTimestamp} for an already-read `Stats` object
 */
export function formatStatsTimestamp(stats: Stats, mode: TimestampMode, localTime = true): string {
  switch (mode) {
    case 'modified':
      return formatTimestamp(stats.mtime, localTime);
    case 'created':
      return formatTimestamp(getCreationTime(stats), localTime);
    default:
      throw new GeneralError(
        `Unknown timestamp mode '${String(mode)}'. Valid values are 'created' and 'modified'.`,
        ErrorCode.VALIDATION_INPUT_INVALID,
        { operation: 'getFileTimestamp' }
      );
  }
}
