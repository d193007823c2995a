import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';
import { logger } from '../../utils/logging.js';
import { detectExecutable } from '../../utils/binaryCheck.js';
import { getErrorCode, getErrorMessage, toError } from '../../utils/errorHandling.js';
import { ExtractionError, ProcessError } from '../../errors/index.js';
import { Capability, MetadataRecord, MetadataValue } from '../../types/metadata.js';
import { defaultConfig } from '../../config/defaults.js';

const execFilePromise = promisify(execFile);

/**
 * FFprobe Service
 *
 * Reads container and stream descriptors (codec, duration, resolution,
 * channels, tags, ...) from audio and video files by running ffprobe with
 * JSON output. The result keeps ffprobe's own layout: `streams` then `format`.
 */

export const FFPROBE_INSTALL_HINT =
  "Install FFmpeg (https://ffmpeg.org/download.html) and make sure 'ffprobe' is on PATH, " +
  'or point FFPROBE_BINARY at it.';

export type CommandRunner = (
  file: string,
  args: string[],
  options: { maxBuffer: number }
) => Promise<{ stdout: string; stderr: string }>;

export interface MultimediaProber {
  /**
   * Locate the prober and read its version
   */
  detect(): Promise<Capability>;

  /**
   * Describe `filePath` using the prober found at `executablePath`
   */
  probe(filePath: string, executablePath: string): Promise<MetadataRecord>;
}

const jsonValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

/**
 * Raw ffprobe output (-show_format -show_streams)
 */
const ffprobeOutputSchema = z.object({
  streams: z.array(z.record(jsonValueSchema)).default([]),
  format: z.record(jsonValueSchema).optional(),
});

export function buildProbeArgs(filePath: string): string[] {
  return ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', filePath];
}

const defaultRunner: CommandRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFilePromise(file, args, {
    maxBuffer: options.maxBuffer,
    encoding: 'utf8',
  });
  return { stdout, stderr };
};

/**
 * Parse and validate ffprobe's JSON output
 */
export function parseProbeOutput(stdout: string, filePath: string): MetadataRecord {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch (error) {
    throw new ExtractionError(
      'ffprobe',
      `FFprobe returned invalid JSON for ${filePath}`,
      { operation: 'probe', filePath },
      toError(error)
    );
  }

  const parsed = ffprobeOutputSchema.safeParse(data);
  if (!parsed.success) {
    throw new ExtractionError(
      'ffprobe',
      `FFprobe output has an unexpected shape: ${parsed.error.issues.map(issue => issue.message).join('; ')}`,
      { operation: 'probe', filePath }
    );
  }

  const result: MetadataRecord = { streams: parsed.data.streams };
  if (parsed.data.format !== undefined) {
    result.format = parsed.data.format;
  }
  return result;
}

/**
 * Run ffprobe on `filePath`
 */
export async function probeMultimedia(
  filePath: string,
  ffprobePath: string,
  options: { maxBuffer?: number; runner?: CommandRunner } = {}
): Promise<MetadataRecord> {
  const runner = options.runner ?? defaultRunner;
  const maxBuffer = options.maxBuffer ?? defaultConfig.ffprobe.maxBuffer;
  const startTime = Date.now();

  let stdout: string;
  try {
    ({ stdout } = await runner(ffprobePath, buildProbeArgs(filePath), { maxBuffer }));
  } catch (error) {
    logger.error('FFprobe failed to extract media info', {
      filePath,
      error: getErrorMessage(error),
    });

    throw new ProcessError(
      'ffprobe',
      getErrorCode(error) ?? -1,
      `FFprobe failed: ${getErrorMessage(error)}`,
      { operation: 'probe', filePath },
      toError(error)
    );
  }

  const result = parseProbeOutput(stdout, filePath);

  logger.debug('Extracted media info via FFprobe', {
    filePath,
    streams: Array.isArray(result.streams) ? result.streams.length : 0,
    timeMs: Date.now() - startTime,
  });

  return result;
}

/**
 * Default prober backed by the ffprobe executable
 */
export class FfprobeProber implements MultimediaProber {
  private readonly binary: string;
  private readonly maxBuffer: number;
  private readonly runner: CommandRunner;

  constructor(options: { binary?: string; maxBuffer?: number; runner?: CommandRunner } = {}) {
    this.binary = options.binary ?? defaultConfig.ffprobe.binary;
    this.maxBuffer = options.maxBuffer ?? defaultConfig.ffprobe.maxBuffer;
    this.runner = options.runner ?? defaultRunner;
  }

  detect(): Promise<Capability> {
    return detectExecutable(this.binary, FFPROBE_INSTALL_HINT);
  }

  probe(filePath: string, executablePath: string): Promise<MetadataRecord> {
    return probeMultimedia(filePath, executablePath, {
      maxBuffer: this.maxBuffer,
      runner: this.runner,
    });
  }
}
