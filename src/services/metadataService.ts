import { isDeepStrictEqual } from 'util';
import { logger } from '../utils/logging.js';
import { getErrorMessage } from '../utils/errorHandling.js';
import { DEFAULT_MIME_TYPE, matchesAnyMimePattern } from '../utils/mimeType.js';
import { MissingDependencyError, RecordConflictError } from '../errors/index.js';
import { ConfigManager } from '../config/ConfigManager.js';
import { AppConfig } from '../config/types.js';
import { Capability, MetadataRecord, ScannerSummary } from '../types/metadata.js';
import {
  AudioInfoScanner,
  FFprobeScanner,
  FileInfoScanner,
  ImageInfoScanner,
  Scanner,
  TextInfoScanner,
  VideoInfoScanner,
} from './scanners/index.js';
import { FfprobeProber } from './media/ffprobeService.js';

export interface MetadataServiceOptions {
  /** Scanner run on every file; its `mime_type` drives scanner selection */
  fileInfo?: Scanner;
  /** Type-specific scanners, tried in order */
  scanners?: readonly Scanner[];
}

/**
 * Metadata Service
 *
 * Single entry point for callers: scans a file with FileInfoScanner, picks
 * the type-specific scanners whose MIME patterns match, and merges every
 * partial record into one composite record.
 *
 * A scanner whose dependency is missing is skipped silently (debug log);
 * the facet it would have produced is simply absent.
 */
export class MetadataService {
  private readonly fileInfo: Scanner;
  private readonly scanners: readonly Scanner[];

  constructor(options: MetadataServiceOptions = {}) {
    this.fileInfo = options.fileInfo ?? new FileInfoScanner();
    this.scanners = options.scanners ?? [];
  }

  /**
   * Build the default scanner set from configuration. The experimental
   * FFprobeScanner replaces the video and audio scanners when enabled.
   */
  static fromConfig(config: AppConfig = ConfigManager.getInstance().getConfig()): MetadataService {
    const prober = new FfprobeProber({
      binary: config.ffprobe.binary,
      maxBuffer: config.ffprobe.maxBuffer,
    });

    const multimedia: Scanner[] = config.scan.experimentalMultimedia
      ? [new FFprobeScanner({ prober })]
      : [new VideoInfoScanner({ prober }), new AudioInfoScanner({ prober })];

    return new MetadataService({
      fileInfo: new FileInfoScanner({
        hashAlgorithm: config.scan.hashAlgorithm,
        hashBlockSize: config.scan.hashBlockSize,
        localTime: config.scan.localTime,
      }),
      scanners: [
        new ImageInfoScanner({
          fractionsAsFloat: config.image.fractionsAsFloat,
          tagLayout: config.image.tagLayout,
          tagSeparator: config.image.tagSeparator,
        }),
        ...multimedia,
        new TextInfoScanner(),
      ],
    });
  }

  /**
   * Extract every available facet of metadata from `filePath`
   *
   * @throws GeneralError when the path is missing or not a regular file
   * @throws RecordConflictError when two scanners emit different values for one key
   */
  async getMetadata(filePath: string): Promise<Readonly<MetadataRecord>> {
    const startTime = Date.now();
    const record: MetadataRecord = {};
    const owners = new Map<string, string>();

    await this.fileInfo.preChecks();
    this.merge(record, owners, this.fileInfo.name, await this.fileInfo.scan(filePath));

    const mimeType = typeof record.mime_type === 'string' ? record.mime_type : DEFAULT_MIME_TYPE;

    for (const scanner of this.selectScanners(mimeType)) {
      try {
        await scanner.preChecks();
      } catch (error) {
        if (error instanceof MissingDependencyError) {
          logger.debug('Skipping scanner with missing dependency', {
            scanner: scanner.name,
            filePath,
            dependency: error.dependency,
            error: getErrorMessage(error),
          });
          continue;
        }
        throw error;
      }

      this.merge(record, owners, scanner.name, await scanner.scan(filePath));
    }

    logger.debug('Metadata extracted', {
      filePath,
      mimeType,
      keys: Object.keys(record),
      timeMs: Date.now() - startTime,
    });

    return Object.freeze(record);
  }

  /**
   * Type-specific scanners whose patterns match `mimeType`
   */
  selectScanners(mimeType: string): Scanner[] {
    return this.scanners.filter(scanner => matchesAnyMimePattern(mimeType, scanner.mimeTypes));
  }

  availableScanners(): ScannerSummary[] {
    return [this.fileInfo, ...this.scanners].map(scanner => scanner.summary());
  }

  /**
   * Run the pre-checks of every scanner and report what each one found.
   * Missing dependencies are reported, not thrown.
   */
  async checkDependencies(): Promise<Record<string, Capability | null>> {
    const report: Record<string, Capability | null> = {};

    for (const scanner of [this.fileInfo, ...this.scanners]) {
      try {
        await scanner.preChecks();
      } catch (error) {
        if (!(error instanceof MissingDependencyError)) {
          throw error;
        }
      }
      report[scanner.name] = scanner.getCapability();
    }

    return report;
  }

  private merge(
    target: MetadataRecord,
    owners: Map<string, string>,
    scannerName: string,
    partial: MetadataRecord
  ): void {
    for (const [key, value] of Object.entries(partial)) {
      const owner = owners.get(key);

      if (owner !== undefined) {
        if (isDeepStrictEqual(target[key], value)) continue;
        throw new RecordConflictError(
          key,
          [owner, scannerName],
          `Scanners ${owner} and ${scannerName} produced different values for '${key}'`,
          { service: 'MetadataService', operation: 'getMetadata' }
        );
      }

      owners.set(key, scannerName);
      target[key] = value;
    }
  }
}

/**
 * Serialize a record as JSON, keys in insertion order
 */
export function toJson(record: Readonly<MetadataRecord>, indent: number = 2): string {
  return JSON.stringify(record, null, indent);
}
