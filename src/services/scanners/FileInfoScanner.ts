import fs from 'fs/promises';
import path from 'path';
import { Scanner } from './Scanner.js';
import { hashFile } from '../../utils/fileHash.js';
import { formatStatsTimestamp } from '../../utils/fileTimeUtils.js';
import { DEFAULT_MIME_TYPE, getFileKind, guessMimeType } from '../../utils/mimeType.js';
import { defaultConfig } from '../../config/defaults.js';
import { FileHash, FileTimestamps, MetadataRecord } from '../../types/metadata.js';

export type MimeDetector = (filePath: string) => string | null | Promise<string | null>;

export interface FileInfoScannerOptions {
  hashAlgorithm?: string;
  hashBlockSize?: number;
  localTime?: boolean;
  mimeDetector?: MimeDetector;
}

/**
 * Collects what the operating system knows about a file, plus a digest of
 * its content. Works on any file and is always ready.
 *
 * Output keys, in order: `file_name`, `file_type`, `file_size`,
 * `mime_type`, `file_hash`, `file_timestamps`.
 */
export class FileInfoScanner extends Scanner {
  readonly name = 'FileInfoScanner';
  readonly mimeTypes = ['*/*'];

  private readonly hashAlgorithm: string;
  private readonly hashBlockSize: number;
  private readonly localTime: boolean;
  private readonly mimeDetector: MimeDetector;

  constructor(options: FileInfoScannerOptions = {}) {
    super();

    this.hashAlgorithm = options.hashAlgorithm ?? defaultConfig.scan.hashAlgorithm;
    this.hashBlockSize = options.hashBlockSize ?? defaultConfig.scan.hashBlockSize;
    this.localTime = options.localTime ?? defaultConfig.scan.localTime;
    this.mimeDetector = options.mimeDetector ?? guessMimeType;

    this.registerStep(async filePath => ({ file_name: path.basename(filePath) }), 'file name');
    this.registerStep(async filePath => ({ file_type: getFileKind(filePath) }), 'file type');
    this.registerStep(this.addSize.bind(this), 'file size');
    this.registerStep(this.addMimeType.bind(this), 'mime type');
    this.registerStep(this.addHash.bind(this), 'content hash');
    this.registerStep(this.addTimestamps.bind(this), 'timestamps');
  }

  private async addSize(filePath: string): Promise<MetadataRecord> {
    const stats = await fs.stat(filePath);
    return { file_size: stats.size };
  }

  private async addMimeType(filePath: string): Promise<MetadataRecord> {
    const mimeType = await this.mimeDetector(filePath);
    return { mime_type: mimeType ?? DEFAULT_MIME_TYPE };
  }

  private async addHash(filePath: string): Promise<MetadataRecord> {
    const fileHash: FileHash = {
      value: await hashFile(filePath, this.hashAlgorithm, this.hashBlockSize),
      algorithm: this.hashAlgorithm,
    };
    return { file_hash: { ...fileHash } };
  }

  private async addTimestamps(filePath: string): Promise<MetadataRecord> {
    const stats = await fs.stat(filePath);
    const timestamps: FileTimestamps = {
      modified: formatStatsTimestamp(stats, 'modified', this.localTime),
      created: formatStatsTimestamp(stats, 'created', this.localTime),
    };
    return { file_timestamps: { ...timestamps } };
  }
}
