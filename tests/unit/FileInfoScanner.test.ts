/**
 * Tests for FileInfoScanner
 */

import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { FileInfoScanner } from '../../src/services/scanners/FileInfoScanner.js';
import { ErrorCode } from '../../src/errors/index.js';
import {
  TIMESTAMP_PATTERN,
  createTempDir,
  removeTempDir,
  writeFixture,
} from '../helpers/testFiles.js';

const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

describe('FileInfoScanner', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function scanWith(scanner: FileInfoScanner, filePath: string) {
    await scanner.preChecks();
    return scanner.scan(filePath);
  }

  it('should describe a small text file', async () => {
    const filePath = await writeFixture(dir, 'sample.txt', '0123456789');
    const expectedHash = crypto.createHash('sha256').update('0123456789').digest('hex');

    const record = await scanWith(new FileInfoScanner(), filePath);

    expect(Object.keys(record)).toEqual([
      'file_name',
      'file_type',
      'file_size',
      'mime_type',
      'file_hash',
      'file_timestamps',
    ]);
    expect(record).toMatchObject({
      file_name: 'sample.txt',
      file_type: 'text',
      file_size: 10,
      mime_type: 'text/plain',
      file_hash: { value: expectedHash, algorithm: 'sha256' },
    });
  });

  it('should describe a zero-byte file', async () => {
    const filePath = await writeFixture(dir, 'empty.txt');

    const record = await scanWith(new FileInfoScanner(), filePath);

    expect(record.file_size).toBe(0);
    expect(record.file_hash).toEqual({ value: EMPTY_SHA256, algorithm: 'sha256' });
  });

  it('should fall back for unknown extensions', async () => {
    const filePath = await writeFixture(dir, 'blob.zzqq', 'data');

    const record = await scanWith(new FileInfoScanner(), filePath);

    expect(record.file_type).toBe('unknown');
    expect(record.mime_type).toBe('application/octet-stream');
  });

  it('should use the injected MIME detector', async () => {
    const filePath = await writeFixture(dir, 'no-extension', 'data');
    const scanner = new FileInfoScanner({ mimeDetector: async () => 'image/png' });

    const record = await scanWith(scanner, filePath);

    expect(record.mime_type).toBe('image/png');
    expect(record.file_type).toBe('unknown');
  });

  it('should honour the configured hash algorithm', async () => {
    const filePath = await writeFixture(dir, 'hello.txt', 'hello world');
    const scanner = new FileInfoScanner({ hashAlgorithm: 'md5', hashBlockSize: 4 });

    const record = await scanWith(scanner, filePath);

    expect(record.file_hash).toEqual({
      value: '5eb63bbbe01eeed093cb22bb8f5acdc3',
      algorithm: 'md5',
    });
  });

  it('should format timestamps', async () => {
    const filePath = await writeFixture(dir, 'photo.jpg', 'x');
    const modified = new Date(2023, 5, 15, 10, 20, 30);
    await fs.utimes(filePath, modified, modified);

    const record = await scanWith(new FileInfoScanner(), filePath);

    expect(record.file_timestamps).toEqual({
      modified: '2023-06-15 10:20:30',
      created: expect.stringMatching(TIMESTAMP_PATTERN),
    });
  });

  it('should return the same hash and timestamps on repeated scans', async () => {
    const filePath = await writeFixture(dir, 'clip.mp4', 'not really a video');
    const scanner = new FileInfoScanner();

    const first = await scanWith(scanner, filePath);
    const second = await scanWith(scanner, filePath);

    expect(second.file_hash).toEqual(first.file_hash);
    expect(second.file_timestamps).toEqual(first.file_timestamps);
    expect(first.file_type).toBe('video');
  });

  it('should reject a missing path', async () => {
    const scanner = new FileInfoScanner();
    await scanner.preChecks();

    await expect(scanner.scan(path.join(dir, 'missing.txt'))).rejects.toMatchObject({
      code: ErrorCode.FS_FILE_NOT_FOUND,
    });
  });

  it('should list its steps in order', () => {
    expect(new FileInfoScanner().describeSteps()).toEqual([
      'file name',
      'file type',
      'file size',
      'mime type',
      'content hash',
      'timestamps',
    ]);
  });
});
