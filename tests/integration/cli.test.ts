/**
 * End-to-end runs of the metadump command with captured output
 */

import path from 'path';
import { EXIT_OK, EXIT_PARTIAL, EXIT_USAGE, USAGE, runCli } from '../../src/cli.js';
import { ConfigManager } from '../../src/config/ConfigManager.js';
import { MetadataSource } from '../../src/services/directoryScanService.js';
import { MetadataService } from '../../src/services/metadataService.js';
import { TextInfoScanner } from '../../src/services/scanners/index.js';
import { logger } from '../../src/utils/logging.js';
import { createTempDir, removeTempDir, writeFixture } from '../helpers/testFiles.js';

function captureOutput() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    output: {
      stdout: (text: string) => stdout.push(text),
      stderr: (text: string) => stderr.push(text),
    },
  };
}

describe('metadump CLI', () => {
  let dir: string;
  let service: MetadataService;
  const originalLevel = logger.level;

  beforeEach(async () => {
    dir = await createTempDir();
    service = new MetadataService({ scanners: [new TextInfoScanner()] });
  });

  afterEach(async () => {
    logger.level = originalLevel;
    await removeTempDir(dir);
  });

  describe('argument handling', () => {
    it('should require --path', async () => {
      const { output, stderr, stdout } = captureOutput();

      await expect(runCli([], { output, service })).resolves.toBe(EXIT_USAGE);
      expect(stderr).toEqual(['Missing required option --path', USAGE]);
      expect(stdout).toEqual([]);
    });

    it('should print usage for --help', async () => {
      const { output, stderr } = captureOutput();

      await expect(runCli(['--help'], { output, service })).resolves.toBe(EXIT_OK);
      expect(stderr).toEqual([USAGE]);
    });

    it('should reject unknown options', async () => {
      const { output, stderr } = captureOutput();

      await expect(runCli(['--path', dir, '--bogus'], { output, service })).resolves.toBe(
        EXIT_USAGE
      );
      expect(stderr).toHaveLength(2);
      expect(stderr[1]).toBe(USAGE);
    });

    it('should reject an invalid indent', async () => {
      const { output, stderr } = captureOutput();

      await expect(
        runCli(['--path', dir, '--indent', 'wide'], { output, service })
      ).resolves.toBe(EXIT_USAGE);
      expect(stderr).toEqual([
        "Invalid --indent 'wide': expected an integer from 0 to 10",
        USAGE,
      ]);
    });
  });

  describe('crawling', () => {
    it('should print one header and one JSON record per file', async () => {
      const filePath = await writeFixture(dir, 'one.txt', 'abc');
      const { output, stdout } = captureOutput();

      await expect(runCli(['--path', dir], { output, service })).resolves.toBe(EXIT_OK);

      expect(stdout).toHaveLength(2);
      expect(stdout[0]).toBe(`processing file: ${filePath}`);
      expect(JSON.parse(stdout[1] ?? '')).toMatchObject({
        file_name: 'one.txt',
        file_size: 3,
        mime_type: 'text/plain',
      });
      expect(stdout[1]).toContain('\n  "file_name": "one.txt",\n');
    });

    it('should honour --indent and the short path flag', async () => {
      await writeFixture(dir, 'one.txt', 'abc');
      const { output, stdout } = captureOutput();

      await expect(runCli(['-p', dir, '--indent', '0'], { output, service })).resolves.toBe(
        EXIT_OK
      );

      expect(stdout[1]?.startsWith('{"file_name":"one.txt","file_type":"text"')).toBe(true);
    });

    it('should raise the log level with --verbose', async () => {
      const { output } = captureOutput();

      await runCli(['--path', dir, '--verbose'], { output, service });

      expect(logger.level).toBe('debug');
    });

    it('should exit with 1 when the root does not exist', async () => {
      const missing = path.join(dir, 'missing');
      const { output, stderr, stdout } = captureOutput();

      await expect(runCli(['--path', missing], { output, service })).resolves.toBe(EXIT_USAGE);
      expect(stderr).toEqual([`Directory not found: ${missing}`]);
      expect(stdout).toEqual([]);
    });

    it('should exit with 2 when some files fail', async () => {
      const bad = await writeFixture(dir, 'a-bad.txt', 'broken');
      const good = await writeFixture(dir, 'b-good.txt', 'fine');
      const flaky: MetadataSource = {
        getMetadata: async filePath => {
          if (filePath === bad) throw new Error('cannot read');
          return service.getMetadata(filePath);
        },
      };
      const { output, stdout } = captureOutput();

      await expect(runCli(['--path', dir], { output, service: flaky })).resolves.toBe(
        EXIT_PARTIAL
      );
      expect(stdout[0]).toBe(`processing file: ${bad}`);
      expect(stdout[1]).toBe(`processing file: ${good}`);
      expect(stdout).toHaveLength(3);
    });
  });

  describe('configuration', () => {
    const savedAlgorithm = process.env.SCAN_HASH_ALGORITHM;

    afterEach(() => {
      if (savedAlgorithm === undefined) {
        delete process.env.SCAN_HASH_ALGORITHM;
      } else {
        process.env.SCAN_HASH_ALGORITHM = savedAlgorithm;
      }
      ConfigManager.getInstance().reload();
    });

    it('should exit with 1 before crawling when the configuration is invalid', async () => {
      await writeFixture(dir, 'notes.txt', 'hello');
      process.env.SCAN_HASH_ALGORITHM = 'not-a-hash';
      ConfigManager.getInstance().reload();
      const { output, stderr, stdout } = captureOutput();

      await expect(runCli(['--path', dir], { output })).resolves.toBe(EXIT_USAGE);
      expect(stderr).toEqual([
        "Configuration validation failed:\nSCAN_HASH_ALGORITHM 'not-a-hash' is not a supported hash algorithm",
      ]);
      expect(stdout).toEqual([]);
    });
  });
});
