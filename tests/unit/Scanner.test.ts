/**
 * Tests for the scanner base class: step registration, readiness state
 * machine and scan gating
 */

import { Scanner } from '../../src/services/scanners/Scanner.js';
import {
  ErrorCode,
  GeneralError,
  InvalidStepError,
  MissingDependencyError,
} from '../../src/errors/index.js';
import {
  Capability,
  ExtractionStepFn,
  MetadataRecord,
  ScannerState,
} from '../../src/types/metadata.js';
import { createTempDir, removeTempDir, writeFixture } from '../helpers/testFiles.js';

class OpenScanner extends Scanner {
  readonly name = 'OpenScanner';
  readonly mimeTypes = ['*/*'];

  register(run: ExtractionStepFn, description?: string): void {
    this.registerStep(run, description);
  }
}

class ProbingScanner extends Scanner {
  readonly name = 'ProbingScanner';
  readonly mimeTypes = ['application/x-test'];

  probeCalls = 0;
  stepCalls = 0;

  constructor(private readonly outcome: () => Promise<Capability | null>) {
    super();
    this.registerStep(async () => {
      this.stepCalls++;
      return { probe_result: 'ok' };
    }, 'probe result');
  }

  protected detectCapability(): Promise<Capability | null> {
    this.probeCalls++;
    return this.outcome();
  }
}

const AVAILABLE: Capability = { status: 'available', name: 'test-lib', version: '1.2.3' };
const UNAVAILABLE: Capability = {
  status: 'unavailable',
  name: 'test-lib',
  reason: 'test-lib is not installed',
  hint: 'Install test-lib.',
};

describe('Scanner', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await createTempDir();
    filePath = await writeFixture(dir, 'sample.txt', '0123456789');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('registerStep', () => {
    it('should label steps with their description or function name', () => {
      const scanner = new OpenScanner();
      const helper = {
        async collect(path: string): Promise<MetadataRecord> {
          return { collected: path };
        },
      };
      async function readMarker(path: string): Promise<MetadataRecord> {
        return { marker: path };
      }

      scanner.register(async () => ({ described: true }), 'described step');
      scanner.register(readMarker);
      scanner.register(helper.collect.bind(helper));

      expect(scanner.describeSteps()).toEqual(['described step', 'readMarker', 'collect']);
    });

    it('should reject a value that is not callable', () => {
      const scanner = new OpenScanner();

      expect(() => scanner.register(JSON.parse('"not-a-function"'))).toThrow(InvalidStepError);
    });

    it('should reject a step taking more than the file path', () => {
      const scanner = new OpenScanner();
      const twoArguments: ExtractionStepFn = Object.defineProperty(
        async (path: string) => ({ path }),
        'length',
        { value: 2 }
      );

      let caught: unknown;
      try {
        scanner.register(twoArguments, 'two arguments');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidStepError);
      expect(caught).toMatchObject({ code: ErrorCode.SCANNER_INVALID_STEP, scanner: 'OpenScanner' });
      expect(scanner.describeSteps()).toEqual([]);
    });

    it('should reject an anonymous step without a description', () => {
      const scanner = new OpenScanner();
      const makeStep = (): ExtractionStepFn => async path => ({ path });

      expect(() => scanner.register(makeStep())).toThrow(InvalidStepError);
    });

    it('should keep steps per instance', () => {
      const first = new OpenScanner();
      const second = new OpenScanner();

      first.register(async () => ({ only_first: true }), 'first only');

      expect(first.describeSteps()).toEqual(['first only']);
      expect(second.describeSteps()).toEqual([]);
    });
  });

  describe('preChecks', () => {
    it('should mark a scanner without dependencies ready', async () => {
      const scanner = new OpenScanner();
      expect(scanner.getState()).toBe(ScannerState.NOT_READY);

      await scanner.preChecks();

      expect(scanner.isReady).toBe(true);
      expect(scanner.getCapability()).toBeNull();
    });

    it('should probe once and cache a success', async () => {
      const scanner = new ProbingScanner(async () => AVAILABLE);

      await scanner.preChecks();
      await scanner.preChecks();

      expect(scanner.probeCalls).toBe(1);
      expect(scanner.getState()).toBe(ScannerState.READY);
      expect(scanner.getCapability()).toEqual(AVAILABLE);
    });

    it('should convert an unavailable capability into a cached MissingDependencyError', async () => {
      const scanner = new ProbingScanner(async () => UNAVAILABLE);

      let first: unknown;
      try {
        await scanner.preChecks();
      } catch (error) {
        first = error;
      }

      expect(first).toBeInstanceOf(MissingDependencyError);
      expect(first).toMatchObject({
        dependency: 'test-lib',
        hint: 'Install test-lib.',
        message: 'ProbingScanner: test-lib is not installed. Install test-lib.',
      });
      expect(scanner.getState()).toBe(ScannerState.FAILED);

      await expect(scanner.preChecks()).rejects.toBe(first);
      expect(scanner.probeCalls).toBe(1);
    });

    it('should convert a throwing probe into a MissingDependencyError', async () => {
      const scanner = new ProbingScanner(async () => {
        throw new Error('module failed to load');
      });

      await expect(scanner.preChecks()).rejects.toMatchObject({
        code: ErrorCode.SYSTEM_DEPENDENCY_MISSING,
        dependency: 'ProbingScanner',
        message:
          'ProbingScanner: module failed to load. ' +
          'Check that the dependencies of this scanner are installed.',
      });
    });

    it('should share one probe between concurrent callers', async () => {
      const scanner = new ProbingScanner(async () => AVAILABLE);

      await Promise.all([scanner.preChecks(), scanner.preChecks(), scanner.preChecks()]);

      expect(scanner.probeCalls).toBe(1);
      expect(scanner.isReady).toBe(true);
    });

    it('should probe again after resetReadiness', async () => {
      let capability: Capability = UNAVAILABLE;
      const scanner = new ProbingScanner(async () => capability);

      await expect(scanner.preChecks()).rejects.toBeInstanceOf(MissingDependencyError);

      scanner.resetReadiness();
      expect(scanner.getState()).toBe(ScannerState.NOT_READY);
      expect(scanner.getCapability()).toBeNull();

      capability = AVAILABLE;
      await scanner.preChecks();

      expect(scanner.probeCalls).toBe(2);
      expect(scanner.isReady).toBe(true);
    });

    it('should discard a readiness check still running when resetReadiness is called', async () => {
      const results: Array<(capability: Capability) => void> = [];
      const scanner = new ProbingScanner(
        () => new Promise<Capability>(resolve => results.push(resolve))
      );

      const first = scanner.preChecks();
      scanner.resetReadiness();
      const second = scanner.preChecks();

      expect(scanner.probeCalls).toBe(2);

      results[0](UNAVAILABLE);
      results[1](AVAILABLE);
      await Promise.all([first, second]);

      expect(scanner.isReady).toBe(true);
      expect(scanner.getCapability()).toEqual(AVAILABLE);
    });
  });

  describe('scan', () => {
    it('should refuse to run before pre-checks and run no step', async () => {
      const scanner = new ProbingScanner(async () => AVAILABLE);

      let caught: unknown;
      try {
        await scanner.scan(filePath);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(GeneralError);
      expect(caught).toMatchObject({
        code: ErrorCode.SCANNER_NOT_READY,
        message: 'ProbingScanner: pre checks have not passed. Run preChecks() first.',
      });
      expect(scanner.stepCalls).toBe(0);
    });

    it('should rethrow the cached failure and run no step', async () => {
      const scanner = new ProbingScanner(async () => UNAVAILABLE);
      await expect(scanner.preChecks()).rejects.toBeInstanceOf(MissingDependencyError);

      await expect(scanner.scan(filePath)).rejects.toBeInstanceOf(MissingDependencyError);
      expect(scanner.stepCalls).toBe(0);
    });

    it('should run the steps once ready', async () => {
      const scanner = new ProbingScanner(async () => AVAILABLE);
      await scanner.preChecks();

      await expect(scanner.scan(filePath)).resolves.toEqual({ probe_result: 'ok' });
      expect(scanner.stepCalls).toBe(1);
    });

    it('should run steps in registration order, later keys winning', async () => {
      const scanner = new OpenScanner();
      const order: string[] = [];
      scanner.register(async () => {
        order.push('first');
        return { shared: 'first', a: 1 };
      }, 'first');
      scanner.register(async () => {
        order.push('second');
        return { shared: 'second', b: 2 };
      }, 'second');
      await scanner.preChecks();

      const result = await scanner.scan(filePath);

      expect(order).toEqual(['first', 'second']);
      expect(result).toEqual({ shared: 'second', a: 1, b: 2 });
      expect(Object.keys(result)).toEqual(['shared', 'a', 'b']);
    });

    it('should reject missing paths and directories', async () => {
      const scanner = new ProbingScanner(async () => AVAILABLE);
      await scanner.preChecks();

      await expect(scanner.scan(`${dir}/missing.txt`)).rejects.toMatchObject({
        code: ErrorCode.FS_FILE_NOT_FOUND,
      });
      await expect(scanner.scan(dir)).rejects.toMatchObject({ code: ErrorCode.FS_NOT_A_FILE });
      expect(scanner.stepCalls).toBe(0);
    });
  });

  describe('summary', () => {
    it('should describe name, patterns, state and steps', async () => {
      const scanner = new ProbingScanner(async () => AVAILABLE);
      await scanner.preChecks();

      expect(scanner.summary()).toEqual({
        name: 'ProbingScanner',
        mimeTypes: ['application/x-test'],
        state: ScannerState.READY,
        steps: ['probe result'],
      });
    });
  });
});
