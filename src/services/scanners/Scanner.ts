import fs from 'fs/promises';
import { logger } from '../../utils/logging.js';
import { getErrorCode, getErrorMessage, toError } from '../../utils/errorHandling.js';
import {
  ErrorCode,
  GeneralError,
  InvalidStepError,
  MissingDependencyError,
} from '../../errors/index.js';
import {
  Capability,
  ExtractionStep,
  ExtractionStepFn,
  MetadataRecord,
  ScannerState,
  ScannerSummary,
} from '../../types/metadata.js';

/**
 * Base Scanner
 *
 * A scanner extracts one facet of metadata from a file. Subclasses register
 * their extraction steps in the constructor; `scan()` runs them in
 * registration order and unions their partial records.
 *
 * Before a scanner can be used, `preChecks()` must pass. Scanners with an
 * external dependency override `detectCapability()`; the outcome is cached
 * until `resetReadiness()` is called.
 *
 * State machine:
 * ```
 * not_ready --preChecks ok--> ready
 * not_ready --preChecks fails--> failed
 * ready | failed --resetReadiness--> not_ready
 * ```
 */
export abstract class Scanner {
  /**
   * Human-readable scanner name, used in logs and reports
   */
  abstract readonly name: string;

  /**
   * MIME glob patterns of the files this scanner is meant for
   */
  abstract readonly mimeTypes: readonly string[];

  private readonly steps: ExtractionStep[] = [];
  private state: ScannerState = ScannerState.NOT_READY;
  private capability: Capability | null = null;
  private failure: MissingDependencyError | null = null;
  private pendingCheck: Promise<void> | null = null;
  // Bumped by resetReadiness(); a probe from an older generation is discarded
  private generation = 0;

  get isReady(): boolean {
    return this.state === ScannerState.READY;
  }

  getState(): ScannerState {
    return this.state;
  }

  /**
   * Capability found by the last successful or failed probe; null when the
   * scanner has no external dependency or has not been checked yet
   */
  getCapability(): Capability | null {
    return this.capability;
  }

  describeSteps(): string[] {
    return this.steps.map(step => step.description);
  }

  summary(): ScannerSummary {
    return {
      name: this.name,
      mimeTypes: this.mimeTypes,
      state: this.state,
      steps: this.describeSteps(),
    };
  }

  /**
   * Register an extraction step. Each step receives the file path and
   * returns a partial record.
   *
   * @param run - Step callback taking exactly the file path
   * @param description - Defaults to the function's name
   */
  protected registerStep(run: ExtractionStepFn, description?: string): void {
    if (typeof run !== 'function') {
      throw new InvalidStepError(
        this.name,
        `Step registered on ${this.name} is not callable`
      );
    }

    if (run.length > 1) {
      throw new InvalidStepError(
        this.name,
        `Step '${description ?? run.name}' on ${this.name} takes ${run.length} arguments; ` +
          'steps receive only the file path'
      );
    }

    const label = description ?? run.name.replace(/^bound /, '');
    if (label.trim().length === 0) {
      throw new InvalidStepError(
        this.name,
        `Anonymous step registered on ${this.name} without a description`
      );
    }

    this.steps.push({ run, description: label });
  }

  /**
   * Probe the external dependency. The default scanner has none and
   * returns null.
   *
   * An `unavailable` result, or any error thrown here, fails the pre-checks.
   */
  protected async detectCapability(): Promise<Capability | null> {
    return null;
  }

  /**
   * Verify that the scanner can run. Safe to call repeatedly: once the
   * outcome is known it is returned from cache, and concurrent callers share
   * one probe.
   *
   * @throws MissingDependencyError when the dependency is absent or unusable
   */
  async preChecks(): Promise<void> {
    if (this.state === ScannerState.READY) {
      return;
    }

    if (this.state === ScannerState.FAILED && this.failure) {
      throw this.failure;
    }

    if (!this.pendingCheck) {
      const check: Promise<void> = this.runPreChecks().finally(() => {
        if (this.pendingCheck === check) {
          this.pendingCheck = null;
        }
      });
      this.pendingCheck = check;
    }

    return this.pendingCheck;
  }

  /**
   * Forget the cached readiness outcome so the next `preChecks()` probes
   * the environment again
   */
  resetReadiness(): void {
    this.generation++;
    this.pendingCheck = null;
    this.state = ScannerState.NOT_READY;
    this.capability = null;
    this.failure = null;
  }

  private async runPreChecks(): Promise<void> {
    const generation = this.generation;
    let capability: Capability | null;

    try {
      capability = await this.detectCapability();
    } catch (error) {
      capability = {
        status: 'unavailable',
        name: this.name,
        reason: getErrorMessage(error),
        hint: 'Check that the dependencies of this scanner are installed.',
      };
    }

    if (generation !== this.generation) {
      return this.preChecks();
    }

    this.capability = capability;

    if (capability?.status === 'unavailable') {
      this.preChecksFail(capability);
    }

    this.preChecksPass();
  }

  private preChecksPass(): void {
    this.state = ScannerState.READY;

    const capability = this.capability;
    logger.debug('Scanner pre-checks passed', {
      scanner: this.name,
      ...(capability?.status === 'available' && {
        dependency: capability.name,
        version: capability.version,
      }),
    });
  }

  private preChecksFail(capability: Extract<Capability, { status: 'unavailable' }>): never {
    this.state = ScannerState.FAILED;
    this.failure = new MissingDependencyError(
      capability.name,
      capability.hint,
      `${this.name}: ${capability.reason}. ${capability.hint}`,
      { service: this.name, operation: 'preChecks' }
    );

    logger.debug('Scanner pre-checks failed', {
      scanner: this.name,
      dependency: capability.name,
      reason: capability.reason,
    });

    throw this.failure;
  }

  /**
   * Run every registered step on `filePath` and merge their partial records
   *
   * @throws GeneralError when pre-checks have not passed or the path is not a regular file
   * @throws MissingDependencyError when pre-checks failed
   */
  async scan(filePath: string): Promise<MetadataRecord> {
    if (this.state === ScannerState.FAILED && this.failure) {
      throw this.failure;
    }

    if (this.state !== ScannerState.READY) {
      throw new GeneralError(
        `${this.name}: pre checks have not passed. Run preChecks() first.`,
        ErrorCode.SCANNER_NOT_READY,
        { service: this.name, operation: 'scan', filePath }
      );
    }

    await assertRegularFile(filePath, this.name);

    const startTime = Date.now();
    const result: MetadataRecord = {};

    for (const step of this.steps) {
      Object.assign(result, await step.run(filePath));
    }

    logger.debug('Scan completed', {
      scanner: this.name,
      filePath,
      keys: Object.keys(result),
      timeMs: Date.now() - startTime,
    });

    return result;
  }
}

/**
 * Reject paths that are missing or not regular files
 */
export async function assertRegularFile(filePath: string, service?: string): Promise<void> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      throw new GeneralError(
        `Path is not a file: ${filePath}`,
        ErrorCode.FS_NOT_A_FILE,
        { service, operation: 'scan', filePath }
      );
    }
  } catch (error) {
    if (error instanceof GeneralError) {
      throw error;
    }

    throw new GeneralError(
      `Path not found or is not a file: ${filePath}`,
      getErrorCode(error) === 'ENOENT' ? ErrorCode.FS_FILE_NOT_FOUND : ErrorCode.FS_READ_FAILED,
      { service, operation: 'scan', filePath },
      toError(error)
    );
  }
}
