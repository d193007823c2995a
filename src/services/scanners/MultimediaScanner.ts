import { Scanner } from './Scanner.js';
import { FfprobeProber, MultimediaProber } from '../media/ffprobeService.js';
import { ErrorCode, GeneralError } from '../../errors/index.js';
import { Capability, MetadataRecord } from '../../types/metadata.js';

export interface MultimediaScannerOptions {
  prober?: MultimediaProber;
}

/**
 * Shared base of the scanners that describe audio and video streams through
 * an external prober (ffprobe by default)
 */
export abstract class MultimediaScanner extends Scanner {
  protected readonly prober: MultimediaProber;
  private proberPath: string | null = null;

  constructor(options: MultimediaScannerOptions = {}) {
    super();
    this.prober = options.prober ?? new FfprobeProber();
  }

  protected async detectCapability(): Promise<Capability> {
    const capability = await this.prober.detect();
    this.proberPath = capability.status === 'available' ? capability.location ?? capability.name : null;
    return capability;
  }

  protected probe(filePath: string): Promise<MetadataRecord> {
    if (this.proberPath === null) {
      throw new GeneralError(
        `${this.name}: prober location unknown. Run preChecks() first.`,
        ErrorCode.SCANNER_NOT_READY,
        { service: this.name, operation: 'probe', filePath }
      );
    }
    return this.prober.probe(filePath, this.proberPath);
  }
}
