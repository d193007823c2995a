import { MultimediaScanner, MultimediaScannerOptions } from './MultimediaScanner.js';
import { MimeDetector } from './FileInfoScanner.js';
import { DEFAULT_MIME_TYPE, getMimeCategory, guessMimeType } from '../../utils/mimeType.js';
import { ErrorCode, GeneralError } from '../../errors/index.js';
import { MetadataRecord } from '../../types/metadata.js';

export interface FFprobeScannerOptions extends MultimediaScannerOptions {
  mimeDetector?: MimeDetector;
}

/**
 * Experimental: one probe for both audio and video files. The facet key is
 * chosen from the file's MIME type (`video_metadata` or `audio_metadata`).
 */
export class FFprobeScanner extends MultimediaScanner {
  readonly name = 'FFprobeScanner';
  readonly mimeTypes = ['video/*', 'audio/*'];

  private readonly mimeDetector: MimeDetector;

  constructor(options: FFprobeScannerOptions = {}) {
    super(options);
    this.mimeDetector = options.mimeDetector ?? guessMimeType;
    this.registerStep(this.addMultimediaMetadata.bind(this), 'multimedia probe');
  }

  private async addMultimediaMetadata(filePath: string): Promise<MetadataRecord> {
    const mimeType = (await this.mimeDetector(filePath)) ?? DEFAULT_MIME_TYPE;

    // Classify before spawning the prober
    const category = getMimeCategory(mimeType);
    if (category !== 'video' && category !== 'audio') {
      throw new GeneralError(
        `${this.name} handles audio and video files only, got '${mimeType}'`,
        ErrorCode.SCANNER_UNSUPPORTED_TYPE,
        { service: this.name, operation: 'scan', filePath, metadata: { mimeType } }
      );
    }

    const info = await this.probe(filePath);
    return category === 'video' ? { video_metadata: info } : { audio_metadata: info };
  }
}
