import { MultimediaScanner, MultimediaScannerOptions } from './MultimediaScanner.js';
import { MetadataRecord } from '../../types/metadata.js';

/**
 * Describes the container and streams of audio files in `audio_metadata`.
 * Needs ffprobe (FFmpeg suite) on the search path.
 */
export class AudioInfoScanner extends MultimediaScanner {
  readonly name = 'AudioInfoScanner';
  readonly mimeTypes = ['audio/*'];

  constructor(options: MultimediaScannerOptions = {}) {
    super(options);
    this.registerStep(this.addAudioMetadata.bind(this), 'audio stream probe');
  }

  private async addAudioMetadata(filePath: string): Promise<MetadataRecord> {
    return { audio_metadata: await this.probe(filePath) };
  }
}
