import { MultimediaScanner, MultimediaScannerOptions } from './MultimediaScanner.js';
import { MetadataRecord } from '../../types/metadata.js';

/**
 * Describes the container and streams of video files in `video_metadata`.
 * Needs ffprobe (FFmpeg suite) on the search path.
 */
export class VideoInfoScanner extends MultimediaScanner {
  readonly name = 'VideoInfoScanner';
  readonly mimeTypes = ['video/*'];

  constructor(options: MultimediaScannerOptions = {}) {
    super(options);
    this.registerStep(this.addVideoMetadata.bind(this), 'video stream probe');
  }

  private async addVideoMetadata(filePath: string): Promise<MetadataRecord> {
    return { video_metadata: await this.probe(filePath) };
  }
}
