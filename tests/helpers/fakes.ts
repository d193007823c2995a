import type { ImageTagOptions, ImageTagReader } from '../../src/services/media/imageTagService.js';
import type { MultimediaProber } from '../../src/services/media/ffprobeService.js';
import type { Capability, MetadataRecord } from '../../src/types/metadata.js';

/**
 * In-process stand-ins for the image libraries and the ffprobe executable
 */

export const FFPROBE_AVAILABLE: Capability = {
  status: 'available',
  name: 'ffprobe',
  version: '6.1.1',
  location: '/opt/ffmpeg/bin/ffprobe',
};

export const FFPROBE_MISSING: Capability = {
  status: 'unavailable',
  name: 'ffprobe',
  reason: "Cannot find 'ffprobe' executable (in PATH)",
  hint: 'Install FFmpeg.',
};

export const IMAGE_LIBS_AVAILABLE: Capability = {
  status: 'available',
  name: 'sharp+exifr',
  version: 'libvips 8.15.2',
};

export const IMAGE_LIBS_MISSING: Capability = {
  status: 'unavailable',
  name: 'sharp',
  reason: 'Could not load the "sharp" module',
  hint: 'Install sharp.',
};

export class FakeTagReader implements ImageTagReader {
  detectCalls = 0;
  readonly reads: Array<{ filePath: string; options: ImageTagOptions }> = [];

  constructor(
    private readonly capability: Capability,
    private readonly tags: MetadataRecord = {}
  ) {}

  async detect(): Promise<Capability> {
    this.detectCalls++;
    return this.capability;
  }

  async read(filePath: string, options: ImageTagOptions): Promise<MetadataRecord> {
    this.reads.push({ filePath, options });
    return this.tags;
  }
}

export class FakeProber implements MultimediaProber {
  detectCalls = 0;
  readonly probes: Array<{ filePath: string; executablePath: string }> = [];

  constructor(
    private readonly capability: Capability,
    private readonly info: MetadataRecord = { streams: [], format: {} }
  ) {}

  async detect(): Promise<Capability> {
    this.detectCalls++;
    return this.capability;
  }

  async probe(filePath: string, executablePath: string): Promise<MetadataRecord> {
    this.probes.push({ filePath, executablePath });
    return this.info;
  }
}
