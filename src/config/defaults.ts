import { AppConfig } from './types.js';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

export const defaultConfig: AppConfig = {
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10m',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  scan: {
    hashAlgorithm: 'sha256',
    hashBlockSize: 8 * 1024 * 1024, // 8 MiB
    localTime: true,
    experimentalMultimedia: false,
  },
  image: {
    fractionsAsFloat: false,
    tagLayout: 'flat',
    tagSeparator: '.',
  },
  ffprobe: {
    binary: 'ffprobe',
    maxBuffer: 10 * 1024 * 1024,
  },
};
