export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface ScanConfig {
  hashAlgorithm: string;
  hashBlockSize: number; // bytes
  localTime: boolean;
  experimentalMultimedia: boolean; // FFprobeScanner instead of Video + Audio
}

export interface ImageConfig {
  fractionsAsFloat: boolean;
  tagLayout: 'flat' | 'nested';
  tagSeparator: string;
}

export interface FfprobeConfig {
  binary: string;
  maxBuffer: number; // bytes of stdout accepted from ffprobe
}

export interface AppConfig {
  logging: LoggingConfig;
  scan: ScanConfig;
  image: ImageConfig;
  ffprobe: FfprobeConfig;
}
