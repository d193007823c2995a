import dotenv from 'dotenv';
import { AppConfig, ImageConfig, LoggingConfig, ScanConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';
import { isSupportedHashAlgorithm } from '../utils/fileHash.js';

function isOneOf<T extends string>(value: string, validValues: readonly T[]): value is T {
  return validValues.some(valid => valid === value);
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    // Scan configuration
    config.scan.hashAlgorithm = this.getString('SCAN_HASH_ALGORITHM', config.scan.hashAlgorithm);
    config.scan.hashBlockSize = this.getNumber('SCAN_HASH_BLOCK_SIZE', config.scan.hashBlockSize);
    config.scan.localTime = this.getBoolean('SCAN_LOCAL_TIME', config.scan.localTime);
    config.scan.experimentalMultimedia = this.getBoolean(
      'SCAN_EXPERIMENTAL_MULTIMEDIA',
      config.scan.experimentalMultimedia
    );

    // Image tag configuration
    config.image.fractionsAsFloat = this.getBoolean(
      'IMAGE_FRACTIONS_AS_FLOAT',
      config.image.fractionsAsFloat
    );
    config.image.tagLayout = this.getEnum('IMAGE_TAG_LAYOUT', config.image.tagLayout, [
      'flat',
      'nested',
    ]);
    config.image.tagSeparator = this.getString('IMAGE_TAG_SEPARATOR', config.image.tagSeparator);

    // FFprobe configuration
    config.ffprobe.binary = this.getString('FFPROBE_BINARY', config.ffprobe.binary);
    config.ffprobe.maxBuffer = this.getNumber('FFPROBE_MAX_BUFFER', config.ffprobe.maxBuffer);

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    const value = process.env[key];
    return value || defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    if (!isOneOf(value, validValues)) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return value;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  getScanConfig(): ScanConfig {
    return this.config.scan;
  }

  getImageConfig(): ImageConfig {
    return this.config.image;
  }

  reload(): void {
    dotenv.config();
    this.config = this.loadConfig();
  }

  validate(): void {
    const errors: string[] = [];

    if (!isSupportedHashAlgorithm(this.config.scan.hashAlgorithm)) {
      errors.push(
        `SCAN_HASH_ALGORITHM '${this.config.scan.hashAlgorithm}' is not a supported hash algorithm`
      );
    }

    if (this.config.scan.hashBlockSize <= 0) {
      errors.push('SCAN_HASH_BLOCK_SIZE must be a positive number of bytes');
    }

    if (this.config.image.tagSeparator.length === 0) {
      errors.push('IMAGE_TAG_SEPARATOR must not be empty');
    }

    if (this.config.ffprobe.maxBuffer <= 0) {
      errors.push('FFPROBE_MAX_BUFFER must be a positive number of bytes');
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        'validation',
        `Configuration validation failed:\n${errors.join('\n')}`
      );
    }
  }
}
