export { MetadataService, toJson, type MetadataServiceOptions } from './services/metadataService.js';
export {
  crawlDirectory,
  type CrawlEntry,
  type MetadataSource,
} from './services/directoryScanService.js';
export * from './services/scanners/index.js';
export {
  FfprobeProber,
  probeMultimedia,
  parseProbeOutput,
  type CommandRunner,
  type MultimediaProber,
} from './services/media/ffprobeService.js';
export {
  SharpExifrTagReader,
  toRational,
  type ImageTagOptions,
  type ImageTagReader,
} from './services/media/imageTagService.js';
export {
  TreeDict,
  addNode,
  toFlatMapping,
  toNested,
  treeFromNested,
  flattenTree,
  unflattenTree,
} from './utils/treeDict.js';
export { hashFile, hashData } from './utils/fileHash.js';
export { getFileTimestamp, formatTimestamp } from './utils/fileTimeUtils.js';
export { findExecutable } from './utils/binaryCheck.js';
export { guessMimeType, matchesMimePattern } from './utils/mimeType.js';
export { ConfigManager } from './config/ConfigManager.js';
export { defaultConfig } from './config/defaults.js';
export type { AppConfig } from './config/types.js';
export { logger, initializeLogger } from './utils/logging.js';
export * from './errors/index.js';
export * from './types/metadata.js';
