export { Scanner, assertRegularFile } from './Scanner.js';
export { FileInfoScanner, type FileInfoScannerOptions, type MimeDetector } from './FileInfoScanner.js';
export { ImageInfoScanner, type ImageInfoScannerOptions } from './ImageInfoScanner.js';
export { MultimediaScanner, type MultimediaScannerOptions } from './MultimediaScanner.js';
export { VideoInfoScanner } from './VideoInfoScanner.js';
export { AudioInfoScanner } from './AudioInfoScanner.js';
export { FFprobeScanner, type FFprobeScannerOptions } from './FFprobeScanner.js';
export { TextInfoScanner } from './TextInfoScanner.js';
