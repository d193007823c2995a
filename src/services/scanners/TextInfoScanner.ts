import { Scanner } from './Scanner.js';

/**
 * Placeholder for text files: always ready, registers no steps, so it
 * contributes nothing to the record yet.
 */
export class TextInfoScanner extends Scanner {
  readonly name = 'TextInfoScanner';
  readonly mimeTypes = ['text/*'];
}
