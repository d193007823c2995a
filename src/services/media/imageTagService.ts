import type sharp from 'sharp';
import type { parse } from 'exifr';
import { logger } from '../../utils/logging.js';
import { formatTimestamp } from '../../utils/fileTimeUtils.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { setOwn } from '../../utils/treeDict.js';
import { ExtractionError, MissingDependencyError } from '../../errors/index.js';
import { Capability, MetadataRecord, MetadataValue } from '../../types/metadata.js';

/**
 * Image Tag Service
 *
 * Reads image header properties (sharp/libvips) and the EXIF, XMP and IPTC
 * groups (exifr) of an image and returns them as one nested, JSON-safe tree:
 *
 * ```
 * { image: { format, width, ... }, ifd0: { Make, ... }, exif: { ... }, gps: { ... }, xmp: { ... }, iptc: { ... } }
 * ```
 */

export const IMAGE_LIBRARIES_HINT =
  'Install the image libraries with `npm install sharp exifr`; sharp needs a prebuilt libvips for this platform.';

export interface ImageTagOptions {
  /** Keep non-integral numbers as floats instead of rational strings such as "1/250" */
  fractionsAsFloat: boolean;
}

export interface ImageTagReader {
  detect(): Promise<Capability>;
  read(filePath: string, options: ImageTagOptions): Promise<MetadataRecord>;
}

/**
 * The image libraries, loaded on first use so that a missing sharp or
 * libvips shows up as an unavailable capability instead of a load failure
 */
interface ImageLibraries {
  sharp: typeof sharp;
  parseExif: typeof parse;
}

// Messages the libraries give for a well-formed file in a format they do not read
const UNSUPPORTED_FORMAT_PATTERNS = [/unsupported image format/i, /unknown file format/i];

export function isUnsupportedFormatError(message: string): boolean {
  return UNSUPPORTED_FORMAT_PATTERNS.some(pattern => pattern.test(message));
}

const MAX_RATIONAL_DENOMINATOR = 10000;
const RATIONAL_TOLERANCE = 1e-9;

/**
 * Render a number as the simplest fraction "n/d" (d ≤ 10000) equal to it,
 * or return the number itself when no such fraction exists
 */
export function toRational(value: number): string | number {
  if (!Number.isFinite(value) || Number.isInteger(value)) {
    return value;
  }

  const sign = value < 0 ? '-' : '';
  const target = Math.abs(value);

  // Continued fraction convergents
  let [prevNum, num] = [0, 1];
  let [prevDen, den] = [1, 0];
  let remainder = target;

  for (let i = 0; i < 64; i++) {
    const whole = Math.floor(remainder);
    [prevNum, num] = [num, whole * num + prevNum];
    [prevDen, den] = [den, whole * den + prevDen];

    if (den > MAX_RATIONAL_DENOMINATOR) {
      return value;
    }
    if (Math.abs(num / den - target) <= RATIONAL_TOLERANCE * Math.max(1, target)) {
      return `${sign}${num}/${den}`;
    }

    const fraction = remainder - whole;
    if (fraction === 0) break;
    remainder = 1 / fraction;
  }

  return value;
}

/**
 * Convert a value produced by the tag libraries into JSON-safe metadata.
 * Binary blobs and non-finite numbers have no JSON form and are dropped
 * (undefined).
 */
export function toMetadataValue(value: unknown, options: ImageTagOptions): MetadataValue | undefined {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
      return value.replace(/\0+$/, '');
    case 'boolean':
      return value;
    case 'number':
      if (!Number.isFinite(value)) return undefined;
      return options.fractionsAsFloat ? value : toRational(value);
    case 'bigint':
      return value.toString();
    default:
      break;
  }

  // EXIF dates carry no zone; exifr builds them from local components
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : formatTimestamp(value, true);
  }

  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) {
    return undefined;
  }

  if (Array.isArray(value)) {
    const items: MetadataValue[] = [];
    for (const item of value) {
      const converted = toMetadataValue(item, options);
      if (converted !== undefined) items.push(converted);
    }
    return items;
  }

  if (typeof value === 'object') {
    const result: MetadataRecord = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toMetadataValue(item, options);
      if (converted !== undefined) setOwn(result, key, converted);
    }
    return result;
  }

  return undefined;
}

/**
 * Header properties reported by libvips
 */
async function readImageProperties(
  libraries: ImageLibraries,
  filePath: string
): Promise<MetadataRecord> {
  const meta = await libraries.sharp(filePath).metadata();

  const properties: Record<string, string | number | boolean | undefined> = {
    format: meta.format,
    width: meta.width,
    height: meta.height,
    space: meta.space,
    channels: meta.channels,
    depth: meta.depth,
    density: meta.density,
    chromaSubsampling: meta.chromaSubsampling,
    isProgressive: meta.isProgressive,
    pages: meta.pages,
    hasProfile: meta.hasProfile,
    hasAlpha: meta.hasAlpha,
    orientation: meta.orientation,
  };

  const result: MetadataRecord = {};
  for (const [key, value] of Object.entries(properties)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * EXIF (ifd0, exif, gps), XMP and IPTC groups
 */
async function readTagGroups(
  libraries: ImageLibraries,
  filePath: string,
  options: ImageTagOptions
): Promise<MetadataRecord> {
  const raw: unknown = await libraries.parseExif(filePath, {
    tiff: true,
    xmp: true,
    iptc: true,
    icc: false,
    jfif: false,
    ihdr: false,
    mergeOutput: false,
    translateValues: true,
    reviveValues: true,
  });

  // exifr resolves to undefined when the file carries no tags
  if (raw === undefined || raw === null) {
    return {};
  }

  const converted = toMetadataValue(raw, options);
  return typeof converted === 'object' && converted !== null && !Array.isArray(converted)
    ? converted
    : {};
}

type UnavailableCapability = Extract<Capability, { status: 'unavailable' }>;

type LoadResult =
  | { loaded: true; libraries: ImageLibraries; version: string }
  | { loaded: false; capability: UnavailableCapability };

function unavailable(name: string, reason: string): UnavailableCapability {
  return { status: 'unavailable', name, reason, hint: IMAGE_LIBRARIES_HINT };
}

async function loadImageLibraries(): Promise<LoadResult> {
  let sharpModule: typeof sharp;
  let version: string;
  try {
    sharpModule = (await import('sharp')).default;
    version = `libvips ${sharpModule.versions.vips}`;
  } catch (error) {
    return { loaded: false, capability: unavailable('sharp', getErrorMessage(error)) };
  }

  let parseExif: typeof parse;
  try {
    parseExif = (await import('exifr')).parse;
  } catch (error) {
    return { loaded: false, capability: unavailable('exifr', getErrorMessage(error)) };
  }

  if (typeof parseExif !== 'function') {
    return {
      loaded: false,
      capability: unavailable('exifr', 'exifr did not load a parse() function'),
    };
  }

  return { loaded: true, libraries: { sharp: sharpModule, parseExif }, version };
}

export class SharpExifrTagReader implements ImageTagReader {
  private libraries: ImageLibraries | null = null;

  async detect(): Promise<Capability> {
    const result = await loadImageLibraries();
    if (!result.loaded) {
      return result.capability;
    }

    this.libraries = result.libraries;
    return { status: 'available', name: 'sharp+exifr', version: result.version };
  }

  async read(filePath: string, options: ImageTagOptions): Promise<MetadataRecord> {
    const libraries = await this.loadLibraries();
    const startTime = Date.now();
    const failures: string[] = [];
    let unsupported = 0;
    const tree: MetadataRecord = {};

    try {
      tree.image = await readImageProperties(libraries, filePath);
    } catch (error) {
      const message = getErrorMessage(error);
      failures.push(`sharp: ${message}`);
      if (isUnsupportedFormatError(message)) unsupported++;
      logger.debug('Image properties unavailable', { filePath, error: message });
    }

    try {
      Object.assign(tree, await readTagGroups(libraries, filePath, options));
    } catch (error) {
      const message = getErrorMessage(error);
      failures.push(`exifr: ${message}`);
      if (isUnsupportedFormatError(message)) unsupported++;
      logger.debug('Image tags unavailable', { filePath, error: message });
    }

    // Neither library reads this format: no tags, like a file that carries none
    if (failures.length === 2 && unsupported === 2) {
      logger.debug('Image format not supported by the tag readers', { filePath });
      return {};
    }

    if (failures.length === 2) {
      throw new ExtractionError(
        'sharp+exifr',
        `Could not read image metadata from ${filePath} (${failures.join('; ')})`,
        { operation: 'readImageTags', filePath }
      );
    }

    logger.debug('Extracted image tags', {
      filePath,
      groups: Object.keys(tree),
      timeMs: Date.now() - startTime,
    });

    return tree;
  }

  private async loadLibraries(): Promise<ImageLibraries> {
    if (this.libraries) {
      return this.libraries;
    }

    const result = await loadImageLibraries();
    if (!result.loaded) {
      const { name, reason, hint } = result.capability;
      throw new MissingDependencyError(name, hint, `${name}: ${reason}. ${hint}`, {
        service: 'SharpExifrTagReader',
        operation: 'readImageTags',
      });
    }

    this.libraries = result.libraries;
    return result.libraries;
  }
}
