import { Scanner } from './Scanner.js';
import {
  ImageTagReader,
  SharpExifrTagReader,
} from '../media/imageTagService.js';
import { treeFromNested } from '../../utils/treeDict.js';
import { defaultConfig } from '../../config/defaults.js';
import { Capability, MetadataRecord } from '../../types/metadata.js';

export interface ImageInfoScannerOptions {
  fractionsAsFloat?: boolean;
  tagLayout?: 'flat' | 'nested';
  tagSeparator?: string;
  reader?: ImageTagReader;
}

/**
 * Extracts EXIF, XMP and IPTC tags plus header properties from image files
 * (JPEG, PNG, TIFF, HEIC, WebP, ...) into `image_metadata`.
 *
 * Tag groups are merged through a TreeDict, so the facet is either one flat
 * mapping (`{ "ifd0.Make": "Canon" }`) or the nested tree
 * (`{ ifd0: { Make: "Canon" } }`), depending on `tagLayout`.
 */
export class ImageInfoScanner extends Scanner {
  readonly name = 'ImageInfoScanner';
  readonly mimeTypes = ['image/*'];

  private readonly fractionsAsFloat: boolean;
  private readonly tagLayout: 'flat' | 'nested';
  private readonly tagSeparator: string;
  private readonly reader: ImageTagReader;

  constructor(options: ImageInfoScannerOptions = {}) {
    super();

    this.fractionsAsFloat = options.fractionsAsFloat ?? defaultConfig.image.fractionsAsFloat;
    this.tagLayout = options.tagLayout ?? defaultConfig.image.tagLayout;
    this.tagSeparator = options.tagSeparator ?? defaultConfig.image.tagSeparator;
    this.reader = options.reader ?? new SharpExifrTagReader();

    this.registerStep(this.addImageMetadata.bind(this), 'image tags');
  }

  protected detectCapability(): Promise<Capability> {
    return this.reader.detect();
  }

  private async addImageMetadata(filePath: string): Promise<MetadataRecord> {
    const tags = await this.reader.read(filePath, { fractionsAsFloat: this.fractionsAsFloat });
    const tree = treeFromNested(tags, this.tagSeparator);

    return {
      image_metadata: this.tagLayout === 'flat' ? tree.toFlatMapping() : tree.toNested(),
    };
  }
}
