/**
 * Metadata record types shared by scanners, the metadata service and the CLI.
 */

/**
 * Any value a scanner may emit. Always JSON-safe.
 */
export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

/**
 * Facet name → facet value. Each scanner owns its own top-level keys
 * (`file_name`, `image_metadata`, ...).
 */
export type MetadataRecord = { [facet: string]: MetadataValue };

export interface FileHash {
  value: string;
  algorithm: string;
}

export interface FileTimestamps {
  modified: string;
  created: string;
}

/**
 * Extraction callback registered on a scanner. Receives the file path and
 * returns a partial record, by convention with a single top-level key.
 */
export type ExtractionStepFn = (filePath: string) => Promise<MetadataRecord>;

export interface ExtractionStep {
  run: ExtractionStepFn;
  description: string;
}

export enum ScannerState {
  NOT_READY = 'not_ready',
  READY = 'ready',
  FAILED = 'failed',
}

/**
 * Result of probing an external library or executable.
 */
export type Capability =
  | {
      status: 'available';
      name: string;
      version: string;
      /** Absolute location of an executable, when the dependency is one */
      location?: string;
    }
  | {
      status: 'unavailable';
      name: string;
      reason: string;
      hint: string;
    };

export interface ScannerSummary {
  name: string;
  mimeTypes: readonly string[];
  state: ScannerState;
  steps: string[];
}

export function isMetadataObject(
  value: MetadataValue | undefined
): value is { [key: string]: MetadataValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
