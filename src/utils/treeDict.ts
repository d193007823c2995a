import { isDeepStrictEqual } from 'util';
import { InvalidKeyPathError, StructuralConflictError } from '../errors/index.js';
import { MetadataRecord, MetadataValue, isMetadataObject } from '../types/metadata.js';

/**
 * Tree Dictionary
 *
 * Builds a tree from path/value pairs (EXIF groups, XMP namespaces, ...) and
 * renders it either as nested objects or as one flat mapping keyed by the
 * joined path. Sibling insertion order is preserved in both renderings, so
 * serialized output is deterministic.
 *
 * A path never silently changes shape: a leaf cannot become a branch, and a
 * branch cannot be replaced by a leaf.
 */

export const DEFAULT_TREE_SEPARATOR = '.';

type TreeNode =
  | { kind: 'branch'; children: Map<string, TreeNode> }
  | { kind: 'leaf'; value: MetadataValue };

export type KeyPath = string | readonly string[];

// Assigning through defineProperty keeps keys such as "__proto__" as plain data
export function setOwn(target: MetadataRecord, key: string, value: MetadataValue): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export class TreeDict {
  private readonly root = new Map<string, TreeNode>();

  constructor(public readonly separator: string = DEFAULT_TREE_SEPARATOR) {}

  /**
   * Insert `value` at `keyPath`, creating intermediate branches as needed.
   * A string path is split on the tree's separator.
   *
   * Re-inserting a deep-equal value at the same path is a no-op.
   */
  addNode(keyPath: KeyPath, value: MetadataValue): void {
    const segments = this.toSegments(keyPath);
    const parents = segments.slice(0, -1);
    const lastKey = segments[segments.length - 1];

    let current = this.root;
    parents.forEach((segment, depth) => {
      const existing = current.get(segment);

      if (existing === undefined) {
        const branch: TreeNode = { kind: 'branch', children: new Map() };
        current.set(segment, branch);
        current = branch.children;
        return;
      }

      if (existing.kind === 'leaf') {
        throw new StructuralConflictError(
          segments,
          `Cannot insert '${segments.join(this.separator)}': ` +
            `'${segments.slice(0, depth + 1).join(this.separator)}' already holds a value`
        );
      }

      current = existing.children;
    });

    const existing = current.get(lastKey);
    if (existing === undefined) {
      current.set(lastKey, { kind: 'leaf', value });
      return;
    }

    if (existing.kind === 'branch') {
      throw new StructuralConflictError(
        segments,
        `Cannot insert '${segments.join(this.separator)}': the path already holds a sub-tree`
      );
    }

    if (!isDeepStrictEqual(existing.value, value)) {
      throw new StructuralConflictError(
        segments,
        `Cannot insert '${segments.join(this.separator)}': the path already holds a different value`
      );
    }
  }

  /**
   * Look up the leaf stored at `keyPath`
   */
  get(keyPath: KeyPath): MetadataValue | undefined {
    const segments = this.toSegments(keyPath);
    let nodes: Map<string, TreeNode> | undefined = this.root;
    let node: TreeNode | undefined;

    for (const segment of segments) {
      if (nodes === undefined) return undefined;
      node = nodes.get(segment);
      if (node === undefined) return undefined;
      nodes = node.kind === 'branch' ? node.children : undefined;
    }

    return node?.kind === 'leaf' ? node.value : undefined;
  }

  /**
   * Number of leaves in the tree
   */
  get size(): number {
    return [...this.leaves()].length;
  }

  /**
   * Depth-first walk over every leaf, in insertion order
   */
  *leaves(): Generator<[string[], MetadataValue]> {
    yield* walk(this.root, []);
  }

  /**
   * Flat mapping keyed by the joined path. Fails when two distinct paths
   * join to the same key, which happens when a segment contains the separator.
   */
  toFlatMapping(separator: string = this.separator): MetadataRecord {
    const result: MetadataRecord = {};
    const sources = new Map<string, string[]>();

    for (const [segments, value] of this.leaves()) {
      const flatKey = segments.join(separator);
      const previous = sources.get(flatKey);
      if (previous !== undefined) {
        throw new StructuralConflictError(
          segments,
          `Paths [${previous.join(', ')}] and [${segments.join(', ')}] ` +
            `both flatten to '${flatKey}'`
        );
      }
      sources.set(flatKey, segments);
      setOwn(result, flatKey, value);
    }

    return result;
  }

  /**
   * Plain nested objects, one level per path segment
   */
  toNested(): MetadataRecord {
    return renderNested(this.root);
  }

  private toSegments(keyPath: KeyPath): string[] {
    const segments = typeof keyPath === 'string' ? keyPath.split(this.separator) : [...keyPath];

    if (segments.length === 0 || segments.some(segment => segment.length === 0)) {
      throw new InvalidKeyPathError(segments);
    }

    return segments;
  }
}

function* walk(nodes: Map<string, TreeNode>, prefix: string[]): Generator<[string[], MetadataValue]> {
  for (const [key, node] of nodes) {
    const path = [...prefix, key];
    if (node.kind === 'leaf') {
      yield [path, node.value];
    } else {
      yield* walk(node.children, path);
    }
  }
}

function renderNested(nodes: Map<string, TreeNode>): MetadataRecord {
  const result: MetadataRecord = {};
  for (const [key, node] of nodes) {
    setOwn(result, key, node.kind === 'leaf' ? node.value : renderNested(node.children));
  }
  return result;
}

/**
 * Insert `value` at `keyPath` inside `tree`
 */
export function addNode(tree: TreeDict, keyPath: KeyPath, value: MetadataValue): void {
  tree.addNode(keyPath, value);
}

/**
 * Render `tree` as a flat mapping keyed by the joined path
 */
export function toFlatMapping(tree: TreeDict, separator?: string): MetadataRecord {
  return tree.toFlatMapping(separator);
}

/**
 * Render `tree` as plain nested objects
 */
export function toNested(tree: TreeDict): MetadataRecord {
  return tree.toNested();
}

/**
 * Build a tree from plain nested objects. Objects become branches; every
 * other value (arrays included) becomes a leaf. Empty objects are dropped,
 * since a branch only exists through its leaves.
 */
export function treeFromNested(
  nested: MetadataRecord,
  separator: string = DEFAULT_TREE_SEPARATOR
): TreeDict {
  const tree = new TreeDict(separator);

  const visit = (node: MetadataRecord, prefix: string[]): void => {
    for (const [key, value] of Object.entries(node)) {
      if (isMetadataObject(value)) {
        visit(value, [...prefix, key]);
      } else {
        tree.addNode([...prefix, key], value);
      }
    }
  };

  visit(nested, []);
  return tree;
}

/**
 * Collapse nested objects into one mapping keyed by separator-joined paths
 *
 * @example
 * ```typescript
 * flattenTree({ answer: 42, a: { b: { c: 4.2 } } });
 * // { answer: 42, 'a.b.c': 4.2 }
 * ```
 */
export function flattenTree(
  nested: MetadataRecord,
  separator: string = DEFAULT_TREE_SEPARATOR
): MetadataRecord {
  return treeFromNested(nested, separator).toFlatMapping();
}

/**
 * Re-nest a flat mapping by splitting its keys on `separator`
 */
export function unflattenTree(
  flat: MetadataRecord,
  separator: string = DEFAULT_TREE_SEPARATOR
): MetadataRecord {
  const tree = new TreeDict(separator);
  for (const [key, value] of Object.entries(flat)) {
    tree.addNode(key, value);
  }
  return tree.toNested();
}
