/**
 * File naming helpers for persisted graphs
 */

import * as path from 'node:path';
import type { GraphLayout, Identifier } from './types.js';

const GRAPH_FILE_PREFIX = 'citation_graph_';

/**
 * Make an identifier safe to embed in a filename.
 * "/" and characters rejected by common filesystems become "_".
 */
export function identifierToFileStem(id: Identifier): string {
  return id.trim().replace(/[/\\:*?"<>|\s]+/g, '_');
}

/**
 * citation_graph_<root>.json, or .tree.json for the nested layout.
 */
export function graphFileName(root: Identifier, layout: GraphLayout): string {
  const ext = layout === 'tree' ? '.tree.json' : '.json';
  return `${GRAPH_FILE_PREFIX}${identifierToFileStem(root)}${ext}`;
}

/**
 * An explicit path wins and is taken relative to cwd; otherwise the
 * conventional name inside the output directory.
 */
export function resolveGraphPath(
  cwd: string,
  outputDir: string,
  root: Identifier,
  layout: GraphLayout,
  explicit?: string,
): string {
  if (explicit) return path.resolve(cwd, explicit);
  return path.resolve(cwd, outputDir, graphFileName(root, layout));
}
