/**
 * GraphStore - persisted graph layouts
 *
 * flat: the canonical, lossless layout. Nodes are kept as an array so that
 *       discovery order survives any identifier shape.
 * tree: nested { id: { child: { ... } } } export. Every node appears once,
 *       under the node that discovered it. Which side of the edge a child
 *       came from is not recorded, so loading a tree treats every child as an
 *       outgoing reference of its parent.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type {
  CitationGraph,
  GraphLayout,
  Identifier,
  NodeRecord,
} from '../../shared/types.js';
import { CorruptDataError, InvalidInputError, toError } from '../../shared/errors.js';
import { createGraph, neighborsOf } from './citation-graph.js';

export const FLAT_FORMAT = 'citegraph.flat';
export const FLAT_VERSION = 1;

const MetadataSchema = z.object({
  title: z.string().nullable(),
  authors: z.array(z.string()),
  year: z.number().int().nullable(),
  venue: z.string().nullable(),
  raw_id: z.string(),
});

const FlatNodeSchema = z.object({
  id: z.string().min(1),
  depth: z.number().int().min(0),
  metadata: MetadataSchema.nullable(),
  outgoing_refs: z.array(z.string().min(1)),
  incoming_citers: z.array(z.string().min(1)),
});

const FlatGraphSchema = z.object({
  format: z.literal(FLAT_FORMAT),
  version: z.literal(FLAT_VERSION),
  root: z.string().min(1),
  max_depth: z.number().int().min(0),
  nodes: z.array(FlatNodeSchema),
});

type FlatGraphFile = z.infer<typeof FlatGraphSchema>;
type FlatNode = z.infer<typeof FlatNodeSchema>;

export interface TreeNode {
  [id: string]: TreeNode;
}

export interface LoadedGraph {
  graph: CitationGraph;
  layout: GraphLayout;
}

// --- Save ---

export function saveGraph(graph: CitationGraph, layout: GraphLayout = 'flat'): string {
  const body = layout === 'tree' ? toTree(graph) : toFlat(graph);
  return JSON.stringify(body, null, 2) + '\n';
}

function toFlat(graph: CitationGraph): FlatGraphFile {
  return {
    format: FLAT_FORMAT,
    version: FLAT_VERSION,
    root: graph.root,
    max_depth: graph.maxDepth,
    nodes: [...graph.nodes.values()].map(toFlatNode),
  };
}

function toFlatNode(record: NodeRecord): FlatNode {
  return {
    id: record.id,
    depth: record.depth,
    metadata: record.metadata
      ? {
          title: record.metadata.title,
          authors: [...record.metadata.authors],
          year: record.metadata.year,
          venue: record.metadata.venue,
          raw_id: record.metadata.rawId,
        }
      : null,
    outgoing_refs: [...record.outgoingRefs],
    incoming_citers: [...record.incomingCiters],
  };
}

/**
 * Breadth-first spanning tree rooted at graph.root.
 */
export function toTree(graph: CitationGraph): TreeNode {
  const top = emptyTreeNode();
  if (!graph.nodes.has(graph.root)) return top;

  const rootNode = emptyTreeNode();
  top[graph.root] = rootNode;

  const placed = new Set<Identifier>([graph.root]);
  const queue: Array<{ id: Identifier; node: TreeNode }> = [{ id: graph.root, node: rootNode }];

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) break;
    const record = graph.nodes.get(current.id);
    if (!record) continue;

    for (const neighbor of neighborsOf(record)) {
      if (placed.has(neighbor) || !graph.nodes.has(neighbor)) continue;
      placed.add(neighbor);
      const child = emptyTreeNode();
      current.node[neighbor] = child;
      queue.push({ id: neighbor, node: child });
    }
  }
  return top;
}

function emptyTreeNode(): TreeNode {
  // null prototype: an identifier such as "__proto__" stays an own key
  const node: TreeNode = Object.create(null);
  return node;
}

// --- Load ---

export function loadGraph(text: string, source: string | null = null): LoadedGraph {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new CorruptDataError('not valid JSON', source, toError(err));
  }

  if (!isPlainObject(parsed)) {
    throw new CorruptDataError('expected a JSON object at the top level', source);
  }

  if ('format' in parsed) {
    return { graph: fromFlat(parsed, source), layout: 'flat' };
  }
  return { graph: fromTree(parsed, source), layout: 'tree' };
}

function fromFlat(value: unknown, source: string | null): CitationGraph {
  const result = FlatGraphSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'schema mismatch';
    throw new CorruptDataError(where, source);
  }

  const file = result.data;
  const graph = createGraph(file.root, file.max_depth);

  for (const node of file.nodes) {
    if (graph.nodes.has(node.id)) {
      throw new CorruptDataError(`duplicate node ${node.id}`, source);
    }
    if (node.depth > file.max_depth) {
      throw new CorruptDataError(
        `node ${node.id} has depth ${node.depth} beyond max_depth ${file.max_depth}`,
        source,
      );
    }
    graph.nodes.set(node.id, {
      id: node.id,
      metadata: node.metadata
        ? {
            title: node.metadata.title,
            authors: node.metadata.authors,
            year: node.metadata.year,
            venue: node.metadata.venue,
            rawId: node.metadata.raw_id,
          }
        : null,
      outgoingRefs: node.outgoing_refs,
      incomingCiters: node.incoming_citers,
      depth: node.depth,
    });
  }

  const root = graph.nodes.get(file.root);
  if (!root) {
    throw new CorruptDataError(`root ${file.root} has no node record`, source);
  }
  if (root.depth !== 0) {
    throw new CorruptDataError(`root ${file.root} must have depth 0`, source);
  }
  return graph;
}

function fromTree(value: Record<string, unknown>, source: string | null): CitationGraph {
  const entries = Object.entries(value);
  const first = entries[0];
  if (entries.length !== 1 || !first) {
    throw new CorruptDataError(
      `a nested tree needs exactly one root, found ${entries.length}`,
      source,
    );
  }

  const [root, rootTree] = first;
  const graph = createGraph(root, 0);

  const ensure = (id: Identifier, depth: number): NodeRecord => {
    if (id.length === 0) {
      throw new CorruptDataError('empty identifier in nested tree', source);
    }
    let record = graph.nodes.get(id);
    if (!record) {
      record = { id, metadata: null, outgoingRefs: [], incomingCiters: [], depth };
      graph.nodes.set(id, record);
      graph.maxDepth = Math.max(graph.maxDepth, depth);
    }
    return record;
  };

  const queue: Array<{ id: Identifier; tree: unknown; depth: number }> = [
    { id: root, tree: rootTree, depth: 0 },
  ];

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) break;
    if (!isPlainObject(current.tree)) {
      throw new CorruptDataError(`subtree of ${current.id} is not an object`, source);
    }
    const record = ensure(current.id, current.depth);

    for (const [childId, childTree] of Object.entries(current.tree)) {
      ensure(childId, current.depth + 1);
      if (!record.outgoingRefs.includes(childId)) {
        record.outgoingRefs.push(childId);
      }
      queue.push({ id: childId, tree: childTree, depth: current.depth + 1 });
    }
  }
  return graph;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// --- Files ---

export async function writeGraphFile(
  filepath: string,
  graph: CitationGraph,
  layout: GraphLayout = 'flat',
): Promise<void> {
  await fs.mkdir(path.dirname(filepath), { recursive: true });
  // an interrupted save never leaves a truncated file behind
  const tmpPath = `${filepath}.${process.pid}.tmp`;
  await fs.writeFile(tmpPath, saveGraph(graph, layout), 'utf-8');
  await fs.rename(tmpPath, filepath);
}

export async function readGraphFile(filepath: string): Promise<LoadedGraph> {
  let text: string;
  try {
    text = await fs.readFile(filepath, 'utf-8');
  } catch (err) {
    const error = toError(err);
    if ('code' in error && error.code === 'ENOENT') {
      throw new InvalidInputError(`Graph file not found: ${filepath}`);
    }
    throw error;
  }
  return loadGraph(text, filepath);
}
