/**
 * citegraph shared types
 * Used across every layer.
 */

// --- Identifier ---

/** DOI-like key of a scholarly work. Compared by exact string equality. */
export type Identifier = string;

// --- Node records ---

export interface PaperMetadata {
  title: string | null;
  authors: string[];
  year: number | null;
  /** Journal or container title */
  venue: string | null;
  /** Identifier as reported by the provider */
  rawId: string;
}

export interface NodeRecord {
  id: Identifier;
  /** null when the forward lookup failed */
  metadata: PaperMetadata | null;
  /** Works this one references */
  outgoingRefs: Identifier[];
  /** Works that cite this one */
  incomingCiters: Identifier[];
  /** Hop distance from the root at first discovery */
  depth: number;
}

export interface CitationGraph {
  root: Identifier;
  maxDepth: number;
  nodes: Map<Identifier, NodeRecord>;
}

export type GraphLayout = 'flat' | 'tree';

// --- Failures ---

export type FetchDirection = 'forward' | 'backward';

export type FailureReason = 'unavailable' | 'not_found';

export interface FetchFailure {
  id: Identifier;
  direction: FetchDirection;
  reason: FailureReason;
  message: string;
}

// --- Traversal ---

export interface TraversalProgress {
  /** Nodes settled so far */
  visited: number;
  /** Nodes with at least one failed lookup */
  failed: number;
  depth: number;
  /** Nodes claimed but not yet settled */
  pending: number;
}

export interface TraversalStats {
  visited: number;
  fetched: number;
  reused: number;
  failedNodes: number;
  boundary: number;
  durationMs: number;
}

export interface TraversalResult {
  graph: CitationGraph;
  failures: FetchFailure[];
  stats: TraversalStats;
  aborted: boolean;
}

// --- Views ---

export interface CitationEdge {
  citing: Identifier;
  cited: Identifier;
}

export interface VenueCount {
  venue: string;
  count: number;
}

// --- Runs ---

export type RunStatus = 'running' | 'completed' | 'aborted';

export interface RunSummary {
  id: number;
  root: Identifier;
  maxDepth: number;
  provider: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string | null;
  nodeCount: number;
  failureCount: number;
}

// --- Shards ---

export interface ShardFile {
  /** Venue key from the filename (usually an ISSN) */
  venue: string;
  year: number;
  filepath: string;
}
