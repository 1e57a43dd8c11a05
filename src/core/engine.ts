/**
 * CitegraphEngine - Core Layer facade
 *
 * The interface layer (CLI / MCP) reaches providers, traversal, graph files
 * and the checkpoint store through this facade only. Without
 * `citegraph init` it runs on the defaults and keeps no checkpoints.
 */

import * as path from 'node:path';

import type { CitegraphConfig, ProviderKind } from '../config/types.js';
import {
  configExists,
  loadConfig,
  mergeWithDefaults,
  resolveConfigPath,
  resolveDbPath,
  saveConfig,
  type PartialConfig,
} from '../config/config.js';
import type {
  CitationGraph,
  FetchFailure,
  GraphLayout,
  Identifier,
  NodeRecord,
  RunSummary,
  ShardFile,
  TraversalProgress,
  TraversalResult,
  VenueCount,
} from '../shared/types.js';
import {
  CheckpointUnavailableError,
  InvalidInputError,
  NodeNotFoundError,
  toError,
} from '../shared/errors.js';
import { configureLogger, createLogger, closeLogger, type Logger } from '../shared/logger.js';
import { resolveGraphPath } from '../shared/path-utils.js';
import { getVersion } from '../shared/version.js';
import { DatabaseManager } from '../data/database-manager.js';
import type { StoredRunGraph } from '../data/services/checkpoint-service.js';
import type { CitationProvider } from '../providers/provider.js';
import { createProvider } from '../providers/create-provider.js';
import { ShardCatalog } from '../providers/shard-catalog.js';
import { TraversalEngine, validateExpandInput } from './traversal/traversal-engine.js';
import { readGraphFile, writeGraphFile, type LoadedGraph } from './graph/graph-codec.js';
import { venueStats } from './graph/citation-graph.js';

export interface InitOptions {
  providerKind?: ProviderKind;
  shardsDir?: string;
  mailto?: string | null;
  maxDepth?: number;
}

export interface InitResult {
  configPath: string;
  dbPath: string;
  /** false when a config was already present and kept */
  created: boolean;
}

export interface ExpandRequest {
  root: Identifier;
  maxDepth?: number;
  concurrency?: number;
  provider?: ProviderKind;
  /** Flat graph file whose settled records are reused instead of fetched */
  seedFile?: string;
  /** Seed from the latest checkpointed run of the same root */
  resume?: boolean;
  /** Record the run in the checkpoint store (default: when initialized) */
  checkpoint?: boolean;
  signal?: AbortSignal;
  onProgress?: (progress: TraversalProgress) => void;
}

export interface ExpandOutput extends TraversalResult {
  runId: number | null;
  provider: string;
  /** Where the seed came from: a file path or "run #N" */
  seedSource: string | null;
}

export interface WriteGraphOptions {
  layout?: GraphLayout;
  out?: string;
}

export interface EngineOptions {
  /** Replaces the configured provider */
  provider?: CitationProvider;
}

export class CitegraphEngine {
  private config: CitegraphConfig = mergeWithDefaults({});
  private db: DatabaseManager | null = null;
  private readonly providerOverride: CitationProvider | null;
  private readonly logger: Logger;

  constructor(
    private readonly cwd: string,
    options: EngineOptions = {},
  ) {
    this.providerOverride = options.provider ?? null;
    this.logger = createLogger('CitegraphEngine');
  }

  // --- Initialization ---

  /**
   * Create .citegraph/config.json (unless present) and the checkpoint store.
   */
  initialize(options: InitOptions = {}): InitResult {
    const configPath = resolveConfigPath(this.cwd);
    const dbPath = resolveDbPath(this.cwd);
    const created = !configExists(this.cwd);

    if (created) {
      const partial: PartialConfig = {
        provider: { kind: options.providerKind },
        shards: { dir: options.shardsDir },
        live: { mailto: options.mailto },
        traversal: { max_depth: options.maxDepth },
      };
      this.config = mergeWithDefaults(partial);
      saveConfig(this.cwd, this.config);
      this.logger.info(`Created ${configPath}`);
    } else {
      this.config = loadConfig(this.cwd);
    }

    configureLogger({ level: this.config.log.level, file: this.resolveLogFile() });
    this.openDatabase(dbPath);
    return { configPath, dbPath, created };
  }

  /**
   * Load an initialized project (for use by createCitegraphEngine).
   */
  loadExisting(): void {
    this.config = loadConfig(this.cwd);
    configureLogger({ level: this.config.log.level, file: this.resolveLogFile() });
    this.openDatabase(resolveDbPath(this.cwd));
  }

  get isInitialized(): boolean {
    return this.db !== null;
  }

  getConfig(): CitegraphConfig {
    return this.config;
  }

  updateConfig(patch: (config: CitegraphConfig) => void): void {
    if (!this.db) throw new CheckpointUnavailableError();
    patch(this.config);
    saveConfig(this.cwd, this.config);
  }

  // --- Expansion ---

  async expand(request: ExpandRequest): Promise<ExpandOutput> {
    const maxDepth = request.maxDepth ?? this.config.traversal.max_depth;
    const concurrency = request.concurrency ?? this.config.traversal.concurrency;

    if (request.seedFile && request.resume) {
      throw new InvalidInputError('Use either a seed file or --resume, not both');
    }

    const { seed, seedSource } = await this.loadSeed(request);
    validateExpandInput(request.root, maxDepth, concurrency, seed);

    const provider = this.resolveProvider(request.provider);
    const checkpoints = (request.checkpoint ?? true) && this.db ? this.db.checkpoints : null;
    const runId = checkpoints ? checkpoints.startRun(request.root, maxDepth, provider.name) : null;

    const traversal = new TraversalEngine(provider, createLogger('Traversal'));
    let result: TraversalResult;
    try {
      result = await traversal.expand(request.root, {
        maxDepth,
        concurrency,
        seed,
        signal: request.signal,
        onProgress: request.onProgress,
        onRecord:
          checkpoints && runId !== null
            ? (record: NodeRecord, failures: FetchFailure[]) => {
                checkpoints.recordNode(runId, record, failures);
              }
            : undefined,
      });
    } catch (err) {
      if (checkpoints && runId !== null) {
        checkpoints.finishRun(runId, 'aborted');
      }
      throw toError(err);
    }

    if (checkpoints && runId !== null) {
      checkpoints.finishRun(
        runId,
        result.aborted ? 'aborted' : 'completed',
        [...result.graph.nodes.keys()],
      );
    }

    return { ...result, runId, provider: provider.name, seedSource };
  }

  // --- Checkpoints ---

  listRuns(limit?: number): RunSummary[] {
    return this.requireDb().checkpoints.listRuns(limit);
  }

  getRunGraph(runId: number): StoredRunGraph {
    return this.requireDb().checkpoints.loadRun(runId);
  }

  /**
   * A node as stored by the most recent run that reached it.
   */
  getNode(id: Identifier): { runId: number; record: NodeRecord } {
    const found = this.requireDb().checkpoints.findNode(id);
    if (!found) throw new NodeNotFoundError(id);
    return found;
  }

  // --- Graph files ---

  readGraph(file: string): Promise<LoadedGraph> {
    return readGraphFile(path.resolve(this.cwd, file));
  }

  /** Returns the absolute path written. */
  async writeGraph(graph: CitationGraph, options: WriteGraphOptions = {}): Promise<string> {
    const layout = options.layout ?? this.config.output.layout;
    const filepath = resolveGraphPath(this.cwd, this.config.output.dir, graph.root, layout, options.out);
    await writeGraphFile(filepath, graph, layout);
    this.logger.info(`Wrote ${layout} graph of ${graph.nodes.size} node(s) to ${filepath}`);
    return filepath;
  }

  venueStats(graph: CitationGraph): VenueCount[] {
    return venueStats(graph);
  }

  // --- Shards ---

  listShards(): Promise<ShardFile[]> {
    return this.shardCatalog().list();
  }

  get shardsDirectory(): string {
    return path.resolve(this.cwd, this.config.shards.dir);
  }

  /**
   * Longest common DOI prefix per shard venue; optionally stored in config.
   */
  async deriveDoiPrefixes(save: boolean): Promise<Record<string, string>> {
    const prefixes = await this.shardCatalog().deriveDoiPrefixes();
    if (save) {
      this.updateConfig((config) => {
        config.shards.doi_prefixes = { ...prefixes };
      });
    }
    return prefixes;
  }

  // --- Lifecycle ---

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
    closeLogger();
  }

  // --- Internal helpers ---

  private openDatabase(dbPath: string): void {
    this.db?.close();
    const db = new DatabaseManager({ dbPath });
    db.initialize();
    this.db = db;
  }

  private requireDb(): DatabaseManager {
    if (!this.db) throw new CheckpointUnavailableError();
    return this.db;
  }

  private resolveLogFile(): string | null {
    return this.config.log.file ? path.resolve(this.cwd, this.config.log.file) : null;
  }

  private resolveProvider(kind?: ProviderKind): CitationProvider {
    if (this.providerOverride) return this.providerOverride;
    return createProvider(this.config, this.cwd, getVersion(), kind);
  }

  private shardCatalog(): ShardCatalog {
    return new ShardCatalog(this.shardsDirectory);
  }

  private async loadSeed(
    request: ExpandRequest,
  ): Promise<{ seed: CitationGraph | null; seedSource: string | null }> {
    if (request.seedFile) {
      const seedPath = path.resolve(this.cwd, request.seedFile);
      const { graph, layout } = await readGraphFile(seedPath);
      if (layout !== 'flat') {
        throw new InvalidInputError(
          `Seed file must use the flat layout: ${seedPath} is a ${layout} export`,
        );
      }
      this.logger.info(`Seeding from ${seedPath} (${graph.nodes.size} node(s))`);
      return { seed: graph, seedSource: seedPath };
    }

    if (request.resume) {
      const checkpoints = this.requireDb().checkpoints;
      const latest = checkpoints.latestRunFor(request.root);
      if (!latest) {
        this.logger.info(`No earlier run of ${request.root}; starting fresh`);
        return { seed: null, seedSource: null };
      }
      const { graph } = checkpoints.loadRun(latest.id);
      this.logger.info(`Resuming from run #${latest.id} (${graph.nodes.size} node(s))`);
      return { seed: graph, seedSource: `run #${latest.id}` };
    }

    return { seed: null, seedSource: null };
  }
}

export async function createCitegraphEngine(
  cwd: string,
  options: EngineOptions = {},
): Promise<CitegraphEngine> {
  const engine = new CitegraphEngine(cwd, options);
  if (configExists(cwd)) {
    engine.loadExisting();
  }
  return engine;
}
