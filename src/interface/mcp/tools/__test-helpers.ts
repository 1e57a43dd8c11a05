/**
 * Shared test helpers for MCP tool tests
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ExpandOutput } from '../../../core/engine.js';
import type { NodeRecord, RunSummary } from '../../../shared/types.js';
import type { ToolEngine } from './types.js';

function notMocked(name: string): () => never {
  return () => {
    throw new Error(`${name} was not mocked`);
  };
}

/**
 * ToolEngine whose methods throw unless overridden
 */
export function createMockEngine(overrides: Partial<ToolEngine> = {}): ToolEngine {
  return {
    expand: notMocked('expand'),
    writeGraph: notMocked('writeGraph'),
    getNode: notMocked('getNode'),
    listRuns: notMocked('listRuns'),
    ...overrides,
  };
}

/**
 * Parse the JSON body of a single-text tool result
 */
export function readJson(result: CallToolResult): unknown {
  const first = result.content[0];
  if (!first || first.type !== 'text') {
    throw new Error('Expected a text content item');
  }
  return JSON.parse(first.text);
}

// --- Sample data ---

export function makeRecord(id: string, depth: number, refs: string[] = [], citers: string[] = []): NodeRecord {
  return {
    id,
    depth,
    metadata: {
      title: `Title of ${id}`,
      authors: ['Ada Example'],
      year: 2020,
      venue: 'Journal of Tests',
      rawId: id.toUpperCase(),
    },
    outgoingRefs: refs,
    incomingCiters: citers,
  };
}

export function makeSampleExpandOutput(): ExpandOutput {
  const root = makeRecord('10.1/root', 0, ['10.1/a'], ['10.1/b']);
  return {
    graph: {
      root: '10.1/root',
      maxDepth: 1,
      nodes: new Map([
        ['10.1/root', root],
        ['10.1/a', makeRecord('10.1/a', 1)],
        ['10.1/b', { ...makeRecord('10.1/b', 1), metadata: null }],
      ]),
    },
    failures: [
      { id: '10.1/b', direction: 'forward', reason: 'not_found', message: '10.1/b not found in crossref' },
    ],
    stats: { visited: 3, fetched: 3, reused: 0, failedNodes: 1, boundary: 2, durationMs: 12 },
    aborted: false,
    runId: 4,
    provider: 'live',
    seedSource: null,
  };
}

export function makeSampleRun(id: number): RunSummary {
  return {
    id,
    root: '10.1/root',
    maxDepth: 2,
    provider: 'shards',
    status: 'completed',
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:05.000Z',
    nodeCount: 12,
    failureCount: 1,
  };
}
