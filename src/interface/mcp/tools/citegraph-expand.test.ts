/**
 * Tests for citegraph_expand MCP tool
 */

import { describe, it, expect, vi } from 'vitest';
import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { createExpandHandler } from './citegraph-expand.js';
import { InvalidInputError } from '../../../shared/errors.js';
import type { ExpandRequest } from '../../../core/engine.js';
import { createMockEngine, makeSampleExpandOutput, readJson } from './__test-helpers.js';

describe('citegraph_expand', () => {
  const baseInput = { root: '10.1/root', resume: false, include_nodes: false, write_file: false };

  it('forwards the request, with the cancellation signal', async () => {
    const expand = vi.fn(async (_request: ExpandRequest) => makeSampleExpandOutput());
    const handler = createExpandHandler(createMockEngine({ expand }));
    const controller = new AbortController();

    await handler({ ...baseInput, depth: 1, concurrency: 2 }, { signal: controller.signal });

    expect(expand).toHaveBeenCalledWith({
      root: '10.1/root',
      maxDepth: 1,
      concurrency: 2,
      resume: false,
      signal: controller.signal,
    });
  });

  it('returns a snake_case summary without nodes by default', async () => {
    const handler = createExpandHandler(
      createMockEngine({ expand: async () => makeSampleExpandOutput() }),
    );

    const body = readJson(await handler(baseInput));

    expect(body).toEqual({
      root: '10.1/root',
      max_depth: 1,
      run_id: 4,
      provider: 'live',
      seed: null,
      aborted: false,
      stats: { visited: 3, fetched: 3, reused: 0, failed_nodes: 1, boundary: 2, duration_ms: 12 },
      failures: [
        { id: '10.1/b', direction: 'forward', reason: 'not_found', message: '10.1/b not found in crossref' },
      ],
      output: null,
    });
  });

  it('includes node records in discovery order when asked', async () => {
    const handler = createExpandHandler(
      createMockEngine({ expand: async () => makeSampleExpandOutput() }),
    );

    const body = readJson(await handler({ ...baseInput, include_nodes: true }));

    expect(body).toMatchObject({
      nodes: [
        {
          id: '10.1/root',
          depth: 0,
          metadata: { title: 'Title of 10.1/root', raw_id: '10.1/ROOT', venue: 'Journal of Tests' },
          outgoing_refs: ['10.1/a'],
          incoming_citers: ['10.1/b'],
        },
        { id: '10.1/a', depth: 1 },
        { id: '10.1/b', depth: 1, metadata: null },
      ],
    });
  });

  it('writes the graph file when write_file is set', async () => {
    const writeGraph = vi.fn(async () => '/work/graphs/10.1_root.json');
    const handler = createExpandHandler(
      createMockEngine({ expand: async () => makeSampleExpandOutput(), writeGraph }),
    );

    const body = readJson(await handler({ ...baseInput, write_file: true }));

    expect(writeGraph).toHaveBeenCalledTimes(1);
    expect(body).toMatchObject({ output: '/work/graphs/10.1_root.json' });
  });

  it('maps invalid input to InvalidParams', async () => {
    const handler = createExpandHandler(
      createMockEngine({
        expand: async () => {
          throw new InvalidInputError('Root identifier must not be empty');
        },
      }),
    );

    const error = await handler(baseInput).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(McpError);
    expect(error).toMatchObject({ code: ErrorCode.InvalidParams });
  });
});
