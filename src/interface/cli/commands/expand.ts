/**
 * citegraph expand - Traverse the citation graph around a root work
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine, parseNonNegativeInt, parsePositiveInt } from '../utils/open-engine.js';
import { printJson, statsToJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { createProgressRenderer } from '../output/progress.js';
import { formatBold, formatDim, formatSuccess, formatWarning } from '../output/formatter.js';
import { parseLayout, parseProviderKind } from './provider-option.js';
import { depthHistogram } from '../../../core/graph/citation-graph.js';
import type { ProviderKind } from '../../../config/types.js';
import type { FetchFailure, GraphLayout } from '../../../shared/types.js';

interface ExpandCommandOptions {
  depth?: number;
  concurrency?: number;
  provider?: ProviderKind;
  seed?: string;
  resume: boolean;
  out?: string;
  layout?: GraphLayout;
  checkpoint: boolean;
}

const MAX_LISTED_FAILURES = 10;

export function expandCommand(): Command {
  return new Command('expand')
    .description('Expand the citation graph around a work, in both directions')
    .argument('<id>', 'Root identifier (DOI)')
    .option('-d, --depth <n>', 'Maximum hop distance from the root', parseNonNegativeInt)
    .option('-c, --concurrency <n>', 'Lookups in flight at once', parsePositiveInt)
    .option('--provider <kind>', 'Citation source: live, shards, shards-then-live', parseProviderKind)
    .option('--seed <file>', 'Reuse the records of an earlier graph file')
    .option('--resume', 'Reuse the latest checkpointed run of the same root', false)
    .option('-o, --out <file>', 'Graph file to write')
    .option('--layout <layout>', 'Graph file layout: flat or tree', parseLayout)
    .option('--no-checkpoint', 'Do not record this run in the checkpoint store')
    .action(async (id: string, options: ExpandCommandOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      const controller = new AbortController();

      const onSigint = (): void => {
        if (controller.signal.aborted) {
          process.exit(130);
        }
        process.stderr.write('\n' + formatWarning('Interrupted; finishing with the nodes settled so far') + '\n');
        controller.abort();
      };
      process.on('SIGINT', onSigint);

      const progress = createProgressRenderer(globals);

      try {
        const engine = await openEngine(globals);
        const result = await engine.expand({
          root: id,
          maxDepth: options.depth,
          concurrency: options.concurrency,
          provider: options.provider,
          seedFile: options.seed,
          resume: options.resume,
          checkpoint: options.checkpoint,
          signal: controller.signal,
          onProgress: (p) => progress.update(p),
        });
        progress.done();

        const outPath =
          result.graph.nodes.size > 0
            ? await engine.writeGraph(result.graph, { layout: options.layout, out: options.out })
            : null;
        engine.close();
        const perDepth = depthHistogram(result.graph);

        if (globals.json) {
          printJson({
            root: result.graph.root,
            max_depth: result.graph.maxDepth,
            provider: result.provider,
            run_id: result.runId,
            seed: result.seedSource,
            aborted: result.aborted,
            output: outPath,
            stats: statsToJson(result.stats),
            depth_histogram: perDepth,
            failures: result.failures,
          });
        } else if (!globals.quiet) {
          const headline = result.aborted
            ? formatWarning(`Expansion of ${id} interrupted`)
            : formatSuccess(`Expanded ${id}`);
          process.stderr.write(headline + '\n');
          process.stderr.write(`  ${formatBold('Nodes:')}    ${result.stats.visited}`);
          process.stderr.write(
            formatDim(` (${result.stats.fetched} fetched, ${result.stats.reused} reused, ${result.stats.boundary} at depth ${result.graph.maxDepth})`) + '\n',
          );
          process.stderr.write(`  ${formatBold('Per depth:')} ${perDepth.join(' / ')}\n`);
          process.stderr.write(`  ${formatBold('Provider:')} ${result.provider}\n`);
          if (result.seedSource) {
            process.stderr.write(`  ${formatBold('Seed:')}     ${result.seedSource}\n`);
          }
          if (result.runId !== null) {
            process.stderr.write(`  ${formatBold('Run:')}      #${result.runId}\n`);
          }
          process.stderr.write(`  ${formatBold('Output:')}   ${outPath ?? formatDim('(nothing written)')}\n`);
          renderFailures(result.failures, result.stats.failedNodes);
        }

        if (result.aborted) {
          process.exitCode = 130;
        }
      } catch (error) {
        progress.done();
        handleCommandError(error, globals);
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
}

function renderFailures(failures: FetchFailure[], failedNodes: number): void {
  if (failures.length === 0) return;

  process.stderr.write(formatWarning(`${failedNodes} node(s) had failed lookups`) + '\n');
  for (const failure of failures.slice(0, MAX_LISTED_FAILURES)) {
    process.stderr.write(`  ${failure.id} ${formatDim(`[${failure.direction}, ${failure.reason}]`)} ${failure.message}\n`);
  }
  if (failures.length > MAX_LISTED_FAILURES) {
    process.stderr.write(formatDim(`  ... and ${failures.length - MAX_LISTED_FAILURES} more`) + '\n');
  }
}
