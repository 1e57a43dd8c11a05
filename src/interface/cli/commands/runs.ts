/**
 * citegraph runs - List checkpointed runs, or show / export one
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine, parsePositiveInt } from '../utils/open-engine.js';
import { printJson, runToJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatDim, formatSuccess, formatTable } from '../output/formatter.js';
import { parseLayout } from './provider-option.js';
import type { GraphLayout } from '../../../shared/types.js';

interface RunsCommandOptions {
  limit?: number;
  out?: string;
  layout?: GraphLayout;
}

export function runsCommand(): Command {
  return new Command('runs')
    .description('List recorded traversal runs, or show one by id')
    .argument('[id]', 'Run id', parsePositiveInt)
    .option('-n, --limit <n>', 'Number of runs to list', parsePositiveInt)
    .option('-o, --out <file>', 'Export the run graph to a file (with an id)')
    .option('--layout <layout>', 'Layout of the exported file: flat or tree', parseLayout)
    .action(async (id: number | undefined, options: RunsCommandOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);

        if (id === undefined) {
          const runs = engine.listRuns(options.limit);
          engine.close();

          if (globals.json) {
            printJson({ runs: runs.map(runToJson) });
          } else if (runs.length === 0) {
            process.stderr.write(formatDim('No runs recorded yet.') + '\n');
          } else {
            const rows = [
              ['ID', 'ROOT', 'DEPTH', 'NODES', 'FAILED', 'STATUS', 'STARTED'],
              ...runs.map((run) => [
                `#${run.id}`,
                run.root,
                String(run.maxDepth),
                String(run.nodeCount),
                String(run.failureCount),
                run.status,
                run.startedAt,
              ]),
            ];
            process.stdout.write(formatTable(rows) + '\n');
          }
          return;
        }

        const stored = engine.getRunGraph(id);
        const outPath = options.out
          ? await engine.writeGraph(stored.graph, { layout: options.layout, out: options.out })
          : null;
        engine.close();

        if (globals.json) {
          printJson({ ...runToJson(stored.run), failures: stored.failures, output: outPath });
          return;
        }

        const run = stored.run;
        process.stdout.write(`${formatBold(`Run #${run.id}`)}  ${run.root}\n`);
        process.stdout.write(`  Status:   ${run.status}\n`);
        process.stdout.write(`  Provider: ${run.provider}\n`);
        process.stdout.write(`  Depth:    ${run.maxDepth}\n`);
        process.stdout.write(`  Nodes:    ${run.nodeCount}\n`);
        process.stdout.write(`  Failures: ${run.failureCount}\n`);
        process.stdout.write(`  Started:  ${run.startedAt}\n`);
        if (run.finishedAt) {
          process.stdout.write(`  Finished: ${run.finishedAt}\n`);
        }
        for (const failure of stored.failures) {
          process.stdout.write(`    ${failure.id} [${failure.direction}] ${failure.message}\n`);
        }
        if (outPath && !globals.quiet) {
          process.stderr.write(formatSuccess(`Exported run #${run.id}: ${outPath}`) + '\n');
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
