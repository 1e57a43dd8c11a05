/**
 * citegraph venues - Venue frequency over a graph file
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine, parsePositiveInt } from '../utils/open-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatDim, formatTable } from '../output/formatter.js';

interface VenuesCommandOptions {
  limit?: number;
}

export function venuesCommand(): Command {
  return new Command('venues')
    .description('Count the leaf works of a graph file per venue')
    .argument('<file>', 'Graph file (flat or tree)')
    .option('-n, --limit <n>', 'Show only the most frequent venues', parsePositiveInt)
    .action(async (file: string, options: VenuesCommandOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const { graph } = await engine.readGraph(file);
        const all = engine.venueStats(graph);
        engine.close();

        const venues = options.limit !== undefined ? all.slice(0, options.limit) : all;

        if (globals.json) {
          printJson({ root: graph.root, venues });
        } else if (venues.length === 0) {
          process.stderr.write(formatDim('No venue metadata in this graph.') + '\n');
        } else {
          const rows = venues.map((v) => [String(v.count), v.venue]);
          process.stdout.write(formatTable([['COUNT', 'VENUE'], ...rows]) + '\n');
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
