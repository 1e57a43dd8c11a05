/**
 * citegraph shards - Inspect the offline shard directory
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatDim, formatSuccess, formatTable } from '../output/formatter.js';

interface ShardsCommandOptions {
  savePrefixes: boolean;
}

export function shardsCommand(): Command {
  return new Command('shards')
    .description('List shard files and the DOI prefix of each venue')
    .option('--save-prefixes', 'Store the derived DOI prefixes in the config', false)
    .action(async (options: ShardsCommandOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const shards = await engine.listShards();
        const prefixes = await engine.deriveDoiPrefixes(options.savePrefixes);
        const dir = engine.shardsDirectory;
        engine.close();

        if (globals.json) {
          printJson({ dir, shards, doi_prefixes: prefixes });
          return;
        }

        if (shards.length === 0) {
          process.stderr.write(formatDim(`No shard files in ${dir}`) + '\n');
          return;
        }

        const rows = shards.map((s) => [s.venue, String(s.year), prefixes[s.venue] ?? '-']);
        process.stdout.write(formatTable([['VENUE', 'YEAR', 'DOI PREFIX'], ...rows]) + '\n');
        if (options.savePrefixes && !globals.quiet) {
          process.stderr.write(
            formatSuccess(`Saved ${Object.keys(prefixes).length} DOI prefix(es) to the config`) + '\n',
          );
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
