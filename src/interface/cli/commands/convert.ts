/**
 * citegraph convert - Rewrite a graph file in another layout
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatSuccess } from '../output/formatter.js';
import { parseLayout } from './provider-option.js';
import type { GraphLayout } from '../../../shared/types.js';

interface ConvertCommandOptions {
  layout: GraphLayout;
  out?: string;
}

export function convertCommand(): Command {
  return new Command('convert')
    .description('Load a flat or tree graph file and write it in another layout')
    .argument('<input>', 'Graph file to read')
    .option('--layout <layout>', 'Target layout: flat or tree', parseLayout, 'flat')
    .option('-o, --out <file>', 'File to write (default: output dir, derived from the root)')
    .action(async (input: string, options: ConvertCommandOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const loaded = await engine.readGraph(input);
        const outPath = await engine.writeGraph(loaded.graph, {
          layout: options.layout,
          out: options.out,
        });
        engine.close();

        if (globals.json) {
          printJson({
            input,
            input_layout: loaded.layout,
            layout: options.layout,
            nodes: loaded.graph.nodes.size,
            output: outPath,
          });
        } else if (!globals.quiet) {
          process.stderr.write(
            formatSuccess(
              `Converted ${loaded.layout} -> ${options.layout} (${loaded.graph.nodes.size} nodes): ${outPath}`,
            ) + '\n',
          );
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
