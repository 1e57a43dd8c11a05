/**
 * citegraph edges - Citing/cited pairs of a graph file
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { toEdgeList } from '../../../core/graph/citation-graph.js';

export function edgesCommand(): Command {
  return new Command('edges')
    .description('Print the distinct citation edges of a graph file (tab separated)')
    .argument('<file>', 'Graph file (flat or tree)')
    .action(async (file: string, _options: Record<string, never>, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const { graph } = await engine.readGraph(file);
        engine.close();
        const edges = toEdgeList(graph);

        if (globals.json) {
          printJson({ root: graph.root, edges });
        } else {
          for (const edge of edges) {
            process.stdout.write(`${edge.citing}\t${edge.cited}\n`);
          }
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
