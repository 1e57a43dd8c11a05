/**
 * CLI entry point - creates the commander.js program with all commands
 */

import { Command } from 'commander';
import { addGlobalOptions } from './utils/global-options.js';
import { initCommand } from './commands/init.js';
import { expandCommand } from './commands/expand.js';
import { convertCommand } from './commands/convert.js';
import { runsCommand } from './commands/runs.js';
import { venuesCommand } from './commands/venues.js';
import { edgesCommand } from './commands/edges.js';
import { shardsCommand } from './commands/shards.js';
import { serveCommand } from './commands/serve.js';
import { versionCommand } from './commands/version.js';
import { getVersion } from '../../shared/version.js';

export function createCli(): Command {
  const program = new Command('citegraph')
    .description('Bidirectional, depth-bounded citation graph expansion')
    .version(getVersion(), '-V, --version');

  addGlobalOptions(program);

  program.addCommand(initCommand());
  program.addCommand(expandCommand());
  program.addCommand(convertCommand());
  program.addCommand(runsCommand());
  program.addCommand(venuesCommand());
  program.addCommand(edgesCommand());
  program.addCommand(shardsCommand());
  program.addCommand(serveCommand());
  program.addCommand(versionCommand());

  return program;
}
