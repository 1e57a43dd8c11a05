/**
 * citegraph version - Version of the CLI, its runtime and checkpoint schema
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { printJson } from '../output/json-output.js';
import { formatDim } from '../output/formatter.js';
import { getVersion } from '../../../shared/version.js';
import { LATEST_SCHEMA_VERSION } from '../../../data/migrations/index.js';

export function versionCommand(): Command {
  return new Command('version')
    .description('Display version information')
    .action((_options: Record<string, never>, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      const version = getVersion();
      const node = process.versions.node;

      if (globals.json) {
        printJson({ version, node, schema_version: LATEST_SCHEMA_VERSION });
        return;
      }

      process.stdout.write(`citegraph v${version}\n`);
      if (!globals.quiet) {
        process.stdout.write(
          formatDim(`node ${node}, checkpoint schema ${LATEST_SCHEMA_VERSION}`) + '\n',
        );
      }
    });
}
