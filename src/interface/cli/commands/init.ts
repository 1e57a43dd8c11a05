/**
 * citegraph init - Create the project config and checkpoint store
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine, parseNonNegativeInt } from '../utils/open-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatSuccess, formatBold, formatDim } from '../output/formatter.js';
import { renderMcpConfigSnippet } from '../onboarding.js';
import { parseProviderKind } from './provider-option.js';
import type { ProviderKind } from '../../../config/types.js';

interface InitCommandOptions {
  provider?: ProviderKind;
  shardsDir?: string;
  mailto?: string;
  depth?: number;
}

export function initCommand(): Command {
  return new Command('init')
    .description('Create .citegraph/config.json and the checkpoint store')
    .option('--provider <kind>', 'Citation source: live, shards, shards-then-live', parseProviderKind)
    .option('--shards-dir <path>', 'Directory of journal/year shard files')
    .option('--mailto <address>', 'Contact address sent to Crossref')
    .option('--depth <n>', 'Default traversal depth', parseNonNegativeInt)
    .action(async (options: InitCommandOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const result = engine.initialize({
          providerKind: options.provider,
          shardsDir: options.shardsDir,
          mailto: options.mailto,
          maxDepth: options.depth,
        });
        const config = engine.getConfig();
        engine.close();

        if (globals.json) {
          printJson({
            config_path: result.configPath,
            db_path: result.dbPath,
            created: result.created,
            provider: config.provider.kind,
          });
        } else if (!globals.quiet) {
          process.stderr.write(
            formatSuccess(result.created ? 'Project initialized' : 'Project already initialized') + '\n',
          );
          process.stderr.write(`  ${formatBold('Config:')}     ${result.configPath}\n`);
          process.stderr.write(`  ${formatBold('Checkpoints:')} ${result.dbPath}\n`);
          process.stderr.write(`  ${formatBold('Provider:')}   ${config.provider.kind}\n`);
          if (!result.created) {
            process.stderr.write(formatDim('  Existing config kept; options were ignored.') + '\n');
          }
          renderMcpConfigSnippet(globals.cwd, globals);
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
