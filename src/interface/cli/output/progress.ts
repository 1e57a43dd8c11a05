/**
 * Live traversal counter (stderr, single rewritten line)
 */

import type { TraversalProgress } from '../../../shared/types.js';
import type { GlobalOptions } from '../utils/global-options.js';

export function formatProgressLine(progress: TraversalProgress): string {
  return (
    `  Expanding  depth ${progress.depth}  ` +
    `visited ${progress.visited}  failed ${progress.failed}  pending ${progress.pending}`
  );
}

export function createProgressRenderer(globals: GlobalOptions): {
  update(progress: TraversalProgress): void;
  done(): void;
} {
  const enabled = !globals.quiet && !globals.json && process.stderr.isTTY === true;
  let drawn = false;

  return {
    update(progress: TraversalProgress): void {
      if (!enabled) return;
      process.stderr.write(`\r\x1b[2K${formatProgressLine(progress)}`);
      drawn = true;
    },
    done(): void {
      if (drawn) process.stderr.write('\n');
      drawn = false;
    },
  };
}
