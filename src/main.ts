#!/usr/bin/env node

/**
 * citegraph CLI entry point
 */

import { createCli } from './interface/cli/index.js';

const program = createCli();
await program.parseAsync(process.argv);
