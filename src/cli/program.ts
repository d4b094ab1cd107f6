/**
 * Command tree for the typecensus CLI
 */

import { Command } from 'commander';
import { createScanCommand } from './commands/scan.js';

const pkg = {
  name: 'typecensus',
  version: '0.1.0',
  description: 'Discover which runtime types each property takes across a stream of semi-structured records',
};

/**
 * Main CLI program. `--log-level` is global; commands read it through
 * `optsWithGlobals()`.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option('--log-level <level>', 'Logging verbosity: error, warn, info, debug');

  program.addCommand(createScanCommand());

  return program;
}
