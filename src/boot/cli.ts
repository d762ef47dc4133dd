/**
 * Command line handling
 */

import { Command } from 'commander';
import type { RunMode } from './types';

/**
 * Build the command line parser
 *
 * No option is declared and the built-in help is off, so every argument
 * reaches `program.args` unchanged and in order.
 */
export function createProgram(): Command {
  return new Command()
    .name('fanctl')
    .description('Drive ceiling fans and the furnace blower from the thermostat heat call')
    .usage('[-d]')
    .helpOption(false)
    .allowUnknownOption()
    .allowExcessArguments();
}

/**
 * Decide the run mode
 *
 * Only the first argument counts: anything starting with -d (such as -d or
 * -debug) selects diagnostics, everything else runs the control loop.
 *
 * @param args - Arguments after the program name, in order
 */
export function resolveRunMode(args: readonly string[]): RunMode {
  if (args.length > 0 && args[0].startsWith('-d')) {
    return 'diagnostics';
  }
  return 'control';
}
