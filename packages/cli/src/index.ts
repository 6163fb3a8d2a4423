/**
 * Herald CLI
 *
 * Command-line entry point of the notifications controller.
 * @module @herald/cli
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createControllerCommand, type ControllerRunner } from './commands/controller.js';
import { describeError, error } from './output.js';

/**
 * CLI version from package.json
 */
const VERSION = '0.1.0';

/**
 * CLI program description
 */
const DESCRIPTION = `
Herald notifications controller

Watches a settings ConfigMap and a Secret and restarts its worker
whenever either changes.

Examples:
  $ herald controller
  $ herald controller --namespace team-a --loglevel debug
  $ herald controller --kubeconfig ~/.kube/config --context staging
`;

export interface ProgramOptions {
  /** Replaces the controller start, for tests */
  runController?: ControllerRunner;
}

/**
 * Creates and configures the main CLI program
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('herald')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(DESCRIPTION)
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ color?: boolean }>().color === false) {
        chalk.level = 0;
      }
    });

  program.addCommand(createControllerCommand(options.runController));

  return program;
}

/**
 * Main entry point
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const { message, details } = describeError(err);
    error(message, details);
    process.exit(1);
  }
}
