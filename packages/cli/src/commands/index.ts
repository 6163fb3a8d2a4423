/**
 * CLI Commands
 * @module @herald/cli/commands
 */

export {
  createControllerCommand,
  toConfigOverrides,
  type ControllerCommandOptions,
  type ControllerRunner,
} from './controller.js';
