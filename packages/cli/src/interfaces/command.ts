/**
 * Standard Command Interface for the rootsign CLI
 *
 * All commands implement this interface so they can be registered
 * uniformly and tested without a Commander program.
 */

import { Command } from 'commander';

/**
 * Output options every command accepts
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   */
  register(program: Command): void;
}
