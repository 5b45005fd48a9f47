/**
 * Base Command Class for the rootsign CLI
 *
 * Provides shared output and error handling for all commands.
 */

import { Command } from 'commander';
import { Errors, Config, SigningKey, GitHub } from '@rootsign/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Exit statuses shared with the shell tooling this CLI replaces
 */
export const EXIT_CODES = {
  success: 0,
  general: 1,
  usage: 2,
  repository: 5,
  config: 6,
  tooling: 127,
} as const;

/**
 * Maps an error to its process exit status
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof Errors.UsageError) return EXIT_CODES.usage;
  if (error instanceof Errors.RepositoryError || error instanceof Errors.NotFoundError) return EXIT_CODES.repository;
  if (error instanceof GitHub.GitHubApiError) return EXIT_CODES.repository;
  if (error instanceof Errors.SigningError || error instanceof SigningKey.SigningKeyError) return EXIT_CODES.config;
  if (error instanceof Config.ConfigValidationError) return EXIT_CODES.config;
  if (error instanceof Errors.ToolingError) return EXIT_CODES.tooling;
  return EXIT_CODES.general;
}

function errorCodeOf(error: unknown): string {
  if (error instanceof Errors.BootstrapError || error instanceof GitHub.GitHubApiError || error instanceof SigningKey.SigningKeyError) {
    return error.code;
  }
  if (error instanceof Config.ConfigValidationError) return 'CONFIG';
  return 'GENERAL';
}

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> implements ICommand {
  protected readonly container = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(error: unknown, options: TOptions): void {
    const message = error instanceof Error ? error.message : String(error);
    const exitCode = exitCodeFor(error);

    if (options.json) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        code: errorCodeOf(error),
        exitCode,
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (options.verbose && error instanceof Error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, lines: string[] = []): void {
    if (options.json) {
      console.log(JSON.stringify({ success: true, data }, null, 2));
      return;
    }
    if (options.quiet) {
      return;
    }
    for (const line of lines) {
      console.log(line);
    }
  }
}
