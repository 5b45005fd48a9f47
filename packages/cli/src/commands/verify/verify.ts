import { Command } from 'commander';
import { VerifyCommand } from './verify-command';

/**
 * Registers the verify command
 */
export function registerVerifyCommand(program: Command): void {
  new VerifyCommand().register(program);
}
