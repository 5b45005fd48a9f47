import { Command } from 'commander';
import { TemplatesCommand } from './templates-command';

/**
 * Registers the templates command
 */
export function registerTemplatesCommand(program: Command): void {
  new TemplatesCommand().register(program);
}
