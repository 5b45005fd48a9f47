import { Command } from 'commander';
import { RemoteCommand } from './remote-command';

/**
 * Registers the remote command
 */
export function registerRemoteCommand(program: Command): void {
  new RemoteCommand().register(program);
}
