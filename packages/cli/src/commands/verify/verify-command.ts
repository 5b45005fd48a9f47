import * as path from 'path';
import { Command } from 'commander';
import { BaseCommand, EXIT_CODES } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import type { Inception } from '@rootsign/core';

export interface VerifyCommandOptions extends BaseCommandOptions {
  ref?: string;
  allowedSigners?: string;
  /** Report a failed verdict without a failing exit status */
  advisory?: boolean;
}

export function formatCheck(check: Inception.InceptionCheck): string {
  const icon = check.passed ? '✅' : check.severity === 'warning' ? '⚠️ ' : '❌';
  return `${icon} ${check.name}: ${check.message}`;
}

/**
 * VerifyCommand - checks that a repository is rooted in a valid inception commit
 */
export class VerifyCommand extends BaseCommand<VerifyCommandOptions> {
  register(program: Command): void {
    program
      .command('verify [path]')
      .description('Verify the inception commit of a repository')
      .option('-r, --ref <ref>', 'Ref whose history holds the inception commit', 'HEAD')
      .option('--allowed-signers <path>', 'allowed_signers file to verify against')
      .option('--advisory', 'Exit 0 even when verification fails')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on errors')
      .option('-q, --quiet', 'Only set the exit status')
      .action(async (repoPath: string | undefined, options: VerifyCommandOptions) => {
        await this.execute(repoPath ?? '.', options);
      });
  }

  async execute(repoPath: string, options: VerifyCommandOptions): Promise<void> {
    let result: Inception.VerificationResult;
    try {
      const verifier = this.container.getInceptionVerifier(path.resolve(repoPath));
      result = await verifier.verifyInceptionCommit({
        ...(options.ref !== undefined && { ref: options.ref }),
        ...(options.allowedSigners !== undefined && { allowedSignersFile: path.resolve(options.allowedSigners) }),
      });
    } catch (error) {
      this.handleError(error, options);
      return;
    }

    if (result.passed) {
      this.handleSuccess(result, options, [...this.formatResult(result), '✅ Inception commit verified']);
      return;
    }

    const exitCode = options.advisory ? EXIT_CODES.success : EXIT_CODES.general;
    if (options.json) {
      console.log(JSON.stringify({ success: false, data: result, exitCode }, null, 2));
    } else if (!options.quiet) {
      for (const line of this.formatResult(result)) {
        console.log(line);
      }
      console.error('❌ Inception commit verification failed');
    }
    if (exitCode !== EXIT_CODES.success) {
      process.exit(exitCode);
    }
  }

  private formatResult(result: Inception.VerificationResult): string[] {
    return [
      `Inception commit ${result.commitId}`,
      ...result.checks.map(formatCheck),
      `DID: ${result.did}`,
    ];
  }
}
