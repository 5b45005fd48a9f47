import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import type { Repository } from '@rootsign/core';

/**
 * Init Command Options interface
 */
export interface InitCommandOptions extends BaseCommandOptions {
  branch?: string;
  signingKey?: string;
  allowedSigners?: string;
  /** --no-configure-signing sets this to false */
  configureSigning?: boolean;
  skipValidation?: boolean;
}

/**
 * InitCommand - creates a repository rooted in a signed inception commit
 *
 * Delegates all work to LocalRepositorySetup and focuses on output.
 */
export class InitCommand extends BaseCommand<InitCommandOptions> {
  register(program: Command): void {
    program
      .command('init <repo>')
      .description('Create a repository whose first commit is a signed, empty inception commit')
      .option('-b, --branch <name>', 'Initial branch (default: config initialBranch)')
      .option('-k, --signing-key <path>', 'SSH signing key (default: discovered under ~/.ssh)')
      .option('--allowed-signers <path>', 'allowed_signers file to register the key in')
      .option('--no-configure-signing', 'Leave global git signing settings untouched')
      .option('--skip-validation', 'Continue even if prerequisites are missing')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show detailed progress')
      .option('-q, --quiet', 'Minimal output for scripting')
      .action(async (repo: string, options: InitCommandOptions) => {
        await this.execute(repo, options);
      });
  }

  async execute(repo: string, options: InitCommandOptions): Promise<void> {
    try {
      const config = await this.container.getConfig();
      const setup = await this.container.getLocalRepositorySetup(
        options.allowedSigners ? { allowedSignersFile: options.allowedSigners } : {}
      );
      const signingKeyId = options.signingKey ?? config.signingKey;

      const result = await setup.setup({
        target: repo,
        initialBranch: options.branch ?? config.initialBranch,
        configureSigning: options.configureSigning ?? true,
        skipValidation: options.skipValidation ?? false,
        ...(signingKeyId !== undefined && { signingKeyId }),
      });

      this.handleSuccess(result, options, this.formatResult(result));
    } catch (error) {
      this.handleError(error, options);
    }
  }

  private formatResult(result: Repository.LocalRepositorySetupResult): string[] {
    const lines = [
      `✅ Inception commit ${result.inception.commitId} created in ${result.repoDir}`,
      `   Committer: ${result.inception.committer.name}`,
      `   DID: ${result.did}`,
    ];
    if (result.verification) {
      lines.push(result.verification.passed ? '✅ Inception commit verified' : '❌ Inception commit failed verification');
    }
    for (const warning of result.warnings) {
      lines.push(`⚠️  ${warning}`);
    }
    lines.push('', 'Next steps:');
    result.nextSteps.forEach((step, index) => lines.push(`  ${index + 1}. ${step}`));
    return lines;
  }
}
