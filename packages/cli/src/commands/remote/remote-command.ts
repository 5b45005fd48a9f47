import * as path from 'path';
import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { Errors } from '@rootsign/core';
import type { Config, GitHub } from '@rootsign/core';

export interface RemoteCommandOptions extends BaseCommandOptions {
  visibility?: string;
  branch?: string;
  /** Repository directory (default: cwd) */
  dir?: string;
}

function parseVisibility(value: string): Config.RepositoryVisibility {
  if (value === 'public' || value === 'private') {
    return value;
  }
  throw new Errors.UsageError(`Invalid visibility "${value}": expected public or private`);
}

/**
 * RemoteCommand - creates the GitHub repository, pushes the inception commit
 * and protects the branch
 */
export class RemoteCommand extends BaseCommand<RemoteCommandOptions> {
  register(program: Command): void {
    program
      .command('remote <repo>')
      .description('Create a GitHub repository for the local inception commit and protect its branch')
      .option('--visibility <visibility>', 'public or private (default: config github.visibility)')
      .option('-b, --branch <name>', 'Remote branch to push to (default: config initialBranch)')
      .option('-C, --dir <path>', 'Local repository directory', '.')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on errors')
      .option('-q, --quiet', 'Minimal output for scripting')
      .action(async (repo: string, options: RemoteCommandOptions) => {
        await this.execute(repo, options);
      });
  }

  async execute(repo: string, options: RemoteCommandOptions): Promise<void> {
    try {
      const config = await this.container.getConfig();
      const visibility = options.visibility ? parseVisibility(options.visibility) : config.github.visibility;
      const setup = await this.container.getGitHubRemoteSetup(path.resolve(options.dir ?? '.'));

      const result = await setup.setup({
        repoName: repo,
        visibility,
        branch: options.branch ?? config.initialBranch,
        requiredApprovingReviewCount: config.github.requiredApprovingReviewCount,
      });

      this.handleSuccess(result, options, this.formatResult(result));
    } catch (error) {
      this.handleError(error, options);
    }
  }

  private formatResult(result: GitHub.GitHubRemoteSetupResult): string[] {
    const lines = [
      result.created
        ? `✅ Created GitHub repository ${result.owner}/${result.repo}`
        : `✅ Using existing GitHub repository ${result.owner}/${result.repo}`,
      result.pushed
        ? `✅ Pushed inception commit ${result.inceptionCommitId}`
        : `✅ Remote already has inception commit ${result.inceptionCommitId}`,
      `   Remote: ${result.url}`,
    ];
    if (result.protection) {
      lines.push(
        `   Required approving reviews: ${result.protection.requiredApprovingReviewCount ?? 'none'}`,
        `   Required signatures: ${result.protection.requiredSignatures ? 'enabled' : 'disabled'}`
      );
    }
    for (const warning of result.warnings) {
      lines.push(`⚠️  ${warning}`);
    }
    return lines;
  }
}
