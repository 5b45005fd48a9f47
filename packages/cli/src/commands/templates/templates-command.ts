import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { Repository, Templates } from '@rootsign/core';

export interface TemplatesCommandOptions extends BaseCommandOptions {
  force?: boolean;
  clearBackup?: boolean;
  /** false with --no-commit */
  commit?: boolean;
  /** false with --no-import-branch */
  importBranch?: boolean;
  push?: boolean;
  branch?: string;
}

/**
 * TemplatesCommand - installs the bootstrap documents into a repository,
 * commits them and creates the materials import branch
 */
export class TemplatesCommand extends BaseCommand<TemplatesCommandOptions> {
  register(program: Command): void {
    program
      .command('templates <repo>')
      .description('Install bootstrap documents, commit them and create the import branch')
      .option('-f, --force', 'Overwrite files that already exist')
      .option('--clear-backup', 'Replace the backup in untracked/original_bootstrap_files')
      .option('--no-commit', 'Only write the files; no commit and no import branch')
      .option('--no-import-branch', `Do not create ${Templates.IMPORT_BRANCH}`)
      .option('--push', 'Push the committed branches to origin')
      .option('-b, --branch <name>', 'Branch the templates are committed on')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on errors')
      .option('-q, --quiet', 'Minimal output for scripting')
      .action(async (repo: string, options: TemplatesCommandOptions) => {
        await this.execute(repo, options);
      });
  }

  async execute(repo: string, options: TemplatesCommandOptions): Promise<void> {
    try {
      const config = await this.container.getConfig();
      const { repoDir, repoName } = Repository.resolveRepositoryTarget(repo);
      const baseBranch = options.branch ?? config.initialBranch;

      const result = await this.container.getTemplateSetup(repoDir).setup({
        repoDir,
        projectName: repoName,
        overwrite: options.force ?? config.templates.overwrite,
        clearBackup: options.clearBackup ?? false,
        commit: options.commit ?? true,
        importBranch: options.importBranch ?? true,
        push: options.push ?? false,
        baseBranch,
      });

      this.handleSuccess({ repoDir, ...result }, options, this.formatResult(repoDir, baseBranch, result));
    } catch (error) {
      this.handleError(error, options);
    }
  }

  private formatResult(repoDir: string, baseBranch: string, result: Templates.TemplateSetupResult): string[] {
    const { install } = result;
    const lines = [
      `✅ Installed ${install.created.length} file(s) in ${repoDir}`,
      ...install.created.map((file) => `   + ${file}`),
      ...install.skipped.map((file) => `   = ${file} (exists, use --force to replace)`),
    ];
    if (install.backedUp.length > 0) {
      lines.push(`💾 Backed up ${install.backedUp.length} original file(s) to ${Templates.BACKUP_DIR}`);
    }
    if (result.templateCommit) {
      lines.push(`📝 Committed templates on ${baseBranch}: ${result.templateCommit}`);
    }
    if (result.basePushed) {
      lines.push(`⬆️  Pushed ${baseBranch} to origin`);
    }
    const branch = result.importBranch;
    if (branch?.commitId) {
      lines.push(`🌿 Created ${branch.branch}: ${branch.commitId}`);
      if (branch.pushed) {
        lines.push(`⬆️  Pushed ${branch.branch} to origin`);
      }
      lines.push(`   Start importing with: git checkout ${branch.branch}`);
    }
    for (const warning of result.warnings) {
      lines.push(`⚠️  ${warning}`);
    }
    return lines;
  }
}
