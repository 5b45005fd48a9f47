/**
 * TemplateSetup - installs the bootstrap documents and records them in history
 *
 * On the base branch the installed files become one signed, signed-off
 * commit. A `docs/import-existing-materials` branch is then cut from it with
 * an inventory, a context file and its tasks added to WORK_STREAM_TASKS.md,
 * and the base branch is checked out again. Pushing is best effort.
 *
 * @module template_installer
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { CommitSigningError, GitError } from '../git';
import { NotFoundError, RepositoryError, SigningError } from '../errors';
import { createLogger } from '../logger';
import { isFileNotFound } from '../utils/path_utils';
import { TemplateInstaller, formatDate, renderTemplate } from './template_installer';
import type {
  ImportBranchResult,
  TemplateSetupDependencies,
  TemplateSetupOptions,
  TemplateSetupResult,
} from './template_installer.types';

const logger = createLogger('[TemplateSetup] ');

/** Resolves from both src/template_installer and dist/template_installer */
export const DEFAULT_IMPORT_TEMPLATE_DIR = path.resolve(__dirname, '../../branch_templates/import-existing-materials');

export const IMPORT_BRANCH = 'docs/import-existing-materials';
export const WORK_STREAM_TASKS = 'WORK_STREAM_TASKS.md';

const REVIEW_STAGE_HEADING = '### Stage 3: Branch Management and PR Process';
const UNASSIGNED_HEADING = '## Unassigned Tasks';
const REMOTE = 'origin';

export const TEMPLATE_COMMIT_MESSAGE = `Add initial project workflow files

- Add WORK_STREAM_TASKS.md for structured task tracking
- Add requirements/ directory with process definitions
- Add context/ directory with branch context files
- Add templates/ directory for project documentation

These files establish a requirements-driven development process with
documented branch management and context preservation.`;

export const IMPORT_COMMIT_MESSAGE = `Set up branch for importing existing materials

- Create branch context file with import process guidance
- Add source materials inventory template
- Update work stream tasks with import process steps`;

/**
 * Adds a branch's task section to a WORK_STREAM_TASKS.md document.
 *
 * The section goes right before "## Unassigned Tasks", or at the end when
 * that heading is missing. The first open "Review" task of the branch
 * management stage is pointed at the branch's PR.
 */
export function addBranchToWorkStream(tasks: string, section: string, branch: string): string {
  const lines = tasks.split('\n');

  const stage = lines.findIndex((line) => line.trim() === REVIEW_STAGE_HEADING);
  if (stage !== -1) {
    for (let i = stage + 1; i < lines.length; i++) {
      const line = lines[i] ?? '';
      if (/^#{2,3} /.test(line)) break;
      const review = /^(\s*)- \[ \] Review\b/.exec(line);
      if (review) {
        lines[i] = `${review[1] ?? ''}- [ ] Review ${branch} PR`;
        break;
      }
    }
  }

  const block = section.replace(/\n+$/, '').split('\n');
  const unassigned = lines.findIndex((line) => line.trim() === UNASSIGNED_HEADING);
  if (unassigned === -1) {
    while (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    return [...lines, '', ...block, ''].join('\n');
  }

  lines.splice(unassigned, 0, ...block, '');
  return lines.join('\n');
}

export class TemplateSetup {
  private readonly deps: TemplateSetupDependencies;
  private readonly installer: TemplateInstaller;
  private readonly importTemplateDir: string;

  constructor(dependencies: TemplateSetupDependencies) {
    this.deps = dependencies;
    this.installer = dependencies.installer ?? new TemplateInstaller();
    this.importTemplateDir = dependencies.importTemplateDir ?? DEFAULT_IMPORT_TEMPLATE_DIR;
  }

  /**
   * @throws NotFoundError if the repository has no commits or no base branch
   * @throws SigningError if a commit cannot be signed
   * @throws RepositoryError if git or the filesystem fails
   */
  async setup(options: TemplateSetupOptions): Promise<TemplateSetupResult> {
    const repoDir = path.resolve(options.repoDir);
    const baseBranch = options.baseBranch ?? 'main';
    const commit = options.commit ?? true;
    const push = options.push ?? false;
    const warnings: string[] = [];

    if (commit) {
      await this.checkoutBaseBranch(baseBranch, warnings);
    }

    const author = await this.readAuthor();
    const install = await this.installer.install({ ...options, repoDir, author });
    if (install.backupReused) {
      warnings.push('Kept the existing backup in untracked/original_bootstrap_files; use --clear-backup to replace it');
    }

    const result: TemplateSetupResult = {
      install,
      templateCommit: null,
      basePushed: false,
      importBranch: null,
      warnings,
    };
    if (!commit) {
      return result;
    }

    if (install.created.length > 0) {
      result.templateCommit = await this.commitFiles(install.created, TEMPLATE_COMMIT_MESSAGE);
      logger.info(`Committed ${install.created.length} file(s) as ${result.templateCommit}`);
    } else {
      logger.info('No new files to commit');
    }

    if (push) {
      result.basePushed = await this.pushBranch(baseBranch, warnings);
    }

    if (options.importBranch ?? true) {
      const values = {
        projectName: options.projectName ?? path.basename(repoDir),
        author,
        date: formatDate(options.date ?? new Date()),
        branch: IMPORT_BRANCH,
        branchSlug: IMPORT_BRANCH.replace(/\//g, '-'),
      };
      result.importBranch = await this.createImportBranch(repoDir, values, baseBranch, push, warnings);
    }

    return result;
  }

  private async createImportBranch(
    repoDir: string,
    values: Record<string, string>,
    baseBranch: string,
    push: boolean,
    warnings: string[]
  ): Promise<ImportBranchResult> {
    const { git } = this.deps;

    if (await this.gitStep('check branches', () => git.branchExists(IMPORT_BRANCH))) {
      warnings.push(`Branch ${IMPORT_BRANCH} already exists; left unchanged`);
      return { branch: IMPORT_BRANCH, commitId: null, files: [], pushed: false };
    }

    await this.gitStep(`create ${IMPORT_BRANCH}`, () => git.createBranch(IMPORT_BRANCH));
    try {
      const branchFiles = new TemplateInstaller({ templateDir: path.join(this.importTemplateDir, 'files') });
      const rendered = await branchFiles.renderInto(repoDir, values);
      const files = [...rendered.created];

      if (await this.recordImportTasks(repoDir, values)) {
        files.push(WORK_STREAM_TASKS);
      } else {
        warnings.push(`${WORK_STREAM_TASKS} not found; import tasks were not recorded`);
      }
      files.sort();

      const commitId = await this.commitFiles(files, IMPORT_COMMIT_MESSAGE);
      logger.info(`Created ${IMPORT_BRANCH} at ${commitId}`);
      const pushed = push ? await this.pushBranch(IMPORT_BRANCH, warnings) : false;

      return { branch: IMPORT_BRANCH, commitId, files, pushed };
    } finally {
      await this.gitStep(`checkout ${baseBranch}`, () => git.checkoutBranch(baseBranch));
    }
  }

  /**
   * @returns false when the repository has no task list
   */
  private async recordImportTasks(repoDir: string, values: Record<string, string>): Promise<boolean> {
    const tasksPath = path.join(repoDir, WORK_STREAM_TASKS);
    try {
      const tasks = await fs.readFile(tasksPath, 'utf-8');
      const section = await fs.readFile(path.join(this.importTemplateDir, 'work_stream_section.md'), 'utf-8');
      await fs.writeFile(tasksPath, addBranchToWorkStream(tasks, renderTemplate(section, values), IMPORT_BRANCH), 'utf-8');
      return true;
    } catch (error) {
      if (isFileNotFound(error) && !await this.exists(tasksPath)) {
        return false;
      }
      throw new RepositoryError(`Failed to update ${WORK_STREAM_TASKS}`, error);
    }
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  private async checkoutBaseBranch(baseBranch: string, warnings: string[]): Promise<void> {
    const { git } = this.deps;

    if (!await this.gitStep('read HEAD', () => git.hasCommits())) {
      throw new NotFoundError('Repository has no commits: create the inception commit first with rootsign init');
    }
    if (!await this.gitStep('check branches', () => git.branchExists(baseBranch))) {
      throw new NotFoundError(`Branch ${baseBranch} not found`);
    }

    const current = await this.gitStep('read current branch', () => git.getCurrentBranch());
    if (current !== baseBranch) {
      warnings.push(`Switched from ${current} to ${baseBranch}`);
      await this.gitStep(`checkout ${baseBranch}`, () => git.checkoutBranch(baseBranch));
    }
  }

  private async commitFiles(files: string[], message: string): Promise<string> {
    const { git } = this.deps;
    await this.gitStep('stage files', () => git.add(files));
    try {
      return await git.commit(message, { sign: true, signoff: true });
    } catch (error) {
      if (error instanceof CommitSigningError) {
        throw new SigningError(`Failed to sign commit: ${error.stderr.trim()}`, error);
      }
      if (error instanceof GitError) {
        throw new RepositoryError(`Failed to commit: ${error.message}`, error);
      }
      throw error;
    }
  }

  private async pushBranch(branch: string, warnings: string[]): Promise<boolean> {
    const { git } = this.deps;
    const hint = `push it later with: git push -u ${REMOTE} ${branch}`;

    if (await this.gitStep('read remotes', () => git.getRemoteUrl(REMOTE)) === null) {
      warnings.push(`No ${REMOTE} remote; ${hint}`);
      return false;
    }
    try {
      await git.push(REMOTE, branch, branch, true);
      logger.info(`Pushed ${branch} to ${REMOTE}`);
      return true;
    } catch (error) {
      if (!(error instanceof GitError)) throw error;
      warnings.push(`Could not push ${branch} (${error.message}); ${hint}`);
      return false;
    }
  }

  private async readAuthor(): Promise<string> {
    try {
      return await this.deps.git.getConfig('user.name') ?? '';
    } catch (error) {
      if (!(error instanceof GitError)) throw error;
      logger.debug(`user.name unavailable: ${error.message}`);
      return '';
    }
  }

  private async gitStep<T>(step: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof GitError) {
        throw new RepositoryError(`Failed to ${step}: ${error.message}`, error);
      }
      throw error;
    }
  }
}
