/**
 * TemplateInstaller - copies the bundled bootstrap documents into a repository
 *
 * Before anything is written, the files an install can touch are copied to
 * untracked/original_bootstrap_files/. That backup is taken once and reused
 * on later installs unless `clearBackup` is set.
 *
 * @module template_installer
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { RepositoryError } from '../errors';
import { createLogger } from '../logger';
import type {
  RenderedFiles,
  TemplateInstallOptions,
  TemplateInstallResult,
  TemplateInstallerOptions,
} from './template_installer.types';

const logger = createLogger('[Templates] ');

/** Resolves from both src/template_installer and dist/template_installer */
export const DEFAULT_TEMPLATE_DIR = path.resolve(__dirname, '../../templates');

/** Never tracked */
export const UNTRACKED_DIR = 'untracked';
export const BACKUP_DIR = `${UNTRACKED_DIR}/original_bootstrap_files`;
export const UPDATED_TEMPLATES_DIR = `${UNTRACKED_DIR}/updated_bootstrap_files`;
export const SOURCE_MATERIAL_DIR = `${UNTRACKED_DIR}/source-material`;

const UPDATED_TEMPLATE_SUBDIRS = ['templates', 'context', 'requirements'];

/** Backed up even though no template replaces them */
const ORIGINAL_FILES = ['README.md'];

export function renderTemplate(content: string, values: Record<string, string>): string {
  return content.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) => values[key] ?? match);
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class TemplateInstaller {
  private readonly templateDir: string;

  constructor(options: TemplateInstallerOptions = {}) {
    this.templateDir = options.templateDir ?? DEFAULT_TEMPLATE_DIR;
  }

  /**
   * Lists template files relative to the template directory, sorted.
   */
  async listTemplates(): Promise<string[]> {
    try {
      const files = await this.walk('');
      return files.sort();
    } catch (error) {
      throw new RepositoryError(`Cannot read templates from ${this.templateDir}`, error);
    }
  }

  /**
   * @throws RepositoryError if the repository directory does not exist or a file cannot be written
   */
  async install(options: TemplateInstallOptions): Promise<TemplateInstallResult> {
    const repoDir = path.resolve(options.repoDir);
    const stat = await fs.stat(repoDir).catch(() => null);
    if (!stat?.isDirectory()) {
      throw new RepositoryError(`Repository directory not found: ${repoDir}`);
    }

    const templates = await this.listTemplates();
    const backup = await this.backupOriginals(repoDir, templates, options.clearBackup ?? false);

    const rendered = await this.renderInto(repoDir, {
      projectName: options.projectName ?? path.basename(repoDir),
      author: options.author ?? '',
      date: formatDate(options.date ?? new Date()),
    }, options.overwrite ?? false);

    try {
      for (const subdir of UPDATED_TEMPLATE_SUBDIRS) {
        await fs.mkdir(path.join(repoDir, UPDATED_TEMPLATES_DIR, subdir), { recursive: true });
      }
      await fs.mkdir(path.join(repoDir, SOURCE_MATERIAL_DIR), { recursive: true });
    } catch (error) {
      throw new RepositoryError(`Failed to create ${UNTRACKED_DIR}/ directories`, error);
    }

    logger.info(`Installed ${rendered.created.length} template(s), skipped ${rendered.skipped.length}`);
    return { ...rendered, ...backup };
  }

  /**
   * Writes every template under repoDir. Placeholders are filled in file
   * paths as well as contents.
   *
   * @throws RepositoryError if a file cannot be written
   */
  async renderInto(repoDir: string, values: Record<string, string>, overwrite: boolean = false): Promise<RenderedFiles> {
    const created: string[] = [];
    const skipped: string[] = [];

    for (const templatePath of await this.listTemplates()) {
      const relativePath = renderTemplate(templatePath, values);
      const target = path.join(repoDir, relativePath);
      if (!overwrite && await this.exists(target)) {
        logger.debug(`${relativePath} already exists, skipping`);
        skipped.push(relativePath);
        continue;
      }
      try {
        const content = await fs.readFile(path.join(this.templateDir, templatePath), 'utf-8');
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, renderTemplate(content, values), 'utf-8');
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new RepositoryError(`Failed to write ${relativePath}: ${message}`, error);
      }
      created.push(relativePath);
    }

    return { created: created.sort(), skipped: skipped.sort() };
  }

  private async backupOriginals(
    repoDir: string,
    templates: string[],
    clearBackup: boolean
  ): Promise<Pick<TemplateInstallResult, 'backedUp' | 'backupReused'>> {
    const backupRoot = path.join(repoDir, BACKUP_DIR);

    if (await this.exists(backupRoot)) {
      if (!clearBackup) {
        logger.warn(`Using existing backup in ${BACKUP_DIR}; pass clearBackup to take a new one`);
        return { backedUp: [], backupReused: true };
      }
      logger.info(`Clearing existing backup in ${BACKUP_DIR}`);
    }

    const backedUp: string[] = [];
    try {
      await fs.rm(backupRoot, { recursive: true, force: true });
      await fs.mkdir(backupRoot, { recursive: true });
      for (const relativePath of [...new Set([...ORIGINAL_FILES, ...templates])].sort()) {
        const source = path.join(repoDir, relativePath);
        if (!await this.exists(source)) continue;
        const target = path.join(backupRoot, relativePath);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.copyFile(source, target);
        backedUp.push(relativePath);
      }
    } catch (error) {
      throw new RepositoryError(`Failed to back up original files to ${BACKUP_DIR}`, error);
    }

    if (backedUp.length > 0) {
      logger.info(`Backed up ${backedUp.length} file(s) to ${BACKUP_DIR}`);
    }
    return { backedUp, backupReused: false };
  }

  private async walk(relativeDir: string): Promise<string[]> {
    const entries = await fs.readdir(path.join(this.templateDir, relativeDir), { withFileTypes: true });
    const files: string[] = [];
    for (const entry of entries) {
      const relativePath = relativeDir ? path.posix.join(relativeDir, entry.name) : entry.name;
      if (entry.isDirectory()) {
        files.push(...await this.walk(relativePath));
      } else if (entry.isFile()) {
        files.push(relativePath);
      }
    }
    return files;
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
