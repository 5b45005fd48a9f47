import type { IGitModule } from '../git';
import type { TemplateInstaller } from './template_installer';

export type TemplateInstallOptions = {
  repoDir: string;
  /** Substituted for {{projectName}}; defaults to the directory name */
  projectName?: string;
  /** Substituted for {{author}} (default: empty) */
  author?: string;
  /** Replace files that already exist */
  overwrite?: boolean;
  /** Discard an existing backup of the original files and take a new one */
  clearBackup?: boolean;
  /** Substituted for {{date}} as YYYY-MM-DD (default: today) */
  date?: Date;
};

export type RenderedFiles = {
  /** Paths relative to the repository, sorted */
  created: string[];
  skipped: string[];
};

export type TemplateInstallResult = RenderedFiles & {
  /** Pre-existing files copied into the backup directory, sorted */
  backedUp: string[];
  /** An earlier backup was kept instead of taking a new one */
  backupReused: boolean;
};

export type TemplateInstallerOptions = {
  /** Directory holding the template tree (default: the bundled templates/) */
  templateDir?: string;
};

export type TemplateSetupOptions = Omit<TemplateInstallOptions, 'author'> & {
  /** Branch the templates are committed on (default: main) */
  baseBranch?: string;
  /** Commit the installed files and create the import branch (default: true) */
  commit?: boolean;
  /** Create the docs/import-existing-materials branch (default: true) */
  importBranch?: boolean;
  /** Push committed branches to origin when it exists (default: false) */
  push?: boolean;
};

export type ImportBranchResult = {
  branch: string;
  /** Null when the branch already existed and was left alone */
  commitId: string | null;
  files: string[];
  pushed: boolean;
};

export type TemplateSetupResult = {
  install: TemplateInstallResult;
  /** Null when nothing was committed */
  templateCommit: string | null;
  /** Whether the base branch reached origin */
  basePushed: boolean;
  importBranch: ImportBranchResult | null;
  warnings: string[];
};

export type TemplateSetupDependencies = {
  git: IGitModule;
  installer?: TemplateInstaller;
  /** Directory holding the import branch templates (default: the bundled one) */
  importTemplateDir?: string;
};
