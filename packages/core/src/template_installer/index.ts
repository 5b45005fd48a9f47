export {
  TemplateInstaller,
  DEFAULT_TEMPLATE_DIR,
  UNTRACKED_DIR,
  BACKUP_DIR,
  UPDATED_TEMPLATES_DIR,
  SOURCE_MATERIAL_DIR,
  renderTemplate,
  formatDate,
} from './template_installer';
export {
  TemplateSetup,
  DEFAULT_IMPORT_TEMPLATE_DIR,
  IMPORT_BRANCH,
  WORK_STREAM_TASKS,
  TEMPLATE_COMMIT_MESSAGE,
  IMPORT_COMMIT_MESSAGE,
  addBranchToWorkStream,
} from './template_setup';
export type {
  TemplateInstallOptions,
  TemplateInstallResult,
  TemplateInstallerOptions,
  RenderedFiles,
  TemplateSetupOptions,
  TemplateSetupResult,
  TemplateSetupDependencies,
  ImportBranchResult,
} from './template_installer.types';
