/**
 * ConfigManager Types
 */

export type RepositoryVisibility = 'public' | 'private';

/**
 * Effective configuration, defaults applied.
 */
export type BootstrapConfig = {
  /** Branch created by `git init` and pushed to the remote */
  initialBranch: string;
  /** allowed_signers file written and used for verification */
  allowedSignersFile: string;
  /** Explicit signing key path; discovery is used when absent */
  signingKey?: string;
  github: {
    visibility: RepositoryVisibility;
    requiredApprovingReviewCount: number;
    apiBaseUrl: string;
  };
  templates: {
    overwrite: boolean;
  };
};

/**
 * Shape of config.json: every field optional.
 */
export type BootstrapConfigFile = {
  initialBranch?: string;
  allowedSignersFile?: string;
  signingKey?: string;
  github?: Partial<BootstrapConfig['github']>;
  templates?: Partial<BootstrapConfig['templates']>;
};

export interface IConfigManager {
  loadConfig(): Promise<BootstrapConfig>;
}
