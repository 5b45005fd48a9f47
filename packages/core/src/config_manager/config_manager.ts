/**
 * ConfigManager - Bootstrap configuration
 *
 * Loads the user's config.json through a ConfigStore, validates it against
 * the JSON schema, fills in defaults and applies environment overrides.
 */

import Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { ConfigStore } from '../config_store/config_store';
import { expandHome } from '../utils/path_utils';
import configSchema from './bootstrap_config.schema.json';
import type {
  BootstrapConfig,
  BootstrapConfigFile,
  IConfigManager,
} from './config_manager.types';

export const DEFAULT_CONFIG: BootstrapConfig = {
  initialBranch: 'main',
  allowedSignersFile: '~/.config/git/allowed_signers',
  github: {
    visibility: 'private',
    requiredApprovingReviewCount: 1,
    apiBaseUrl: 'https://api.github.com',
  },
  templates: {
    overwrite: false,
  },
};

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: string[] = []
  ) {
    super(errors.length > 0 ? `${message}: ${errors.join('; ')}` : message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}

let validator: ValidateFunction<BootstrapConfigFile> | null = null;

function getValidator(): ValidateFunction<BootstrapConfigFile> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true });
    addFormats(ajv);
    validator = ajv.compile<BootstrapConfigFile>(configSchema);
  }
  return validator;
}

function formatAjvError(error: ErrorObject): string {
  return `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`;
}

/**
 * Validates raw config.json content.
 *
 * @throws ConfigValidationError listing every schema violation
 */
export function validateConfigFile(data: unknown): BootstrapConfigFile {
  const validate = getValidator();
  if (!validate(data)) {
    throw new ConfigValidationError('Invalid configuration', (validate.errors ?? []).map(formatAjvError));
  }
  return data;
}

/**
 * Configuration Manager Class
 *
 * Precedence: environment, then config.json, then defaults.
 *
 * @example
 * ```typescript
 * const configManager = new ConfigManager(new FsConfigStore());
 * const config = await configManager.loadConfig();
 * console.log(config.initialBranch); // "main"
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private readonly env: NodeJS.ProcessEnv;

  constructor(configStore: ConfigStore, env: NodeJS.ProcessEnv = process.env) {
    this.configStore = configStore;
    this.env = env;
  }

  /**
   * @throws ConfigValidationError if the stored config breaks the schema
   */
  async loadConfig(): Promise<BootstrapConfig> {
    const raw = await this.configStore.loadConfig();
    const file = raw === null ? {} : validateConfigFile(raw);

    const signingKey = this.env['ROOTSIGN_SIGNING_KEY'] || file.signingKey;
    const config: BootstrapConfig = {
      initialBranch: this.env['ROOTSIGN_INITIAL_BRANCH'] || file.initialBranch || DEFAULT_CONFIG.initialBranch,
      allowedSignersFile: expandHome(
        this.env['ROOTSIGN_ALLOWED_SIGNERS'] || file.allowedSignersFile || DEFAULT_CONFIG.allowedSignersFile
      ),
      github: { ...DEFAULT_CONFIG.github, ...file.github },
      templates: { ...DEFAULT_CONFIG.templates, ...file.templates },
    };
    if (signingKey) {
      config.signingKey = expandHome(signingKey);
    }
    return config;
  }
}
