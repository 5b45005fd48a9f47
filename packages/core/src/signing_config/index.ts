export { SigningConfig, compareVersions, MIN_GIT_VERSION } from './signing_config';
export type {
  EnvironmentValidation,
  ValidatePrerequisitesOptions,
  ConfigureGitSigningOptions,
  SigningConfigurationResult,
  SigningConfigDependencies,
} from './signing_config.types';
