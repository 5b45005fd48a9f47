export { LocalRepositorySetup, resolveRepositoryTarget } from './repository_setup';
export type {
  RepositoryTarget,
  LocalRepositorySetupOptions,
  LocalRepositorySetupResult,
  LocalRepositorySetupDependencies,
} from './repository_setup.types';
