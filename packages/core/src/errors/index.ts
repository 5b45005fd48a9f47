export {
  BootstrapError,
  UsageError,
  SigningError,
  RepositoryError,
  NotFoundError,
  ToolingError,
  isBootstrapError,
} from './errors';
export type { BootstrapErrorCode } from './errors';
