export { MemoryGitModule } from './memory_git_module';
export type {
  MemoryAllowedSigner,
  MemoryGitModuleOptions,
  MemoryPush,
} from './memory_git_module';
