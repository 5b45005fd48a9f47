import * as path from 'path';
import { spawn } from 'child_process';
import { Config, Errors, Git, GitHub, Inception, Repository, SigningConfig } from '@rootsign/core';
import {
  createConfigManager,
  FsAllowedSignersStore,
  FsSigningKeyProvider,
  LocalGitModule,
  TemplateInstaller,
  TemplateSetup,
} from '@rootsign/core/fs';

/**
 * Runs an external command and collects its output.
 * A command that cannot be started resolves with exit code 127.
 */
export function spawnCommand(command: string, args: string[], options?: Git.ExecOptions): Promise<Git.ExecResult> {
  return new Promise<Git.ExecResult>((resolve) => {
    const proc = spawn(command, args, {
      cwd: options?.cwd ?? process.cwd(),
      env: { ...process.env, ...options?.env },
      ...(options?.timeout !== undefined && { timeout: options.timeout }),
    });

    let stdout = '';
    let stderr = '';

    proc.stdout?.on('data', (data: Buffer) => { stdout += data.toString(); });
    proc.stderr?.on('data', (data: Buffer) => { stderr += data.toString(); });

    proc.on('close', (code: number | null) => {
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });

    proc.on('error', (error: Error) => {
      resolve({ exitCode: 127, stdout, stderr: `${command}: command not found (${error.message})` });
    });
  });
}

export type LocalSetupOverrides = {
  allowedSignersFile?: string;
};

/**
 * Dependency Injection Service for the rootsign CLI
 *
 * Builds core modules over the real filesystem, git and ssh-keygen.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private config: Config.BootstrapConfig | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Resets the singleton instance (useful for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Loads ~/.config/rootsign/config.json (or $ROOTSIGN_CONFIG) once.
   */
  async getConfig(): Promise<Config.BootstrapConfig> {
    if (!this.config) {
      this.config = await createConfigManager(process.env['ROOTSIGN_CONFIG']).loadConfig();
    }
    return this.config;
  }

  createGitModule(repoDir: string): Git.IGitModule {
    return new LocalGitModule({ repoRoot: repoDir, execCommand: spawnCommand });
  }

  async getLocalRepositorySetup(overrides: LocalSetupOverrides = {}): Promise<Repository.LocalRepositorySetup> {
    const config = await this.getConfig();
    const git = this.createGitModule(process.cwd());
    const keyProvider = new FsSigningKeyProvider({
      getConfiguredKey: () => git.getConfig('user.signingkey', 'global'),
      execCommand: spawnCommand,
    });
    const allowedSigners = new FsAllowedSignersStore(
      path.resolve(overrides.allowedSignersFile ?? config.allowedSignersFile)
    );
    const signingConfig = new SigningConfig.SigningConfig({ git, keyProvider, allowedSigners });

    return new Repository.LocalRepositorySetup({
      keyProvider,
      signingConfig,
      createGitModule: (repoDir: string) => this.createGitModule(repoDir),
    });
  }

  getInceptionVerifier(repoDir: string): Inception.InceptionCommitVerifier {
    return new Inception.InceptionCommitVerifier({ git: this.createGitModule(repoDir) });
  }

  /**
   * @throws UsageError when neither GITHUB_TOKEN nor GH_TOKEN is set
   */
  async getGitHubRemoteSetup(repoDir: string): Promise<GitHub.GitHubRemoteSetup> {
    const token = process.env['GITHUB_TOKEN'] || process.env['GH_TOKEN'];
    if (!token) {
      throw new Errors.UsageError('Set GITHUB_TOKEN or GH_TOKEN to a token that can create repositories');
    }
    const config = await this.getConfig();
    return new GitHub.GitHubRemoteSetup({
      git: this.createGitModule(repoDir),
      remote: GitHub.createGitHubRemoteModule({ token, baseUrl: config.github.apiBaseUrl }),
      webHost: GitHub.webHostFromApiBaseUrl(config.github.apiBaseUrl),
    });
  }

  getTemplateInstaller(): TemplateInstaller {
    return new TemplateInstaller();
  }

  getTemplateSetup(repoDir: string): TemplateSetup {
    return new TemplateSetup({ git: this.createGitModule(repoDir), installer: this.getTemplateInstaller() });
  }
}
