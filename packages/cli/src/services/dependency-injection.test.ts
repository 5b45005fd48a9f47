import { DependencyInjectionService } from './dependency-injection';
import { Errors, Git, GitHub } from '@rootsign/core';

describe('DependencyInjectionService', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    DependencyInjectionService.reset();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('[EARS-DI1] should return the same instance until reset', () => {
    const first = DependencyInjectionService.getInstance();

    expect(DependencyInjectionService.getInstance()).toBe(first);
    DependencyInjectionService.reset();
    expect(DependencyInjectionService.getInstance()).not.toBe(first);
  });

  it('[EARS-DI2] should build git modules bound to the repository directory', async () => {
    const git = DependencyInjectionService.getInstance().createGitModule('/work/widget');

    expect(git).toBeInstanceOf(Git.LocalGitModule);
    await expect(git.getRepoRoot()).resolves.toBe('/work/widget');
  });

  it('[EARS-DI3] should require a GitHub token for remote setup', async () => {
    delete process.env['GITHUB_TOKEN'];
    delete process.env['GH_TOKEN'];

    await expect(DependencyInjectionService.getInstance().getGitHubRemoteSetup('/work/widget'))
      .rejects.toThrow(Errors.UsageError);
  });

  it('[EARS-DI4] should build remote setup from GH_TOKEN', async () => {
    delete process.env['GITHUB_TOKEN'];
    process.env['GH_TOKEN'] = 'test-token';
    const container = DependencyInjectionService.getInstance();
    jest.spyOn(container, 'getConfig').mockResolvedValue({
      initialBranch: 'main',
      allowedSignersFile: '/tmp/allowed_signers',
      github: { visibility: 'private', requiredApprovingReviewCount: 1, apiBaseUrl: 'https://api.github.com' },
      templates: { overwrite: false },
    });

    await expect(container.getGitHubRemoteSetup('/work/widget')).resolves.toBeInstanceOf(GitHub.GitHubRemoteSetup);
  });
});
