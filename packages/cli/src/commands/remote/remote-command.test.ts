import * as path from 'path';
import { RemoteCommand } from './remote-command';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { Config, GitHub } from '@rootsign/core';
import { MemoryGitModule } from '@rootsign/core/memory';

// Mock console methods to capture output
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

class RequestErrorStub extends Error {
  constructor(public readonly status: number, message: string = 'Error') {
    super(message);
  }
}

function createMockClient() {
  return {
    rest: {
      users: {
        getAuthenticated: jest.fn().mockResolvedValue({ data: { login: 'alice' } }),
      },
      repos: {
        get: jest.fn().mockRejectedValue(new RequestErrorStub(404, 'Not Found')),
        createForAuthenticatedUser: jest.fn().mockResolvedValue({ data: { html_url: 'https://github.com/alice/widget' } }),
        getCommit: jest.fn().mockRejectedValue(new RequestErrorStub(404)),
        updateBranchProtection: jest.fn().mockResolvedValue({ data: {} }),
        createCommitSignatureProtection: jest.fn().mockResolvedValue({ data: { enabled: true } }),
        getBranchProtection: jest.fn().mockResolvedValue({
          data: {
            required_pull_request_reviews: { required_approving_review_count: 1 },
            required_signatures: { enabled: true },
          },
        }),
      },
    },
  };
}

describe('RemoteCommand', () => {
  let client: ReturnType<typeof createMockClient>;
  let git: MemoryGitModule;
  let setup: GitHub.GitHubRemoteSetup;
  let container: DependencyInjectionService;
  let command: RemoteCommand;
  let inceptionId: string;

  beforeEach(() => {
    jest.clearAllMocks();
    client = createMockClient();
    git = new MemoryGitModule();
    inceptionId = git.addCommit();
    setup = new GitHub.GitHubRemoteSetup({ git, remote: new GitHub.GitHubRemoteModule({ client }) });

    DependencyInjectionService.reset();
    container = DependencyInjectionService.getInstance();
    jest.spyOn(container, 'getConfig').mockResolvedValue({ ...Config.DEFAULT_CONFIG });
    jest.spyOn(container, 'getGitHubRemoteSetup').mockResolvedValue(setup);

    command = new RemoteCommand();
  });

  it('[EARS-R1] should create, push and report protection', async () => {
    await command.execute('widget', { dir: 'widget' });

    expect(container.getGitHubRemoteSetup).toHaveBeenCalledWith(path.resolve('widget'));
    expect(mockConsoleLog).toHaveBeenCalledWith('✅ Created GitHub repository alice/widget');
    expect(mockConsoleLog).toHaveBeenCalledWith(`✅ Pushed inception commit ${inceptionId}`);
    expect(mockConsoleLog).toHaveBeenCalledWith('   Remote: https://github.com/alice/widget.git');
    expect(mockConsoleLog).toHaveBeenCalledWith('   Required approving reviews: 1');
    expect(mockConsoleLog).toHaveBeenCalledWith('   Required signatures: enabled');
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('[EARS-R2] should pass visibility, branch and review count through', async () => {
    jest.spyOn(container, 'getConfig').mockResolvedValue({
      ...Config.DEFAULT_CONFIG,
      github: { ...Config.DEFAULT_CONFIG.github, requiredApprovingReviewCount: 2 },
    });
    const run = jest.spyOn(setup, 'setup');

    await command.execute('widget', { visibility: 'public', branch: 'trunk', quiet: true });

    expect(run).toHaveBeenCalledWith({
      repoName: 'widget',
      visibility: 'public',
      branch: 'trunk',
      requiredApprovingReviewCount: 2,
    });
    expect(client.rest.repos.createForAuthenticatedUser).toHaveBeenCalledWith({ name: 'widget', private: false, auto_init: false });
  });

  it('[EARS-R3] should print protection warnings', async () => {
    client.rest.repos.createCommitSignatureProtection.mockRejectedValue(new RequestErrorStub(403));

    await command.execute('widget', {});

    expect(mockConsoleLog).toHaveBeenCalledWith(
      '⚠️  Required signatures not enabled: Permission denied: POST /repos/alice/widget/branches/main/protection/required_signatures'
    );
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('[EARS-R4] should exit 2 for an unknown visibility', async () => {
    await command.execute('widget', { visibility: 'internal' });

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Invalid visibility "internal": expected public or private');
    expect(mockProcessExit).toHaveBeenCalledWith(2);
    expect(client.rest.users.getAuthenticated).not.toHaveBeenCalled();
  });

  it('[EARS-R5] should exit 5 when GitHub rejects the token', async () => {
    client.rest.users.getAuthenticated.mockRejectedValue(new RequestErrorStub(401, 'Bad credentials'));

    await command.execute('widget', { json: true });

    expect(JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))).toEqual({
      success: false,
      error: 'Permission denied: GET /user',
      code: 'PERMISSION_DENIED',
      exitCode: 5,
    });
    expect(mockProcessExit).toHaveBeenCalledWith(5);
  });
});
