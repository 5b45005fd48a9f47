import {
  BootstrapError,
  NotFoundError,
  RepositoryError,
  SigningError,
  ToolingError,
  UsageError,
  isBootstrapError,
} from './errors';

describe('Bootstrap errors', () => {
  it('[EARS-E1] should carry a code per error class', () => {
    expect(new UsageError('u').code).toBe('USAGE');
    expect(new SigningError('s').code).toBe('SIGNING');
    expect(new RepositoryError('r').code).toBe('REPOSITORY');
    expect(new NotFoundError('n').code).toBe('NOT_FOUND');
    expect(new ToolingError('t').code).toBe('TOOLING');
  });

  it('[EARS-E2] should keep the prototype chain and name', () => {
    const error = new SigningError('key rejected');

    expect(error).toBeInstanceOf(SigningError);
    expect(error).toBeInstanceOf(BootstrapError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SigningError');
    expect(error.message).toBe('key rejected');
  });

  it('[EARS-E3] should attach the cause only when given', () => {
    const cause = new Error('exit 128');

    expect(new RepositoryError('commit-tree failed', cause).cause).toBe(cause);
    expect('cause' in new RepositoryError('commit-tree failed')).toBe(false);
  });

  it('[EARS-E4] should recognize bootstrap errors', () => {
    expect(isBootstrapError(new ToolingError('git not installed'))).toBe(true);
    expect(isBootstrapError(new Error('plain'))).toBe(false);
    expect(isBootstrapError('USAGE')).toBe(false);
  });
});
