import { SigningConfig, compareVersions } from './signing_config';
import { MemoryGitModule } from '../git/memory';
import { GitCommandError } from '../git';
import { MemorySigningKeyProvider } from '../signing_key/memory';
import { MemoryAllowedSignersStore } from '../allowed_signers/memory';
import { SigningError } from '../errors';

describe('SigningConfig', () => {
  let git: MemoryGitModule;
  let keys: MemorySigningKeyProvider;
  let allowedSigners: MemoryAllowedSignersStore;
  let signingConfig: SigningConfig;

  beforeEach(() => {
    keys = new MemorySigningKeyProvider();
    git = new MemoryGitModule({ signer: keys });
    allowedSigners = new MemoryAllowedSignersStore('/home/alice/.config/git/allowed_signers');
    signingConfig = new SigningConfig({ git, keyProvider: keys, allowedSigners });
  });

  describe('compareVersions', () => {
    it('should compare numerically, padding missing parts', () => {
      expect(compareVersions('2.39.5', '2.34.0')).toBeGreaterThan(0);
      expect(compareVersions('2.9', '2.34.0')).toBeLessThan(0);
      expect(compareVersions('2.34', '2.34.0')).toBe(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // validatePrerequisites (EARS-SC1 to SC5)
  // ═══════════════════════════════════════════════════════════════════════════

  describe('validatePrerequisites (EARS-SC1 to SC5)', () => {
    beforeEach(async () => {
      await git.setConfig('user.name', 'Alice', 'global');
      await git.setConfig('user.email', 'alice@example.com', 'global');
    });

    it('[EARS-SC1] should accept a complete environment', async () => {
      const key = keys.generateSigningKeySync('alice@example.com');
      await git.setConfig('gpg.format', 'ssh', 'global');
      await git.setConfig('gpg.ssh.allowedSignersFile', '/home/alice/.config/git/allowed_signers', 'global');
      await git.setConfig('commit.gpgsign', 'true', 'global');

      const result = await signingConfig.validatePrerequisites();

      expect(result).toEqual({
        isValid: true,
        warnings: [],
        suggestions: [],
        gitVersion: '2.39.5',
        identity: { name: 'Alice', email: 'alice@example.com' },
        signingKey: key,
      });
    });

    it('[EARS-SC2] should only warn about missing signing settings', async () => {
      keys.generateSigningKeySync('alice@example.com');

      const result = await signingConfig.validatePrerequisites();

      expect(result.isValid).toBe(true);
      expect(result.warnings).toEqual([
        'gpg.format is not set to ssh',
        'gpg.ssh.allowedSignersFile is not configured',
        'commit.gpgsign is not enabled',
      ]);
    });

    it('[EARS-SC3] should reject git older than 2.34.0', async () => {
      const oldGit = new MemoryGitModule({ version: '2.30.1' });
      await oldGit.setConfig('user.name', 'Alice', 'global');
      await oldGit.setConfig('user.email', 'alice@example.com', 'global');
      keys.generateSigningKeySync('alice@example.com');
      const config = new SigningConfig({ git: oldGit, keyProvider: keys, allowedSigners });

      const result = await config.validatePrerequisites();

      expect(result.isValid).toBe(false);
      expect(result.warnings[0]).toBe('Git 2.30.1 is too old for SSH commit signing (need 2.34.0)');
    });

    it('[EARS-SC4] should reject a missing git, identity or key', async () => {
      const bare = new MemoryGitModule();
      jest.spyOn(bare, 'getVersion').mockRejectedValue(new GitCommandError('Git is not available'));
      const config = new SigningConfig({ git: bare, keyProvider: keys, allowedSigners });

      const result = await config.validatePrerequisites();

      expect(result.isValid).toBe(false);
      expect(result.gitVersion).toBeNull();
      expect(result.identity).toBeNull();
      expect(result.signingKey).toBeNull();
      expect(result.warnings).toEqual([
        'Git is not installed or not on PATH',
        'user.name is not configured',
        'user.email is not configured',
        'No signing key found',
      ]);
      expect(result.suggestions).toContain('ssh-keygen -t ed25519 -C "you@example.com"');
    });

    it('[EARS-SC5] should resolve an explicit signing key', async () => {
      keys.generateSigningKeySync('alice@example.com');
      const work = keys.generateSigningKeySync('alice@example.com', 'work');

      const result = await signingConfig.validatePrerequisites({ signingKeyId: 'work' });

      expect(result.signingKey).toBe(work);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // configureGitSigning (EARS-SC6 to SC8)
  // ═══════════════════════════════════════════════════════════════════════════

  describe('configureGitSigning (EARS-SC6 to SC8)', () => {
    it('[EARS-SC6] should write signing settings and authorize the key', async () => {
      const key = keys.generateSigningKeySync('alice@example.com');

      const result = await signingConfig.configureGitSigning({
        signingKey: key,
        identity: { name: 'Alice', email: 'alice@example.com' },
      });

      expect(result.warnings).toEqual([]);
      expect(result.allowedSignerAdded).toBe(true);
      expect(await git.getConfig('gpg.format', 'global')).toBe('ssh');
      expect(await git.getConfig('user.signingkey', 'global')).toBe(key.privateKeyPath);
      expect(await git.getConfig('commit.gpgsign', 'global')).toBe('true');
      expect(await git.getConfig('gpg.ssh.allowedSignersFile', 'global')).toBe('/home/alice/.config/git/allowed_signers');
      expect((await allowedSigners.read())[0]?.principals).toEqual(['alice@example.com']);
    });

    it('[EARS-SC7] should not add the same signer twice', async () => {
      const key = keys.generateSigningKeySync('alice@example.com');
      const options = { signingKey: key, identity: { name: 'Alice', email: 'alice@example.com' }, scope: 'local' as const };

      await signingConfig.configureGitSigning(options);
      const second = await signingConfig.configureGitSigning(options);

      expect(second.allowedSignerAdded).toBe(false);
      expect(await allowedSigners.read()).toHaveLength(1);
    });

    it('[EARS-SC8] should raise SigningError when git config cannot be written', async () => {
      const key = keys.generateSigningKeySync('alice@example.com');
      jest.spyOn(git, 'setConfig').mockRejectedValue(new GitCommandError('Failed to set config gpg.format'));

      await expect(signingConfig.configureGitSigning({
        signingKey: key,
        identity: { name: 'Alice', email: 'alice@example.com' },
      })).rejects.toThrow(SigningError);
    });
  });
});
