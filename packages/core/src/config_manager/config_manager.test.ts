import * as os from 'os';
import * as path from 'path';
import { ConfigManager, ConfigValidationError, DEFAULT_CONFIG } from './config_manager';
import { MemoryConfigStore } from '../config_store/memory';

describe('ConfigManager', () => {
  let store: MemoryConfigStore;

  beforeEach(() => {
    store = new MemoryConfigStore();
  });

  describe('loadConfig (EARS-CM1 to CM6)', () => {
    it('[EARS-CM1] should return defaults when nothing is stored', async () => {
      const config = await new ConfigManager(store, {}).loadConfig();

      expect(config).toEqual({
        ...DEFAULT_CONFIG,
        allowedSignersFile: path.join(os.homedir(), '.config/git/allowed_signers'),
      });
    });

    it('[EARS-CM2] should merge stored values over defaults', async () => {
      store.setConfig({ initialBranch: 'trunk', github: { visibility: 'public' } });

      const config = await new ConfigManager(store, {}).loadConfig();

      expect(config.initialBranch).toBe('trunk');
      expect(config.github).toEqual({
        visibility: 'public',
        requiredApprovingReviewCount: 1,
        apiBaseUrl: 'https://api.github.com',
      });
    });

    it('[EARS-CM3] should let the environment override the file', async () => {
      store.setConfig({ initialBranch: 'trunk', signingKey: '/keys/file_key' });

      const config = await new ConfigManager(store, {
        ROOTSIGN_INITIAL_BRANCH: 'release',
        ROOTSIGN_SIGNING_KEY: '/keys/env_key',
        ROOTSIGN_ALLOWED_SIGNERS: '/etc/allowed_signers',
      }).loadConfig();

      expect(config.initialBranch).toBe('release');
      expect(config.signingKey).toBe('/keys/env_key');
      expect(config.allowedSignersFile).toBe('/etc/allowed_signers');
    });

    it('[EARS-CM4] should expand ~ in paths', async () => {
      store.setConfig({ signingKey: '~/.ssh/work_ed25519' });

      const config = await new ConfigManager(store, {}).loadConfig();

      expect(config.signingKey).toBe(path.join(os.homedir(), '.ssh/work_ed25519'));
    });

    it('[EARS-CM5] should reject unknown keys and wrong types', async () => {
      store.setConfig({ initialBranch: 'main', colour: 'blue', github: { visibility: 'internal' } });

      const error = await new ConfigManager(store, {}).loadConfig().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigValidationError);
      const errors = error instanceof ConfigValidationError ? error.errors : [];
      expect(errors).toHaveLength(2);
      expect(errors).toEqual(expect.arrayContaining([
        '/ must NOT have additional properties',
        '/github/visibility must be equal to one of the allowed values',
      ]));
    });

    it('[EARS-CM6] should reject a malformed API URL', async () => {
      store.setConfig({ github: { apiBaseUrl: 'not a url' } });

      await expect(new ConfigManager(store, {}).loadConfig()).rejects.toThrow('/github/apiBaseUrl must match format "uri"');
    });
  });
});
