/**
 * FsConfigStore Unit Tests
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FsConfigStore, createConfigManager } from './fs_config_store';
import { ConfigValidationError } from '../../config_manager';

describe('FsConfigStore', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-config-store-test-'));
    configPath = path.join(tempDir, 'rootsign', 'config.json');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<void> {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, content);
  }

  it('[EARS-FC1] should return null for a missing file', async () => {
    expect(await new FsConfigStore(configPath).loadConfig()).toBeNull();
  });

  it('[EARS-FC2] should load the file as parsed JSON', async () => {
    await writeConfig('{\n  "initialBranch": "trunk",\n  "github": { "visibility": "public" }\n}\n');

    expect(await new FsConfigStore(configPath).loadConfig()).toEqual({ initialBranch: 'trunk', github: { visibility: 'public' } });
  });

  it('[EARS-FC3] should reject a file that is not JSON', async () => {
    await writeConfig('{ initialBranch: trunk }');

    await expect(new FsConfigStore(configPath).loadConfig()).rejects.toThrow(ConfigValidationError);
  });

  it('[EARS-FC4] should build a ConfigManager over the file', async () => {
    await writeConfig('{ "templates": { "overwrite": true } }');

    const config = await createConfigManager(configPath, {}).loadConfig();

    expect(config.templates.overwrite).toBe(true);
    expect(config.initialBranch).toBe('main');
  });
});
