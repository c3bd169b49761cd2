/**
 * FsConfigStore Unit Tests
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FsConfigStore, createConfigManager } from './fs_config_store';
import { ConfigParseError } from '../../config_manager/config_manager.errors';

describe('FsConfigStore', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-config-store-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  // ==================== Instance Methods ====================

  describe('loadConfig', () => {
    it('should parse a YAML document', async () => {
      const configPath = path.join(tempDir, 'config.yaml');
      await fs.writeFile(configPath, [
        'logging:',
        '  level: debug',
        'accounts:',
        '  - institutionCode: "12345"',
        '    username: s1',
        '    password: test-password',
      ].join('\n'), 'utf-8');

      const raw = await new FsConfigStore(configPath).loadConfig();

      expect(raw).toEqual({
        logging: { level: 'debug' },
        accounts: [{ institutionCode: '12345', username: 's1', password: 'test-password' }],
      });
    });

    it('should parse a JSON document', async () => {
      const configPath = path.join(tempDir, 'config.json');
      await fs.writeFile(configPath, JSON.stringify({ dataDir: '/var/lib/gradewatch' }), 'utf-8');

      expect(await new FsConfigStore(configPath).loadConfig()).toEqual({ dataDir: '/var/lib/gradewatch' });
    });

    it('should return null when the file does not exist', async () => {
      expect(await new FsConfigStore(path.join(tempDir, 'missing.yaml')).loadConfig()).toBeNull();
    });

    it('should read an empty YAML file as an empty document', async () => {
      const configPath = path.join(tempDir, 'config.yaml');
      await fs.writeFile(configPath, '', 'utf-8');

      expect(await new FsConfigStore(configPath).loadConfig()).toEqual({});
    });

    it('should throw ConfigParseError for malformed content', async () => {
      const configPath = path.join(tempDir, 'config.json');
      await fs.writeFile(configPath, '{ "dataDir": ', 'utf-8');

      await expect(new FsConfigStore(configPath).loadConfig()).rejects.toBeInstanceOf(ConfigParseError);
    });
  });

  describe('saveConfig', () => {
    it('should write YAML that loads back to the same document', async () => {
      const configPath = path.join(tempDir, 'nested', 'config.yaml');
      const store = new FsConfigStore(configPath);
      const document = { logging: { level: 'warn' as const }, channels: [{ name: 'team', type: 'console' }] };

      await store.saveConfig(document);

      expect(await store.loadConfig()).toEqual(document);
      expect(await fs.readdir(path.dirname(configPath))).toEqual(['config.yaml']);
    });

    it('should write JSON for a .json path', async () => {
      const configPath = path.join(tempDir, 'config.json');

      await new FsConfigStore(configPath).saveConfig({ dataDir: '/srv/data' });

      expect(await fs.readFile(configPath, 'utf-8')).toBe('{\n  "dataDir": "/srv/data"\n}\n');
    });
  });

  // ==================== Static Utility Methods ====================

  describe('resolveConfigPath', () => {
    it('should prefer an explicit path', () => {
      expect(FsConfigStore.resolveConfigPath('/etc/gw.yaml', { GRADEWATCH_CONFIG: '/env/gw.yaml' }, '/home/u'))
        .toBe(path.resolve('/etc/gw.yaml'));
    });

    it('should fall back to the environment variable', () => {
      expect(FsConfigStore.resolveConfigPath(undefined, { GRADEWATCH_CONFIG: '/env/gw.yaml' }, '/home/u'))
        .toBe(path.resolve('/env/gw.yaml'));
    });

    it('should default to the home directory', () => {
      expect(FsConfigStore.resolveConfigPath(undefined, {}, '/home/u'))
        .toBe(path.join('/home/u', '.gradewatch', 'config.yaml'));
    });
  });

  describe('createConfigManager', () => {
    it('should build a manager reading the given file', async () => {
      const configPath = path.join(tempDir, 'config.yaml');
      await fs.writeFile(configPath, 'dataDir: ~/grades\n', 'utf-8');

      const config = await createConfigManager(configPath, { homeDir: '/home/u' }).loadConfig();

      expect(config.dataDir).toBe(path.join('/home/u', 'grades'));
    });
  });
});
