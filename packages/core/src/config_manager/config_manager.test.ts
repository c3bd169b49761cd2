import * as path from 'path';
import { ConfigManager, expandHome, resolveConfig, validateAppConfig } from './config_manager';
import { ConfigError, ConfigNotFoundError, ConfigValidationError } from './config_manager.errors';
import { MemoryConfigStore } from '../config_store/memory';

const HOME = '/home/tester';

function validDocument(): Record<string, unknown> {
  return {
    accounts: [{ institutionCode: '12345', username: 's1', password: 'test-password' }],
    channels: [{ name: 'team', type: 'webhook', parameters: { url: 'https://hooks.example.test/bot' } }],
  };
}

describe('ConfigManager', () => {
  let store: MemoryConfigStore;
  let manager: ConfigManager;

  beforeEach(() => {
    store = new MemoryConfigStore();
    manager = new ConfigManager(store, { homeDir: HOME });
  });

  // ─────────────────────────────────────────────────────────
  // Defaults
  // ─────────────────────────────────────────────────────────

  describe('loadConfig', () => {
    it('should apply every default to a minimal document', async () => {
      store.setConfig(validDocument());

      const config = await manager.loadConfig();

      expect(config).toEqual({
        logging: { level: 'info' },
        dataDir: path.join(HOME, '.gradewatch'),
        plugins: { indexUrl: '', mirrorPrefix: '', autoUpdate: false, requestTimeoutMs: 30000 },
        scheduler: { maxRetries: 3, baseBackoffMs: 5000, maxBackoffMs: 300000, maxPhaseTimeoutMs: 120000, jitterMs: 30000 },
        dispatch: { timeoutMs: 10000, sendFullReport: false },
        semester: { totalWeeks: 20 },
        accounts: [{
          institutionCode: '12345',
          username: 's1',
          password: 'test-password',
          enabled: true,
          grades: { enabled: true, intervalSeconds: 3600 },
          schedule: { enabled: true, intervalSeconds: 3600 },
        }],
        channels: [{ name: 'team', type: 'webhook', enabled: true, parameters: { url: 'https://hooks.example.test/bot' } }],
      });
    });

    it('should keep explicit values over defaults', async () => {
      store.setConfig({
        ...validDocument(),
        logging: { level: 'debug' },
        scheduler: { maxRetries: 5 },
        semester: { firstMonday: '2026-02-23' },
      });

      const config = await manager.loadConfig();

      expect(config.logging.level).toBe('debug');
      expect(config.scheduler.maxRetries).toBe(5);
      expect(config.scheduler.baseBackoffMs).toBe(5000);
      expect(config.semester).toEqual({ firstMonday: '2026-02-23', totalWeeks: 20 });
    });

    it('should throw ConfigNotFoundError without a document', async () => {
      await expect(manager.loadConfig()).rejects.toBeInstanceOf(ConfigNotFoundError);
    });
  });

  // ─────────────────────────────────────────────────────────
  // Validation
  // ─────────────────────────────────────────────────────────

  describe('validateConfig', () => {
    it('should list every schema violation as path: message', () => {
      const invalid = {
        logging: { level: 'loud' },
        accounts: [{ institutionCode: 'bad code', username: 's1' }],
      };

      let caught: unknown;
      try {
        manager.validateConfig(invalid);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigValidationError);
      const errors = caught instanceof ConfigValidationError ? caught.errors : [];
      expect(errors).toEqual(expect.arrayContaining([
        '/logging/level: must be equal to one of the allowed values',
        "/accounts/0: must have required property 'password'",
        '/accounts/0/institutionCode: must match pattern "^[A-Za-z0-9_-]+$"',
      ]));
    });

    it('should reject unknown keys', () => {
      expect(() => manager.validateConfig({ pollEvery: 10 })).toThrow(ConfigValidationError);
    });

    it('should reject duplicate accounts and channel names', () => {
      const document = {
        accounts: [
          { institutionCode: '12345', username: 's1', password: 'a' },
          { institutionCode: '12345', username: 's1', password: 'b' },
        ],
        channels: [{ name: 'team', type: 'console' }, { name: 'team', type: 'webhook' }],
      };

      expect(() => validateAppConfig(document, 'memory:config')).toThrow(
        'ConfigValidation: memory:config:\n' +
        '  /accounts/1: duplicate account 12345:s1\n' +
        '  /channels/1/name: duplicate channel name team'
      );
    });

    it('should reject a backoff cap below the base delay', () => {
      expect(() => validateAppConfig({ scheduler: { baseBackoffMs: 10, maxBackoffMs: 5 } }, 'x')).toThrow(
        '/scheduler/maxBackoffMs: must be >= baseBackoffMs (10)'
      );
    });

    it('should accept an empty index URL and reject a malformed one', () => {
      expect(() => validateAppConfig({ plugins: { indexUrl: '' } }, 'x')).not.toThrow();
      expect(() => validateAppConfig({ plugins: { indexUrl: 'not a url' } }, 'x')).toThrow(ConfigValidationError);
    });

    it('should reject a malformed semester date', () => {
      expect(() => validateAppConfig({ semester: { firstMonday: '23/02/2026' } }, 'x')).toThrow(ConfigValidationError);
    });
  });

  // ─────────────────────────────────────────────────────────
  // init
  // ─────────────────────────────────────────────────────────

  describe('initConfig', () => {
    it('should write a starter document that validates', async () => {
      const location = await manager.initConfig();

      expect(location).toBe('memory:config');
      const config = await manager.loadConfig();
      expect(config.channels).toEqual([{ name: 'console', type: 'console', enabled: true, parameters: {} }]);
      expect(config.accounts).toEqual([]);
    });

    it('should refuse to overwrite without force', async () => {
      store.setConfig(validDocument());

      await expect(manager.initConfig()).rejects.toThrow(ConfigError);
      await expect(manager.initConfig({ force: true })).resolves.toBe('memory:config');
      expect(store.getConfig()).toMatchObject({ accounts: [] });
    });
  });

  describe('helpers', () => {
    it('should expand the home directory', () => {
      expect(expandHome('~', HOME)).toBe(HOME);
      expect(expandHome('~/data', HOME)).toBe(path.join(HOME, 'data'));
      expect(expandHome('/abs/data', HOME)).toBe('/abs/data');
      expect(expandHome('rel', HOME, '/work')).toBe(path.resolve('/work', 'rel'));
    });

    it('should resolve disabled targets and accounts', () => {
      const config = resolveConfig({
        accounts: [{ institutionCode: '1', username: 'u', password: 'p', enabled: false, schedule: { enabled: false } }],
      }, HOME);

      expect(config.accounts[0]).toMatchObject({ enabled: false, schedule: { enabled: false, intervalSeconds: 3600 } });
    });
  });
});
