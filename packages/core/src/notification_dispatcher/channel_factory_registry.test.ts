import type { Logger } from '../logger';
import { ChannelFactoryRegistry } from './channel_factory_registry';
import { NotificationDispatcher } from './notification_dispatcher';
import { ChannelConfigError } from './notification_dispatcher.errors';
import type { ChannelConfig } from './notification_dispatcher.types';
import { buildWebhookPayload } from './channels/webhook_channel';

function createMockLogger(): jest.Mocked<Logger> {
  const logger: jest.Mocked<Logger> = {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    child: jest.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

function webhookConfig(overrides: Partial<ChannelConfig> = {}): ChannelConfig {
  return {
    name: 'team',
    type: 'webhook',
    enabled: true,
    parameters: { url: 'https://hooks.example.test/bot/test-token' },
    ...overrides,
  };
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('ChannelFactoryRegistry', () => {
  let logger: jest.Mocked<Logger>;
  let fetchMock: jest.MockedFunction<typeof fetch>;
  let registry: ChannelFactoryRegistry;

  beforeEach(() => {
    logger = createMockLogger();
    fetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    registry = new ChannelFactoryRegistry({ logger, fetch: fetchMock });
  });

  // ─────────────────────────────────────────────────────────
  // Factory lookup
  // ─────────────────────────────────────────────────────────

  describe('create', () => {
    it('should list the built-in channel types', () => {
      expect(registry.types()).toEqual(['console', 'webhook']);
    });

    it('should reject an unknown channel type as a config error', () => {
      expect(() => registry.create(webhookConfig({ type: 'pager' }))).toThrow(
        'ChannelConfig: team: unknown channel type "pager" (known: console, webhook)'
      );
    });

    it('should accept custom factories', async () => {
      registry.registerType('memory', () => ({ send: () => true }));

      const channel = registry.create(webhookConfig({ type: 'memory', parameters: {} }));

      expect(await channel.send('s', 'c')).toBe(true);
    });
  });

  describe('populate', () => {
    it('should register configured channels with their enabled flag', () => {
      const dispatcher = new NotificationDispatcher();

      registry.populate(dispatcher, [
        webhookConfig(),
        { name: 'local', type: 'console', enabled: false, parameters: {} },
      ]);

      expect(dispatcher.channels()).toEqual([
        { name: 'team', enabled: true },
        { name: 'local', enabled: false },
      ]);
    });

    it('should register nothing when one config is invalid', () => {
      const dispatcher = new NotificationDispatcher();

      expect(() => registry.populate(dispatcher, [webhookConfig(), webhookConfig({ name: 'other', type: 'pager' })]))
        .toThrow(ChannelConfigError);
      expect(dispatcher.channels()).toEqual([]);
    });

    it('should reject duplicate channel names', () => {
      expect(() => registry.populate(new NotificationDispatcher(), [webhookConfig(), webhookConfig()]))
        .toThrow('ChannelConfig: team: duplicate channel name');
    });
  });

  // ─────────────────────────────────────────────────────────
  // Webhook channel
  // ─────────────────────────────────────────────────────────

  describe('webhook channel', () => {
    it('should require a url parameter', () => {
      expect(() => registry.create(webhookConfig({ parameters: {} }))).toThrow(
        'ChannelConfig: team: webhook channel requires a url parameter'
      );
    });

    it('should post a text message joining subject and content', async () => {
      fetchMock.mockResolvedValue(jsonResponse(200, { code: 0, msg: 'success' }));
      const channel = registry.create(webhookConfig());

      const delivered = await channel.send('Grade update: 1 change(s)', 'Modified (1):');

      expect(delivered).toBe(true);
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe('https://hooks.example.test/bot/test-token');
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe(JSON.stringify({
        msg_type: 'text',
        content: { text: 'Grade update: 1 change(s)\n\nModified (1):' },
      }));
    });

    it('should accept a 2xx response without a code', async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 204 }));

      expect(await registry.create(webhookConfig()).send('s', 'c')).toBe(true);
    });

    it('should fail on a non-zero body code', async () => {
      fetchMock.mockResolvedValue(jsonResponse(200, { code: 19001, msg: 'param invalid' }));

      expect(await registry.create(webhookConfig()).send('s', 'c')).toBe(false);
      expect(logger.error).toHaveBeenCalledWith('Webhook rejected the message: param invalid');
    });

    it('should fail on a non-2xx status', async () => {
      fetchMock.mockResolvedValue(jsonResponse(500, {}));

      expect(await registry.create(webhookConfig()).send('s', 'c')).toBe(false);
      expect(logger.error).toHaveBeenCalledWith('Webhook responded with HTTP 500');
    });

    it('should build the payload shape', () => {
      expect(buildWebhookPayload('a', 'b')).toEqual({ msg_type: 'text', content: { text: 'a\n\nb' } });
    });
  });

  describe('console channel', () => {
    it('should log the message and report success', async () => {
      const channel = registry.create({ name: 'local', type: 'console', enabled: true, parameters: {} });

      expect(await channel.send('Subject', 'Body')).toBe(true);
      expect(logger.info).toHaveBeenCalledWith('Subject\n\nBody');
    });
  });
});
