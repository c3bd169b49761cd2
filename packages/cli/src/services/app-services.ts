import * as os from 'os';
import * as path from 'path';
import {
  ChangeDetector,
  Config,
  EventBus,
  Logger,
  NotificationDispatcher,
  Orchestrator,
  PluginRegistry,
  PollingScheduler,
  StateStore,
} from '@gradewatch/core';
import { FsPluginRegistry, createConfigManager, createFsStateStore } from '@gradewatch/core/fs';

export const PLUGINS_DIR = 'plugins';
export const STATE_DIR = 'state';

export type AppServicesOptions = {
  /** Explicit config file; falls back to $GRADEWATCH_CONFIG, then ~/.gradewatch/config.yaml */
  configPath?: string;
  homeDir?: string;
  fetch?: typeof fetch;
};

/**
 * What commands see of the container.
 */
export interface IAppServices {
  getConfigManager(): Config.IConfigManager;
  getConfig(): Promise<Config.AppConfig>;
  getLogger(): Promise<Logger.Logger>;
  getPluginRegistry(): Promise<PluginRegistry.PluginRegistry>;
  getStateStore(): Promise<StateStore.StateStore>;
  getOrchestrator(): Promise<Orchestrator.Orchestrator>;
}

/**
 * AppServices - the CLI's composition root
 *
 * Built once in index.ts. Every service is created on first use and
 * shared afterwards, so commands that never touch the configuration
 * (`config init`) work without one.
 */
export class AppServices implements IAppServices {
  private configPath: string | undefined;
  private readonly homeDir: string;
  private readonly fetchImpl: typeof fetch;

  private configManager: Config.ConfigManager | null = null;
  private config: Config.AppConfig | null = null;
  private logger: Logger.Logger | null = null;
  private eventBus: EventBus.EventBus | null = null;
  private pluginRegistry: FsPluginRegistry | null = null;
  private stateStore: StateStore.StateStore | null = null;
  private orchestrator: Orchestrator.Orchestrator | null = null;

  constructor(options: AppServicesOptions = {}) {
    this.configPath = options.configPath;
    this.homeDir = options.homeDir ?? os.homedir();
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Applies the global `--config` option; must run before any service is created */
  setConfigPath(configPath: string | undefined): void {
    if (configPath === this.configPath) {
      return;
    }
    if (this.configManager) {
      throw new Error('Configuration already loaded; --config must be given before any command runs');
    }
    this.configPath = configPath;
  }

  getConfigManager(): Config.ConfigManager {
    if (!this.configManager) {
      this.configManager = createConfigManager(this.configPath, { homeDir: this.homeDir });
    }
    return this.configManager;
  }

  async getConfig(): Promise<Config.AppConfig> {
    if (!this.config) {
      this.config = await this.getConfigManager().loadConfig();
    }
    return this.config;
  }

  async getLogger(): Promise<Logger.Logger> {
    if (!this.logger) {
      const config = await this.getConfig();
      this.logger = Logger.createLogger('', config.logging.level);
    }
    return this.logger;
  }

  async getEventBus(): Promise<EventBus.EventBus> {
    if (!this.eventBus) {
      const logger = await this.getLogger();
      this.eventBus = new EventBus.EventBus({ logger: logger.child('[events] ') });
    }
    return this.eventBus;
  }

  async getPluginRegistry(): Promise<FsPluginRegistry> {
    if (!this.pluginRegistry) {
      const config = await this.getConfig();
      const logger = await this.getLogger();
      this.pluginRegistry = new FsPluginRegistry({
        pluginsDir: path.join(config.dataDir, PLUGINS_DIR),
        indexUrl: config.plugins.indexUrl,
        mirrorPrefix: config.plugins.mirrorPrefix,
        requestTimeoutMs: config.plugins.requestTimeoutMs,
        fetch: this.fetchImpl,
        logger: logger.child('[plugins] '),
        eventBus: await this.getEventBus(),
      });
    }
    return this.pluginRegistry;
  }

  async getStateStore(): Promise<StateStore.StateStore> {
    if (!this.stateStore) {
      const config = await this.getConfig();
      const logger = await this.getLogger();
      this.stateStore = createFsStateStore(path.join(config.dataDir, STATE_DIR), logger.child('[state] '));
    }
    return this.stateStore;
  }

  async getOrchestrator(): Promise<Orchestrator.Orchestrator> {
    if (this.orchestrator) {
      return this.orchestrator;
    }

    const config = await this.getConfig();
    const logger = await this.getLogger();
    const eventBus = await this.getEventBus();

    const dispatcher = new NotificationDispatcher.NotificationDispatcher({
      logger: logger.child('[dispatch] '),
      eventBus,
      timeoutMs: config.dispatch.timeoutMs,
    });
    new NotificationDispatcher.ChannelFactoryRegistry({ logger, fetch: this.fetchImpl })
      .populate(dispatcher, config.channels);

    const scheduler = new PollingScheduler.PollingScheduler({
      logger: logger.child('[scheduler] '),
      eventBus,
      maxRetries: config.scheduler.maxRetries,
      baseBackoffMs: config.scheduler.baseBackoffMs,
      maxBackoffMs: config.scheduler.maxBackoffMs,
      maxPhaseTimeoutMs: config.scheduler.maxPhaseTimeoutMs,
    });

    this.orchestrator = new Orchestrator.Orchestrator({
      config,
      logger,
      eventBus,
      registry: await this.getPluginRegistry(),
      stateStore: await this.getStateStore(),
      dispatcher,
      scheduler,
      changeDetector: new ChangeDetector.ChangeDetector({ logger: logger.child('[diff] ') }),
    });
    return this.orchestrator;
  }
}
