/**
 * ConfigManager - Application Configuration Manager
 *
 * Loads the configuration document through a ConfigStore, validates it
 * against AppConfigInputSchema and applies defaults. Core modules only
 * ever see the resulting AppConfig.
 */

import * as os from "os";
import * as path from "path";
import type { ConfigStore } from "../config_store/config_store";
import { SchemaValidationCache, formatSchemaErrors } from "../schemas/schema_cache";
import { accountKeyOf } from "../records/records.types";
import { AppConfigInputSchema } from "./config_manager.schemas";
import { ConfigError, ConfigNotFoundError, ConfigValidationError } from "./config_manager.errors";
import type {
  AccountConfig,
  AccountConfigInput,
  AppConfig,
  AppConfigInput,
  IConfigManager,
  TargetConfig,
} from "./config_manager.types";

export const DEFAULT_DATA_DIR = "~/.gradewatch";
export const DEFAULT_INTERVAL_SECONDS = 3600;

export const DEFAULT_CONFIG: Omit<AppConfig, "dataDir" | "accounts" | "channels"> = {
  logging: { level: "info" },
  plugins: { indexUrl: "", mirrorPrefix: "", autoUpdate: false, requestTimeoutMs: 30_000 },
  scheduler: { maxRetries: 3, baseBackoffMs: 5_000, maxBackoffMs: 300_000, maxPhaseTimeoutMs: 120_000, jitterMs: 30_000 },
  dispatch: { timeoutMs: 10_000, sendFullReport: false },
  semester: { totalWeeks: 20 },
};

/** Expands a leading `~` and resolves relative paths against `baseDir` */
export function expandHome(value: string, homeDir: string = os.homedir(), baseDir: string = process.cwd()): string {
  if (value === "~") {
    return homeDir;
  }
  if (value.startsWith("~/") || value.startsWith("~\\")) {
    return path.join(homeDir, value.slice(2));
  }
  return path.resolve(baseDir, value);
}

function resolveTarget(input: Partial<TargetConfig> | undefined): TargetConfig {
  return {
    enabled: input?.enabled ?? true,
    intervalSeconds: input?.intervalSeconds ?? DEFAULT_INTERVAL_SECONDS,
  };
}

function resolveAccount(input: AccountConfigInput): AccountConfig {
  return {
    institutionCode: input.institutionCode,
    username: input.username,
    password: input.password,
    enabled: input.enabled ?? true,
    grades: resolveTarget(input.grades),
    schedule: resolveTarget(input.schedule),
  };
}

/** Applies defaults to a schema-valid document */
export function resolveConfig(input: AppConfigInput, homeDir?: string): AppConfig {
  const semester = { ...DEFAULT_CONFIG.semester, ...input.semester };
  return {
    logging: { level: input.logging?.level ?? DEFAULT_CONFIG.logging.level },
    dataDir: expandHome(input.dataDir ?? DEFAULT_DATA_DIR, homeDir),
    plugins: { ...DEFAULT_CONFIG.plugins, ...input.plugins },
    scheduler: { ...DEFAULT_CONFIG.scheduler, ...input.scheduler },
    dispatch: { ...DEFAULT_CONFIG.dispatch, ...input.dispatch },
    semester,
    accounts: (input.accounts ?? []).map(resolveAccount),
    channels: (input.channels ?? []).map((channel) => ({
      name: channel.name,
      type: channel.type,
      enabled: channel.enabled ?? true,
      parameters: { ...channel.parameters },
    })),
  };
}

/** Checks the schema cannot express: uniqueness and cross-field bounds */
function consistencyErrors(input: AppConfigInput): string[] {
  const errors: string[] = [];
  const accountKeys = new Set<string>();
  (input.accounts ?? []).forEach((account, index) => {
    const key = accountKeyOf(account.institutionCode, account.username);
    if (accountKeys.has(key)) {
      errors.push(`/accounts/${index}: duplicate account ${key}`);
    }
    accountKeys.add(key);
  });
  const channelNames = new Set<string>();
  (input.channels ?? []).forEach((channel, index) => {
    if (channelNames.has(channel.name)) {
      errors.push(`/channels/${index}/name: duplicate channel name ${channel.name}`);
    }
    channelNames.add(channel.name);
  });
  const base = input.scheduler?.baseBackoffMs ?? DEFAULT_CONFIG.scheduler.baseBackoffMs;
  const max = input.scheduler?.maxBackoffMs ?? DEFAULT_CONFIG.scheduler.maxBackoffMs;
  if (max < base) {
    errors.push(`/scheduler/maxBackoffMs: must be >= baseBackoffMs (${base})`);
  }
  return errors;
}

/**
 * Validates a parsed document and applies defaults.
 * @throws ConfigValidationError listing every violation
 */
export function validateAppConfig(raw: unknown, source: string, homeDir?: string): AppConfig {
  const validator = SchemaValidationCache.getValidatorFromSchema<AppConfigInput>(AppConfigInputSchema);
  if (!validator(raw)) {
    throw new ConfigValidationError(source, formatSchemaErrors(validator.errors));
  }
  const errors = consistencyErrors(raw);
  if (errors.length > 0) {
    throw new ConfigValidationError(source, errors);
  }
  return resolveConfig(raw, homeDir);
}

/** Starter document written by `config init` */
export function defaultConfigTemplate(): AppConfigInput {
  return {
    logging: { level: "info" },
    dataDir: DEFAULT_DATA_DIR,
    plugins: { indexUrl: "", mirrorPrefix: "", autoUpdate: false },
    scheduler: { ...DEFAULT_CONFIG.scheduler },
    dispatch: { ...DEFAULT_CONFIG.dispatch },
    semester: { totalWeeks: DEFAULT_CONFIG.semester.totalWeeks },
    accounts: [],
    channels: [{ name: "console", type: "console", enabled: true, parameters: {} }],
  };
}

export type ConfigManagerOptions = {
  /** Home directory used to expand `~`; defaults to the OS home */
  homeDir?: string;
};

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * const manager = new ConfigManager(new FsConfigStore("/etc/gradewatch/config.yaml"));
 * const config = await manager.loadConfig();
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private readonly homeDir: string | undefined;

  constructor(configStore: ConfigStore, options: ConfigManagerOptions = {}) {
    this.configStore = configStore;
    this.homeDir = options.homeDir;
  }

  /**
   * Loads, validates and resolves the configuration.
   * @throws ConfigNotFoundError when the store holds no document
   * @throws ConfigValidationError on schema violations
   */
  async loadConfig(): Promise<AppConfig> {
    const raw = await this.configStore.loadConfig();
    if (raw === null) {
      throw new ConfigNotFoundError(this.describeSource());
    }
    return this.validateConfig(raw);
  }

  validateConfig(raw: unknown): AppConfig {
    return validateAppConfig(raw, this.describeSource(), this.homeDir);
  }

  /**
   * Writes the starter document. Refuses to overwrite an existing one
   * unless `force` is set. Returns the store location.
   */
  async initConfig(options: { force?: boolean } = {}): Promise<string> {
    const existing = await this.configStore.loadConfig().catch((error: unknown) => {
      if (options.force) {
        return null;
      }
      throw error;
    });
    if (existing !== null && !options.force) {
      throw new ConfigError(`${this.describeSource()} already exists; use --force to overwrite`);
    }
    await this.configStore.saveConfig(defaultConfigTemplate());
    return this.describeSource();
  }

  describeSource(): string {
    return this.configStore.describe();
  }
}
