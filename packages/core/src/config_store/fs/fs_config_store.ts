/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads and writes `config.yaml` / `config.yml` (js-yaml) or `config.json`,
 * chosen by extension.
 */

import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import * as yaml from "js-yaml";
import type { ConfigStore } from "../config_store";
import type { AppConfigInput } from "../../config_manager/config_manager.types";
import { ConfigManager } from "../../config_manager/config_manager";
import type { ConfigManagerOptions } from "../../config_manager/config_manager";
import { ConfigParseError } from "../../config_manager/config_manager.errors";
import { writeFileAtomic } from "../../store/fs/fs_store";
import { isErrnoCode } from "../../utils/fs_errors";
import { errorMessage } from "../../utils/error_message";

export const CONFIG_ENV_VAR = "GRADEWATCH_CONFIG";
export const DEFAULT_CONFIG_FILE = "config.yaml";

type ConfigFormat = "yaml" | "json";

function formatOf(configPath: string): ConfigFormat {
  return path.extname(configPath).toLowerCase() === ".json" ? "json" : "yaml";
}

/**
 * Filesystem-based ConfigStore.
 * A missing file reads as null; an unparsable one throws ConfigParseError.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore(FsConfigStore.resolveConfigPath());
 * const raw = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;
  private readonly format: ConfigFormat;

  constructor(configPath: string) {
    this.configPath = path.resolve(configPath);
    this.format = formatOf(this.configPath);
  }

  async loadConfig(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, "utf-8");
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        return null;
      }
      throw error;
    }

    try {
      const parsed: unknown = this.format === "json" ? JSON.parse(content) : yaml.load(content);
      // An empty YAML file is an empty document, not a missing one
      return parsed ?? {};
    } catch (error) {
      throw new ConfigParseError(this.configPath, errorMessage(error));
    }
  }

  async saveConfig(config: AppConfigInput): Promise<void> {
    const content = this.format === "json"
      ? `${JSON.stringify(config, null, 2)}\n`
      : yaml.dump(config, { lineWidth: 120, noRefs: true });
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await writeFileAtomic(this.configPath, content);
  }

  describe(): string {
    return this.configPath;
  }

  // ==================== Static Utility Methods ====================

  /**
   * Config file location: explicit path, then $GRADEWATCH_CONFIG, then
   * `~/.gradewatch/config.yaml`.
   */
  static resolveConfigPath(
    explicitPath?: string,
    env: NodeJS.ProcessEnv = process.env,
    homeDir: string = os.homedir()
  ): string {
    const chosen = explicitPath || env[CONFIG_ENV_VAR];
    if (chosen) {
      return path.resolve(chosen);
    }
    return path.join(homeDir, ".gradewatch", DEFAULT_CONFIG_FILE);
  }
}

/**
 * Create a ConfigManager backed by the config file at `configPath`
 * (resolved through FsConfigStore.resolveConfigPath when omitted).
 */
export function createConfigManager(configPath?: string, options: ConfigManagerOptions = {}): ConfigManager {
  const store = new FsConfigStore(FsConfigStore.resolveConfigPath(configPath));
  return new ConfigManager(store, options);
}
