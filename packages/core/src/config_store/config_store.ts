/**
 * ConfigStore Interface
 *
 * Abstraction over where the configuration document lives
 * (a YAML/JSON file, or memory for tests). Stores return the parsed
 * document unvalidated; ConfigManager owns validation and defaults.
 */

import type { AppConfigInput } from "../config_manager/config_manager.types";

export interface ConfigStore {
  /**
   * Parsed configuration document.
   * @returns the document, or null when none exists
   */
  loadConfig(): Promise<unknown>;

  saveConfig(config: AppConfigInput): Promise<void>;

  /** Human-readable location, used in error messages */
  describe(): string;
}
