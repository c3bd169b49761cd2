/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from "../config_store";
import type { AppConfigInput } from "../../config_manager/config_manager.types";

/**
 * In-memory ConfigStore for tests. Documents are held as given,
 * so invalid documents can be set to exercise validation.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ accounts: [{ institutionCode: "demo", username: "alice", password: "test-password" }] });
 * const config = await new ConfigManager(configStore).loadConfig();
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: unknown = null;

  async loadConfig(): Promise<unknown> {
    return this.config === null ? null : structuredClone(this.config);
  }

  async saveConfig(config: AppConfigInput): Promise<void> {
    this.config = structuredClone(config);
  }

  describe(): string {
    return "memory:config";
  }

  // ==================== Test Helper Methods ====================

  setConfig(config: unknown): void {
    this.config = config;
  }

  getConfig(): unknown {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
