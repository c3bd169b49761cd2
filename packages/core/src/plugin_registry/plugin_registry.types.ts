import type { Logger } from "../logger";
import type { IEventStream } from "../event_bus";
import type { AdapterContext, AdapterMetadata, SchoolAdapter } from "../school_adapter";

/**
 * One adapter as advertised by the plugin index.
 */
export type AdapterDescriptor = {
  /** Unique key; also the install directory name */
  institutionCode: string;
  displayName: string;
  version: string;
  downloadUrl: string;
  /** Hex SHA-256 of the artifact at `downloadUrl` */
  contentHash: string;
  /** Install directory, set once installed */
  localPath?: string;
  contributor?: string;
  description?: string;
};

/** Written next to an installed bundle */
export type InstallManifest = {
  descriptor: AdapterDescriptor;
  /** ISO 8601 */
  installedAt: string;
};

export type InstalledAdapter = InstallManifest & {
  path: string;
};

export type UpdateInfo = {
  institutionCode: string;
  displayName: string;
  installedVersion: string;
  availableVersion: string;
};

export type ResolvedAdapterSource = "builtin" | "installed";

export type ResolvedAdapter = {
  institutionCode: string;
  adapter: SchoolAdapter;
  metadata: AdapterMetadata;
  source: ResolvedAdapterSource;
};

export type ListAvailableOptions = {
  /** Fetch the remote index first (default: true) */
  refresh?: boolean;
};

/**
 * Discovers, verifies, installs and resolves school adapters.
 */
export interface PluginRegistry {
  /**
   * Cached index merged with the remote one (best effort) and with
   * installed adapters missing from both. Sorted by institution code.
   */
  listAvailable(options?: ListAvailableOptions): Promise<AdapterDescriptor[]>;

  /**
   * Fetches the remote index and rewrites the cache.
   * @throws IndexUnavailableError
   */
  refreshIndex(): Promise<AdapterDescriptor[]>;

  /**
   * Downloads, verifies and installs the adapter for `code`.
   * @throws PluginNotFoundError | IntegrityError | LoadError | PluginDownloadError
   */
  install(code: string): Promise<AdapterDescriptor>;

  /**
   * Re-installs when the index has a strictly newer version.
   * @throws PluginNotFoundError when `code` is not installed
   */
  updateIfNewer(code: string): Promise<boolean>;

  checkUpdates(): Promise<UpdateInfo[]>;

  /**
   * Built-ins first, then installed bundles.
   * @throws PluginNotFoundError | LoadError | IntegrityError
   */
  resolve(code: string): Promise<ResolvedAdapter>;

  /**
   * @throws LoadError when `adapter` lacks the capability set
   */
  registerBuiltin(code: string, adapter: unknown, metadata?: AdapterMetadata): void;

  uninstall(code: string): Promise<boolean>;

  installed(): Promise<InstalledAdapter[]>;
}

export type FsPluginRegistryOptions = {
  /** Holds `plugins_index.json` and one directory per installed code */
  pluginsDir: string;
  indexUrl: string;
  /** Retried prefix when a direct download fails, e.g. a proxy host */
  mirrorPrefix?: string;
  fetch?: typeof fetch;
  /** Per-request timeout for index and artifact downloads (default: 30000) */
  requestTimeoutMs?: number;
  /** Builds the globals a bundle sees; defaults to fetch, a child logger and timers */
  adapterContext?: (code: string) => AdapterContext;
  logger?: Logger;
  eventBus?: IEventStream;
  now?: () => Date;
};
