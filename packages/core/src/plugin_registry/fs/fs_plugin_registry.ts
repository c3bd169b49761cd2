import * as fs from "fs/promises";
import type { Dirent } from "fs";
import * as path from "path";
import { randomBytes } from "crypto";

import { FsStore } from "../../store/fs/fs_store";
import { SchemaValidationCache } from "../../schemas/schema_cache";
import { digestsEqual, sha256Hex } from "../../crypto/checksum";
import { silentLogger } from "../../logger";
import type { Logger } from "../../logger";
import type { IEventStream, PluginInstallFailureReason } from "../../event_bus";
import { loadAdapterBundle, validateAdapter, LoadError } from "../../school_adapter";
import type { AdapterContext, AdapterMetadata, ValidatedAdapter } from "../../school_adapter";
import { errorMessage } from "../../utils/error_message";
import { isErrnoCode } from "../../utils/fs_errors";
import {
  IndexUnavailableError,
  IntegrityError,
  InvalidInstitutionCodeError,
  PluginDownloadError,
  PluginNotFoundError,
  isIntegrityError,
  isPluginNotFoundError,
} from "../plugin_registry.errors";
import { InstallManifestSchema, INSTITUTION_CODE_PATTERN, PluginIndexCacheSchema } from "../plugin_registry.schemas";
import { fetchWithMirror, parsePluginIndex } from "../plugin_index";
import type { RemoteFetchOptions } from "../plugin_index";
import { isNewerVersion } from "../version";
import type {
  AdapterDescriptor,
  FsPluginRegistryOptions,
  InstallManifest,
  InstalledAdapter,
  ListAvailableOptions,
  PluginRegistry,
  ResolvedAdapter,
  UpdateInfo,
} from "../plugin_registry.types";

export const INDEX_CACHE_ID = "plugins_index";
export const BUNDLE_FILE = "adapter.js";
export const MANIFEST_ID = "manifest";

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const codePattern = new RegExp(INSTITUTION_CODE_PATTERN);

type PluginIndexCache = Record<string, AdapterDescriptor>;

function isPluginIndexCache(value: unknown): value is PluginIndexCache {
  return SchemaValidationCache.getValidatorFromSchema<PluginIndexCache>(PluginIndexCacheSchema)(value);
}

function isInstallManifest(value: unknown): value is InstallManifest {
  return SchemaValidationCache.getValidatorFromSchema<InstallManifest>(InstallManifestSchema)(value);
}

function assertInstitutionCode(code: string): void {
  if (!codePattern.test(code)) {
    throw new InvalidInstitutionCodeError(code);
  }
}

function byCode(a: { institutionCode: string }, b: { institutionCode: string }): number {
  return a.institutionCode < b.institutionCode ? -1 : a.institutionCode > b.institutionCode ? 1 : 0;
}

function failureReason(error: unknown): PluginInstallFailureReason {
  if (isPluginNotFoundError(error)) return "not_found";
  if (isIntegrityError(error)) return "integrity";
  if (error instanceof LoadError) return "load";
  if (error instanceof PluginDownloadError) return "download";
  return "io";
}

/**
 * Filesystem plugin registry.
 *
 * Layout under `pluginsDir`:
 * - `plugins_index.json`: cached index, code → descriptor
 * - `<code>/adapter.js` + `<code>/manifest.json`: one installed adapter
 * - `.staging-*` / `.backup-*`: transient directories used while swapping
 *
 * Installs of the same code run one after another; different codes do not
 * wait for each other.
 */
export class FsPluginRegistry implements PluginRegistry {
  private readonly pluginsDir: string;
  private readonly indexUrl: string;
  private readonly remote: RemoteFetchOptions;
  private readonly adapterContext: (code: string) => AdapterContext;
  private readonly logger: Logger;
  private readonly eventBus: IEventStream | undefined;
  private readonly now: () => Date;
  private readonly indexCache: FsStore<PluginIndexCache>;

  private readonly builtins = new Map<string, ValidatedAdapter>();
  private readonly loaded = new Map<string, ValidatedAdapter>();
  private readonly installLocks = new Map<string, Promise<void>>();

  constructor(options: FsPluginRegistryOptions) {
    this.pluginsDir = options.pluginsDir;
    this.indexUrl = options.indexUrl;
    this.logger = options.logger ?? silentLogger;
    this.eventBus = options.eventBus;
    this.now = options.now ?? (() => new Date());

    const fetchImpl = options.fetch ?? fetch;
    this.remote = {
      fetch: fetchImpl,
      timeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      logger: this.logger,
      ...(options.mirrorPrefix ? { mirrorPrefix: options.mirrorPrefix } : {}),
    };
    this.adapterContext = options.adapterContext ?? ((code) => ({
      fetch: fetchImpl,
      logger: this.logger.child(`[${code}] `),
      setTimeout,
      clearTimeout,
    }));

    this.indexCache = new FsStore<PluginIndexCache>({
      basePath: this.pluginsDir,
      guard: isPluginIndexCache,
      onInvalid: (id, cause) => this.logger.warn(`Ignoring unreadable plugin index cache ${id}.json: ${errorMessage(cause)}`),
    });
  }

  // ─────────────────────────────────────────────────────────
  // Discovery
  // ─────────────────────────────────────────────────────────

  async refreshIndex(): Promise<AdapterDescriptor[]> {
    if (!this.indexUrl) {
      throw new IndexUnavailableError("(unset)", "no plugin index URL configured");
    }
    let body: Buffer;
    try {
      body = await fetchWithMirror(this.indexUrl, this.remote);
    } catch (error) {
      throw new IndexUnavailableError(this.indexUrl, errorMessage(error));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(body.toString("utf8"));
    } catch (error) {
      throw new IndexUnavailableError(this.indexUrl, `malformed index: ${errorMessage(error)}`);
    }

    const remote = parsePluginIndex(raw, this.logger);
    const merged: PluginIndexCache = { ...(await this.readIndexCache()) };
    for (const descriptor of remote) {
      merged[descriptor.institutionCode] = descriptor;
    }
    await this.indexCache.put(INDEX_CACHE_ID, merged);
    this.logger.debug(`Plugin index refreshed: ${remote.length} entries`);

    return Object.values(merged).sort(byCode);
  }

  async listAvailable(options: ListAvailableOptions = {}): Promise<AdapterDescriptor[]> {
    const refresh = options.refresh ?? true;
    const byInstitution = new Map<string, AdapterDescriptor>();

    let listed: AdapterDescriptor[] | null = null;
    if (refresh) {
      try {
        listed = await this.refreshIndex();
      } catch (error) {
        this.logger.warn(`Using cached plugin index: ${errorMessage(error)}`);
      }
    }
    for (const descriptor of listed ?? Object.values(await this.readIndexCache())) {
      byInstitution.set(descriptor.institutionCode, descriptor);
    }

    for (const installed of await this.installed()) {
      const code = installed.descriptor.institutionCode;
      const listedDescriptor = byInstitution.get(code);
      if (listedDescriptor) {
        byInstitution.set(code, { ...listedDescriptor, localPath: installed.path });
      } else {
        byInstitution.set(code, { ...installed.descriptor, localPath: installed.path });
      }
    }

    return Array.from(byInstitution.values()).sort(byCode);
  }

  async installed(): Promise<InstalledAdapter[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.pluginsDir, { withFileTypes: true });
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        return [];
      }
      throw error;
    }

    const result: InstalledAdapter[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory() || entry.name.startsWith(".") || !codePattern.test(entry.name)) {
        continue;
      }
      const manifest = await this.readManifest(entry.name);
      if (manifest) {
        result.push({ ...manifest, path: this.installDir(entry.name) });
      }
    }
    return result.sort((a, b) => byCode(a.descriptor, b.descriptor));
  }

  async checkUpdates(): Promise<UpdateInfo[]> {
    const installed = await this.installed();
    if (installed.length === 0) {
      return [];
    }

    const available = new Map((await this.listAvailable()).map((d) => [d.institutionCode, d]));
    const updates: UpdateInfo[] = [];
    for (const { descriptor } of installed) {
      const candidate = available.get(descriptor.institutionCode);
      if (candidate && isNewerVersion(candidate.version, descriptor.version)) {
        updates.push({
          institutionCode: descriptor.institutionCode,
          displayName: candidate.displayName,
          installedVersion: descriptor.version,
          availableVersion: candidate.version,
        });
      }
    }
    return updates;
  }

  // ─────────────────────────────────────────────────────────
  // Installation
  // ─────────────────────────────────────────────────────────

  async install(code: string): Promise<AdapterDescriptor> {
    assertInstitutionCode(code);
    return this.withInstallLock(code, async () => {
      const descriptor = await this.lookupDescriptor(code);
      return this.performInstall(descriptor);
    });
  }

  async updateIfNewer(code: string): Promise<boolean> {
    assertInstitutionCode(code);
    return this.withInstallLock(code, async () => {
      const manifest = await this.readManifest(code);
      if (!manifest) {
        throw new PluginNotFoundError(code, "not installed");
      }

      const candidate = await this.lookupDescriptor(code);
      if (!isNewerVersion(candidate.version, manifest.descriptor.version)) {
        this.logger.debug(`${code} is up to date (${manifest.descriptor.version})`);
        return false;
      }

      await this.performInstall(candidate);
      return true;
    });
  }

  async uninstall(code: string): Promise<boolean> {
    assertInstitutionCode(code);
    return this.withInstallLock(code, async () => {
      this.loaded.delete(code);
      const dir = this.installDir(code);
      try {
        await fs.access(dir);
      } catch (error) {
        if (isErrnoCode(error, "ENOENT")) {
          return false;
        }
        throw error;
      }
      await fs.rm(dir, { recursive: true, force: true });
      this.logger.info(`Uninstalled adapter ${code}`);
      return true;
    });
  }

  private async lookupDescriptor(code: string): Promise<AdapterDescriptor> {
    const available = await this.listAvailable();
    const descriptor = available.find((d) => d.institutionCode === code);
    if (!descriptor) {
      const error = new PluginNotFoundError(code, "not listed in the plugin index");
      this.publishFailure(code, error);
      throw error;
    }
    return descriptor;
  }

  private async performInstall(descriptor: AdapterDescriptor): Promise<AdapterDescriptor> {
    const code = descriptor.institutionCode;
    const stagingDir = path.join(this.pluginsDir, `.staging-${code}-${randomBytes(4).toString("hex")}`);

    try {
      let artifact: Buffer;
      try {
        artifact = await fetchWithMirror(descriptor.downloadUrl, this.remote);
      } catch (error) {
        throw new PluginDownloadError(descriptor.downloadUrl, errorMessage(error));
      }

      const digest = sha256Hex(artifact);
      if (!digestsEqual(digest, descriptor.contentHash)) {
        throw new IntegrityError(code, descriptor.contentHash.toLowerCase(), digest);
      }

      const validated = loadAdapterBundle(artifact.toString("utf8"), {
        filename: path.join(this.installDir(code), BUNDLE_FILE),
        context: this.adapterContext(code),
      });
      const bundleVersion = validated.metadata.pluginVersion;
      if (bundleVersion !== undefined && bundleVersion !== descriptor.version) {
        this.logger.warn(`${code}: bundle declares version ${bundleVersion}, index says ${descriptor.version}`);
      }

      const installed: AdapterDescriptor = { ...descriptor, localPath: this.installDir(code) };
      await fs.mkdir(stagingDir, { recursive: true });
      await fs.writeFile(path.join(stagingDir, BUNDLE_FILE), artifact);
      await this.manifestStore(stagingDir).put(MANIFEST_ID, {
        descriptor: installed,
        installedAt: this.now().toISOString(),
      });

      const previous = await this.readManifest(code);
      await this.swapIntoPlace(code, stagingDir);
      this.loaded.set(code, validated);

      if (previous) {
        this.logger.info(`Updated adapter ${code}: ${previous.descriptor.version} -> ${descriptor.version}`);
        this.eventBus?.publish({
          type: "plugin.updated",
          timestamp: Date.now(),
          source: "plugin_registry",
          payload: { institutionCode: code, previousVersion: previous.descriptor.version, version: descriptor.version },
        });
      } else {
        this.logger.info(`Installed adapter ${code} (${descriptor.version})`);
        this.eventBus?.publish({
          type: "plugin.installed",
          timestamp: Date.now(),
          source: "plugin_registry",
          payload: { institutionCode: code, version: descriptor.version },
        });
      }
      return installed;
    } catch (error) {
      this.publishFailure(code, error);
      throw error;
    } finally {
      await fs.rm(stagingDir, { recursive: true, force: true });
    }
  }

  /**
   * Moves the staged directory to `<code>/`. An existing install is renamed
   * aside first and restored if the swap fails.
   */
  private async swapIntoPlace(code: string, stagingDir: string): Promise<void> {
    const target = this.installDir(code);
    const backup = path.join(this.pluginsDir, `.backup-${code}-${randomBytes(4).toString("hex")}`);

    let hasBackup = false;
    try {
      await fs.rename(target, backup);
      hasBackup = true;
    } catch (error) {
      if (!isErrnoCode(error, "ENOENT")) {
        throw error;
      }
    }

    try {
      await fs.rename(stagingDir, target);
    } catch (error) {
      if (hasBackup) {
        await fs.rename(backup, target);
      }
      throw error;
    }

    if (hasBackup) {
      await fs.rm(backup, { recursive: true, force: true });
    }
  }

  private async withInstallLock<T>(code: string, task: () => Promise<T>): Promise<T> {
    const previous = this.installLocks.get(code) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.installLocks.set(code, settled);
    try {
      return await run;
    } finally {
      if (this.installLocks.get(code) === settled) {
        this.installLocks.delete(code);
      }
    }
  }

  private publishFailure(code: string, error: unknown): void {
    this.logger.error(`Install of ${code} failed: ${errorMessage(error)}`);
    this.eventBus?.publish({
      type: "plugin.install_failed",
      timestamp: Date.now(),
      source: "plugin_registry",
      payload: { institutionCode: code, reason: failureReason(error), error: errorMessage(error) },
    });
  }

  // ─────────────────────────────────────────────────────────
  // Resolution
  // ─────────────────────────────────────────────────────────

  registerBuiltin(code: string, adapter: unknown, metadata: AdapterMetadata = {}): void {
    assertInstitutionCode(code);
    const validated = validateAdapter(adapter, `builtin:${code}`);
    this.builtins.set(code, { adapter: validated.adapter, metadata: { ...validated.metadata, ...metadata } });
  }

  async resolve(code: string): Promise<ResolvedAdapter> {
    const builtin = this.builtins.get(code);
    if (builtin) {
      return { institutionCode: code, ...builtin, source: "builtin" };
    }

    assertInstitutionCode(code);
    const cached = this.loaded.get(code);
    if (cached) {
      return { institutionCode: code, ...cached, source: "installed" };
    }

    const manifest = await this.readManifest(code);
    if (!manifest) {
      throw new PluginNotFoundError(code, "not installed");
    }

    const bundlePath = path.join(this.installDir(code), BUNDLE_FILE);
    let artifact: Buffer;
    try {
      artifact = await fs.readFile(bundlePath);
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        throw new PluginNotFoundError(code, `${BUNDLE_FILE} is missing`);
      }
      throw error;
    }

    const digest = sha256Hex(artifact);
    if (!digestsEqual(digest, manifest.descriptor.contentHash)) {
      throw new IntegrityError(code, manifest.descriptor.contentHash.toLowerCase(), digest);
    }

    const validated = loadAdapterBundle(artifact.toString("utf8"), {
      filename: bundlePath,
      context: this.adapterContext(code),
    });
    this.loaded.set(code, validated);
    return { institutionCode: code, ...validated, source: "installed" };
  }

  // ─────────────────────────────────────────────────────────
  // Storage helpers
  // ─────────────────────────────────────────────────────────

  private installDir(code: string): string {
    return path.join(this.pluginsDir, code);
  }

  private manifestStore(dir: string): FsStore<InstallManifest> {
    return new FsStore<InstallManifest>({
      basePath: dir,
      guard: isInstallManifest,
      onInvalid: (id, cause) => this.logger.warn(`Ignoring unreadable ${path.join(dir, id)}.json: ${errorMessage(cause)}`),
    });
  }

  private async readManifest(code: string): Promise<InstallManifest | null> {
    return this.manifestStore(this.installDir(code)).get(MANIFEST_ID);
  }

  private async readIndexCache(): Promise<PluginIndexCache> {
    return (await this.indexCache.get(INDEX_CACHE_ID)) ?? {};
  }
}
