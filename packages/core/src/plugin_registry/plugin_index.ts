import type { Logger } from "../logger";
import { SchemaValidationCache, formatSchemaErrors } from "../schemas/schema_cache";
import { errorMessage } from "../utils/error_message";
import { AdapterDescriptorSchema } from "./plugin_registry.schemas";
import type { AdapterDescriptor } from "./plugin_registry.types";

export type RemoteFetchOptions = {
  fetch: typeof fetch;
  mirrorPrefix?: string;
  timeoutMs: number;
  logger: Logger;
};

async function fetchOnce(url: string, options: RemoteFetchOptions): Promise<Buffer> {
  const response = await options.fetch(url, { signal: AbortSignal.timeout(options.timeoutMs) });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status}`);
  }
  return Buffer.from(await response.arrayBuffer());
}

/**
 * GETs `url`; when that fails and a mirror prefix is configured, retries
 * once as `mirrorPrefix + url`.
 */
export async function fetchWithMirror(url: string, options: RemoteFetchOptions): Promise<Buffer> {
  try {
    return await fetchOnce(url, options);
  } catch (directError) {
    if (!options.mirrorPrefix) {
      throw directError;
    }
    const mirrored = `${options.mirrorPrefix}${url}`;
    options.logger.info(`Direct request failed (${errorMessage(directError)}), retrying via mirror: ${mirrored}`);
    try {
      return await fetchOnce(mirrored, options);
    } catch (mirrorError) {
      throw new Error(`direct: ${errorMessage(directError)}; mirror: ${errorMessage(mirrorError)}`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickString(entry: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = entry[key];
    if (typeof value === "string" && value.trim() !== "") {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Maps one raw index entry onto a descriptor. Both camelCase fields and the
 * release-asset style (`school_code`, `plugin_version`, `sha256`,
 * `download_url`) are understood.
 */
function toCandidate(entry: Record<string, unknown>, fallbackCode?: string): Record<string, string> {
  const institutionCode = pickString(entry, "institutionCode", "school_code", "code") ?? fallbackCode;
  const fields: Record<string, string | undefined> = {
    institutionCode,
    displayName: pickString(entry, "displayName", "school_name", "name") ?? institutionCode,
    version: pickString(entry, "version", "plugin_version"),
    downloadUrl: pickString(entry, "downloadUrl", "download_url"),
    contentHash: pickString(entry, "contentHash", "sha256"),
    contributor: pickString(entry, "contributor"),
    description: pickString(entry, "description"),
  };

  const candidate: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      candidate[key] = value;
    }
  }
  return candidate;
}

/**
 * Parses a plugin index document.
 *
 * Accepted layouts: `{ "<code>": {...} }` and `{ "plugins": [{...}] }`.
 * Invalid entries are skipped with a warning; only a document that is not
 * an object at all yields an empty list.
 */
export function parsePluginIndex(raw: unknown, logger: Logger): AdapterDescriptor[] {
  const entries: Array<[Record<string, unknown>, string | undefined]> = [];

  if (isRecord(raw) && Array.isArray(raw["plugins"])) {
    for (const entry of raw["plugins"]) {
      if (isRecord(entry)) {
        entries.push([entry, undefined]);
      } else {
        logger.warn("Skipping plugin index entry that is not an object");
      }
    }
  } else if (isRecord(raw)) {
    for (const [code, entry] of Object.entries(raw)) {
      if (isRecord(entry)) {
        entries.push([entry, code]);
      } else {
        logger.warn(`Skipping plugin index entry "${code}": not an object`);
      }
    }
  } else {
    logger.warn("Plugin index is not a JSON object");
    return [];
  }

  const validate = SchemaValidationCache.getValidatorFromSchema<AdapterDescriptor>(AdapterDescriptorSchema);
  const byCode = new Map<string, AdapterDescriptor>();
  for (const [entry, fallbackCode] of entries) {
    const candidate = toCandidate(entry, fallbackCode);
    if (validate(candidate)) {
      byCode.set(candidate.institutionCode, candidate);
    } else {
      const label = candidate["institutionCode"] ?? "<unknown>";
      logger.warn(`Skipping invalid plugin index entry "${label}": ${formatSchemaErrors(validate.errors).join("; ")}`);
    }
  }
  return Array.from(byCode.values());
}
