export const INSTITUTION_CODE_PATTERN = "^[A-Za-z0-9_-]+$";

export const AdapterDescriptorSchema = {
  type: "object",
  required: ["institutionCode", "displayName", "version", "downloadUrl", "contentHash"],
  properties: {
    institutionCode: { type: "string", pattern: INSTITUTION_CODE_PATTERN },
    displayName: { type: "string", minLength: 1 },
    version: { type: "string", minLength: 1 },
    downloadUrl: { type: "string", format: "uri" },
    contentHash: { type: "string", pattern: "^[0-9a-fA-F]{64}$" },
    localPath: { type: "string" },
    contributor: { type: "string" },
    description: { type: "string" },
  },
  additionalProperties: false,
} as const;

export const InstallManifestSchema = {
  type: "object",
  required: ["descriptor", "installedAt"],
  properties: {
    descriptor: AdapterDescriptorSchema,
    installedAt: { type: "string", format: "date-time" },
  },
} as const;

/** Cache file layout: code → descriptor */
export const PluginIndexCacheSchema = {
  type: "object",
  additionalProperties: AdapterDescriptorSchema,
} as const;
