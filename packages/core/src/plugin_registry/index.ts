export type * from "./plugin_registry.types";
export {
  PluginRegistryError,
  IntegrityError,
  PluginNotFoundError,
  IndexUnavailableError,
  PluginDownloadError,
  InvalidInstitutionCodeError,
  isPluginRegistryError,
  isIntegrityError,
  isPluginNotFoundError,
} from "./plugin_registry.errors";
export { LoadError, isLoadError } from "../school_adapter/school_adapter.errors";
export { compareVersions, isNewerVersion, parseVersion } from "./version";
export { parsePluginIndex, fetchWithMirror } from "./plugin_index";
export type { RemoteFetchOptions } from "./plugin_index";
export { AdapterDescriptorSchema, InstallManifestSchema } from "./plugin_registry.schemas";
