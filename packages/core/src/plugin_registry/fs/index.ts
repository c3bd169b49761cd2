export { FsPluginRegistry, BUNDLE_FILE, INDEX_CACHE_ID, MANIFEST_ID } from "./fs_plugin_registry";
