export {
  REQUIRED_ADAPTER_FUNCTIONS,
  confirmedEmpty,
  isConfirmedEmpty,
  toAdapterResult,
  validateAdapter,
  fetchFromAdapter,
} from "./school_adapter";
export { loadAdapterBundle, DEFAULT_EVALUATION_TIMEOUT_MS } from "./bundle_loader";
export type { BundleLoadOptions } from "./bundle_loader";
export {
  SchoolAdapterError,
  LoadError,
  AdapterOutputError,
  FetchFailedError,
  isLoadError,
  isFetchFailedError,
} from "./school_adapter.errors";
export type * from "./school_adapter.types";
