/**
 * Key/value persistence used by the state store and the plugin registry.
 * Implementations: FsStore (one JSON file per id) and MemoryStore (tests).
 */
export interface Store<T> {
  /**
   * Gets a value by ID
   * @returns The value or null if it doesn't exist
   */
  get(id: string): Promise<T | null>;

  /** Persists a value, replacing any previous one */
  put(id: string, value: T): Promise<void>;

  /** Deletes a value; missing IDs are not an error */
  delete(id: string): Promise<void>;

  list(): Promise<string[]>;

  exists(id: string): Promise<boolean>;
}

/**
 * Serializer for FsStore - allows custom serialization
 */
export interface Serializer {
  stringify: (value: unknown) => string;
  parse: (text: string) => unknown;
}

/**
 * Options for FsStore
 */
export interface FsStoreOptions<T> {
  /** Base directory for files */
  basePath: string;

  /** File extension (default: ".json") */
  extension?: string;

  /** Custom serializer (default: JSON with indent 2) */
  serializer?: Serializer;

  /** Checks a parsed file before it is returned */
  guard: (value: unknown) => value is T;

  /**
   * Called with the id and cause when a file cannot be parsed or fails the
   * guard; the file then reads as null. Without it such reads throw.
   */
  onInvalid?: (id: string, cause: unknown) => void;

  /** Create directory if it doesn't exist (default: true) */
  createIfMissing?: boolean;
}
