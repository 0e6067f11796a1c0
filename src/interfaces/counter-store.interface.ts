/**
 * Raw value as returned by a store client. Redis hands back strings, MongoDB
 * keeps numbers, memcached-style clients return bytes.
 */
export type StoreValue = string | number | Buffer;

/**
 * Outcome of a best-effort TTL refresh
 */
export enum TouchResult {
  TOUCHED = 'touched',
  NOT_FOUND = 'not_found',
  UNSUPPORTED = 'unsupported',
}

/**
 * Capability interface over a distributed key-value store.
 *
 * Every operation may reject independently (network errors, timeouts). Callers
 * are expected to apply their own failure policy; adapters never swallow errors.
 */
export interface IAtomicCounterStore {
  /**
   * Connect to the store and verify it answers
   */
  initialize(): Promise<void>;

  /**
   * Release the underlying client
   */
  close(): Promise<void>;

  /**
   * Whether initialize() completed successfully and close() has not been called
   */
  isInitialized(): boolean;

  /**
   * Atomically increment a counter and return the post-increment value.
   * Resolves to null when the key is absent and the store does not create
   * missing keys on increment.
   * @param key Composite store key
   */
  increment(key: string): Promise<number | null>;

  /**
   * Create the key only if it does not exist yet
   * @returns true if this call created the key
   */
  addIfAbsent(
    key: string,
    initialValue: number,
    ttlSeconds: number,
  ): Promise<boolean>;

  /**
   * Refresh the TTL of a key without changing its value
   */
  touch(key: string, ttlSeconds: number): Promise<TouchResult>;

  /**
   * Overwrite a key. A ttlSeconds of 0 or less stores the value without expiry.
   */
  set(key: string, value: string | number, ttlSeconds: number): Promise<void>;

  /**
   * Read a single key, null if absent
   */
  get(key: string): Promise<StoreValue | null>;

  /**
   * Batched read. Keys without a stored value are left out of the result.
   */
  getMulti(keys: string[]): Promise<Map<string, StoreValue>>;
}
