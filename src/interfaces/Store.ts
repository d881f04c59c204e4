/**
 * Position in a store-side key scan. Decimal string as sent by the store,
 * so 64-bit cursors survive intact. `'0'` starts a scan and also ends it.
 */
export type ScanCursor = string;

export const SCAN_START: ScanCursor = '0';

export interface ScanBatch {
  readonly cursor: ScanCursor;
  readonly keys: readonly string[];
}

/**
 * The narrow command surface the gateway needs from the backing store.
 * Implementations reject with StoreError on transport or protocol failure.
 */
export interface IKeyValueStore {
  connect(): Promise<void>;
  ping(): Promise<void>;

  /** Resolves null when the key does not exist or has expired. */
  get(key: string): Promise<string | null>;

  /**
   * Unconditional write. A positive `ttlSeconds` sets an expiry; anything
   * else stores the value without one.
   */
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;

  /** Resolves the number of keys removed (0 or 1). */
  delete(key: string): Promise<number>;

  /**
   * Fetch one scan batch. `count` is a hint: a batch may hold more or fewer
   * keys, including none, before the cursor returns to '0'.
   */
  scan(cursor: ScanCursor, pattern: string, count: number): Promise<ScanBatch>;

  close(): Promise<void>;
}
