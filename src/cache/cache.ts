/**
 * Replayable response bodies, grouped by namespace (one per endpoint) and
 * addressed by the checksum of the request that produced them.
 */
export interface CacheEntry {
  readonly checksum: string;
  /** ISO timestamp stamped by the store, not by the caller. */
  readonly storedAt: string;
  readonly metadata?: Record<string, unknown>;
  /** Raw response text, parsed again on replay. */
  readonly body: string;
}

export type CacheWriteInput = Omit<CacheEntry, 'storedAt'>;

export interface CacheClient {
  /** `null` on a miss. */
  read(namespace: string, checksum: string): Promise<CacheEntry | null>;
  write(namespace: string, entry: CacheWriteInput): Promise<void>;
}
