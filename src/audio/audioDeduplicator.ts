import { createHash } from 'crypto';

const DEFAULT_MAX_ENTRIES = 100;
const DEFAULT_EVICT_BATCH = 20;

export function hashAudioChunk(chunk: Buffer): string {
  return createHash('md5').update(chunk).digest('hex');
}

/**
 * Drops outbound audio chunks whose exact bytes were already sent in the current turn.
 * Memory is bounded by evicting the oldest inserted hashes in batches.
 */
export class AudioDeduplicator {
  private readonly maxEntries: number;
  private readonly evictBatch: number;
  private readonly hashes = new Set<string>();

  constructor(options: { maxEntries?: number; evictBatch?: number } = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.evictBatch = Math.max(1, options.evictBatch ?? DEFAULT_EVICT_BATCH);
  }

  public shouldSend(chunk: Buffer): boolean {
    if (chunk.length === 0) {
      return false;
    }

    const hash = hashAudioChunk(chunk);
    if (this.hashes.has(hash)) {
      return false;
    }

    this.hashes.add(hash);
    if (this.hashes.size > this.maxEntries) {
      this.evictOldest();
    }
    return true;
  }

  public clearAll(): void {
    this.hashes.clear();
  }

  public get size(): number {
    return this.hashes.size;
  }

  private evictOldest(): void {
    // Set iteration follows insertion order.
    let removed = 0;
    for (const hash of this.hashes) {
      if (removed >= this.evictBatch && this.hashes.size <= this.maxEntries) break;
      this.hashes.delete(hash);
      removed += 1;
    }
  }
}
