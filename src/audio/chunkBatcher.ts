// src/audio/chunkBatcher.ts
// Accumulates small PCM16 transport frames into fixed-duration batches for the model.

import { log } from '../log';
import { SAMPLE_WIDTH } from './codec';

const STATS_LOG_EVERY_BATCHES = 50;

export type ChunkBatcherStats = {
  chunksReceived: number;
  batchesEmitted: number;
  bytesBuffered: number;
  batchRatio: number;
  targetBytes: number;
  targetDurationMs: number;
};

export function targetBytesFor(sampleRateHz: number, durationMs: number): number {
  return Math.max(1, Math.floor((sampleRateHz * durationMs) / 1000)) * SAMPLE_WIDTH;
}

export class ChunkBatcher {
  protected readonly sampleRateHz: number;
  protected targetDurationMs: number;
  protected targetBytes: number;
  protected readonly logContext?: Record<string, unknown>;

  private buffer: Buffer = Buffer.alloc(0);
  private chunksReceived = 0;
  private batchesEmitted = 0;

  constructor(options: {
    targetDurationMs: number;
    sampleRateHz: number;
    logContext?: Record<string, unknown>;
  }) {
    this.sampleRateHz = Math.max(1, Math.floor(options.sampleRateHz));
    this.targetDurationMs = Math.max(1, options.targetDurationMs);
    this.targetBytes = targetBytesFor(this.sampleRateHz, this.targetDurationMs);
    this.logContext = options.logContext;
  }

  /** Returns one batch of exactly `targetBytes` once enough audio is buffered. */
  public addChunk(chunk: Buffer): Buffer | null {
    if (chunk.length === 0) {
      return null;
    }

    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
    this.chunksReceived += 1;

    return this.takeBatch();
  }

  /** Every complete batch currently held, oldest first. */
  public drainReady(): Buffer[] {
    const batches: Buffer[] = [];
    let batch = this.takeBatch();
    while (batch) {
      batches.push(batch);
      batch = this.takeBatch();
    }
    return batches;
  }

  public flush(): Buffer | null {
    if (this.buffer.length === 0) {
      return null;
    }

    const remainder = this.buffer;
    this.buffer = Buffer.alloc(0);
    this.batchesEmitted += 1;
    log.debug(
      { event: 'batcher_flush', flushed_bytes: remainder.length, ...(this.logContext ?? {}) },
      'batcher flushed remainder',
    );
    return remainder;
  }

  public reset(): void {
    this.buffer = Buffer.alloc(0);
    this.chunksReceived = 0;
    this.batchesEmitted = 0;
  }

  public get bufferedBytes(): number {
    return this.buffer.length;
  }

  public getTargetBytes(): number {
    return this.targetBytes;
  }

  public getTargetDurationMs(): number {
    return this.targetDurationMs;
  }

  public getStats(): ChunkBatcherStats {
    return {
      chunksReceived: this.chunksReceived,
      batchesEmitted: this.batchesEmitted,
      bytesBuffered: this.buffer.length,
      batchRatio: Math.round((this.chunksReceived / Math.max(this.batchesEmitted, 1)) * 100) / 100,
      targetBytes: this.targetBytes,
      targetDurationMs: this.targetDurationMs,
    };
  }

  private takeBatch(): Buffer | null {
    if (this.buffer.length < this.targetBytes) {
      return null;
    }

    const batch = this.buffer.subarray(0, this.targetBytes);
    this.buffer = this.buffer.subarray(this.targetBytes);
    this.batchesEmitted += 1;

    if (this.batchesEmitted % STATS_LOG_EVERY_BATCHES === 0) {
      log.debug(
        { event: 'batcher_stats', ...this.getStats(), ...(this.logContext ?? {}) },
        'audio batching stats',
      );
    }

    return batch;
  }
}

export type AdaptiveChunkBatcherOptions = {
  sampleRateHz: number;
  minDurationMs: number;
  maxDurationMs: number;
  defaultDurationMs: number;
  lowLatencyMs?: number;
  highLatencyMs?: number;
  historySize?: number;
  logContext?: Record<string, unknown>;
};

/**
 * Picks the batch duration from the rolling average of measured response latency:
 * short batches when the path is fast, long ones when it is slow.
 */
export class AdaptiveChunkBatcher extends ChunkBatcher {
  private readonly minDurationMs: number;
  private readonly maxDurationMs: number;
  private readonly defaultDurationMs: number;
  private readonly lowLatencyMs: number;
  private readonly highLatencyMs: number;
  private readonly historySize: number;
  private latencyHistory: number[] = [];

  constructor(options: AdaptiveChunkBatcherOptions) {
    super({
      targetDurationMs: options.defaultDurationMs,
      sampleRateHz: options.sampleRateHz,
      logContext: options.logContext,
    });
    this.minDurationMs = options.minDurationMs;
    this.maxDurationMs = options.maxDurationMs;
    this.defaultDurationMs = options.defaultDurationMs;
    this.lowLatencyMs = options.lowLatencyMs ?? 100;
    this.highLatencyMs = options.highLatencyMs ?? 300;
    this.historySize = Math.max(1, options.historySize ?? 10);
  }

  public updateLatency(latencyMs: number): void {
    if (!Number.isFinite(latencyMs) || latencyMs < 0) {
      return;
    }

    this.latencyHistory.push(latencyMs);
    if (this.latencyHistory.length > this.historySize) {
      this.latencyHistory.shift();
    }

    const avgLatency = this.averageLatencyMs();
    let nextDuration = this.defaultDurationMs;
    if (avgLatency < this.lowLatencyMs) {
      nextDuration = this.minDurationMs;
    } else if (avgLatency > this.highLatencyMs) {
      nextDuration = this.maxDurationMs;
    }

    if (nextDuration === this.targetDurationMs) {
      return;
    }

    const previous = this.targetDurationMs;
    // The buffered remainder is left as is; only future batches use the new size.
    this.targetDurationMs = nextDuration;
    this.targetBytes = targetBytesFor(this.sampleRateHz, nextDuration);
    log.info(
      {
        event: 'batcher_duration_adjusted',
        avg_latency_ms: Math.round(avgLatency * 10) / 10,
        previous_duration_ms: previous,
        duration_ms: nextDuration,
        ...(this.logContext ?? {}),
      },
      'adaptive batch duration adjusted',
    );
  }

  public averageLatencyMs(): number {
    if (this.latencyHistory.length === 0) return 0;
    const sum = this.latencyHistory.reduce((acc, value) => acc + value, 0);
    return sum / this.latencyHistory.length;
  }

  public getLatencyHistory(): readonly number[] {
    return [...this.latencyHistory];
  }
}
