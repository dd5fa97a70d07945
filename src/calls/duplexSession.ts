// src/calls/duplexSession.ts
// One relayed conversation: transport frames in, model events out. The pumps run as
// siblings in a TaskScope; the first failure, a transport stop, or an external stop()
// ends all of them and the session is torn down once.

import { AdaptiveChunkBatcher, ChunkBatcher, targetBytesFor } from '../audio/chunkBatcher';
import { AudioDeduplicator } from '../audio/audioDeduplicator';
import { MODEL_SAMPLE_RATE, resample } from '../audio/codec';
import type { Env } from '../env';
import { DecodeError, errorMessage, ModelSessionError, TransportDisconnect } from '../errors';
import { log } from '../log';
import {
  incInboundAudioFrames,
  incInboundAudioFramesDropped,
  incInterruptions,
  incOutboundAudioChunks,
  incOutboundAudioDropped,
  incToolInvocation,
  observeResponseLatency,
  recordSessionEnd,
  sessionStarted,
} from '../metrics';
import type { ModelSessionConfig } from '../model/sessionConfig';
import type { ModelConnector, ModelEvent, ModelSender, ModelSession, ToolCall, ToolResult } from '../model/types';
import type { ToolRegistry } from '../tools/toolRegistry';
import type { DuplexTransport, RawAudio } from '../transport/types';
import { VoiceActivityDetector, type VadResult } from '../vad/voiceActivityDetector';
import { SessionState, type SessionStateSnapshot } from './sessionState';
import { sleep, TaskScope, untilAborted, type ScopeOutcome } from './taskScope';

export type DuplexSessionConfig = {
  vad: {
    frameDurationMs: number;
    speechThreshold: number;
    silenceDurationMs: number;
    minSpeechDurationMs: number;
    noiseFloorMultiplier: number;
  };
  batch: {
    minDurationMs: number;
    defaultDurationMs: number;
    maxDurationMs: number;
    adaptive: boolean;
  };
  dedup: { maxEntries: number; evictBatch: number };
  outboundMinIntervalMs: number;
  keepaliveIntervalMs: number;
  /** 0 disables the silence fallback. */
  silenceFallbackMs: number;
  model: ModelSessionConfig;
};

export function duplexSessionConfigFromEnv(config: Env, model: ModelSessionConfig): DuplexSessionConfig {
  return {
    vad: {
      frameDurationMs: config.VAD_FRAME_MS,
      speechThreshold: config.VAD_SPEECH_THRESHOLD,
      silenceDurationMs: config.VAD_SILENCE_MS,
      minSpeechDurationMs: config.VAD_MIN_SPEECH_MS,
      noiseFloorMultiplier: config.VAD_NOISE_FLOOR_MULTIPLIER,
    },
    batch: {
      minDurationMs: config.BATCH_MIN_MS,
      defaultDurationMs: config.BATCH_DEFAULT_MS,
      maxDurationMs: config.BATCH_MAX_MS,
      adaptive: config.BATCH_ADAPTIVE_ENABLED,
    },
    dedup: { maxEntries: config.DEDUP_MAX_ENTRIES, evictBatch: config.DEDUP_EVICT_BATCH },
    outboundMinIntervalMs: config.OUTBOUND_MIN_INTERVAL_MS,
    keepaliveIntervalMs: config.KEEPALIVE_INTERVAL_MS,
    silenceFallbackMs: config.SILENCE_FALLBACK_MS,
    model,
  };
}

export type DuplexSessionStats = {
  framesIn: number;
  framesDropped: number;
  batchesSent: number;
  endOfTurnsSent: number;
  speechStarts: number;
  speechEnds: number;
  interruptions: number;
  audioChunksOut: number;
  duplicatesDropped: number;
  staleDropped: number;
  toolCalls: number;
};

export type DuplexSessionSummary = {
  sessionId: string;
  reason: string;
  error?: unknown;
  durationMs: number;
  stats: DuplexSessionStats;
};

export type DuplexSessionOptions = {
  transport: DuplexTransport;
  connector: ModelConnector;
  tools: ToolRegistry;
  config: DuplexSessionConfig;
  now?: () => number;
};

type TurnEndSource = 'vad' | 'client' | 'text' | 'silence_fallback';

const MIME_RATE_PATTERN = /rate=(\d+)/i;

function mimeSampleRate(mimeType: string): number {
  const match = MIME_RATE_PATTERN.exec(mimeType);
  const rate = match ? Number(match[1]) : MODEL_SAMPLE_RATE;
  return Number.isFinite(rate) && rate > 0 ? rate : MODEL_SAMPLE_RATE;
}

function isCleanEnd(outcome: ScopeOutcome): boolean {
  return outcome.error === undefined || outcome.error instanceof TransportDisconnect;
}

export class DuplexSession {
  public readonly id: string;

  private readonly transport: DuplexTransport;
  private readonly connector: ModelConnector;
  private readonly tools: ToolRegistry;
  private readonly config: DuplexSessionConfig;
  private readonly now: () => number;
  private readonly logContext: Record<string, unknown>;

  private readonly state = new SessionState();
  private readonly vad: VoiceActivityDetector | null;
  private readonly vadFrameBytes: number;
  // Tail shorter than one VAD frame, carried into the next inbound chunk.
  private vadPending: Buffer = Buffer.alloc(0);
  private readonly batcher: ChunkBatcher;
  private readonly dedup: AudioDeduplicator;

  private readonly stats: DuplexSessionStats = {
    framesIn: 0,
    framesDropped: 0,
    batchesSent: 0,
    endOfTurnsSent: 0,
    speechStarts: 0,
    speechEnds: 0,
    interruptions: 0,
    audioChunksOut: 0,
    duplicatesDropped: 0,
    staleDropped: 0,
    toolCalls: 0,
  };

  private scope?: TaskScope;
  private started = false;
  private tornDown = false;
  private stopReason?: string;

  // Outbound pump only.
  private agentTurnEpoch: number | null = null;
  private audioSequence = 0;
  private lastOutboundSendAt: number | null = null;

  constructor(options: DuplexSessionOptions) {
    this.transport = options.transport;
    this.connector = options.connector;
    this.tools = options.tools;
    this.config = options.config;
    this.now = options.now ?? Date.now;
    this.id = options.transport.id;
    // Shared with the transport so stream identifiers learned at start show up here too.
    this.logContext = options.transport.logContext;

    const vad = this.config.vad;
    this.vad = this.transport.vadEnabled
      ? new VoiceActivityDetector({
          frameDurationMs: vad.frameDurationMs,
          speechThreshold: vad.speechThreshold,
          silenceDurationMs: vad.silenceDurationMs,
          minSpeechDurationMs: vad.minSpeechDurationMs,
          noiseFloorMultiplier: vad.noiseFloorMultiplier,
          logContext: this.logContext,
        })
      : null;
    this.vadFrameBytes = targetBytesFor(MODEL_SAMPLE_RATE, vad.frameDurationMs);

    const batch = this.config.batch;
    this.batcher = batch.adaptive
      ? new AdaptiveChunkBatcher({
          sampleRateHz: MODEL_SAMPLE_RATE,
          minDurationMs: batch.minDurationMs,
          maxDurationMs: batch.maxDurationMs,
          defaultDurationMs: batch.defaultDurationMs,
          logContext: this.logContext,
        })
      : new ChunkBatcher({
          targetDurationMs: batch.defaultDurationMs,
          sampleRateHz: MODEL_SAMPLE_RATE,
          logContext: this.logContext,
        });

    this.dedup = new AudioDeduplicator({
      maxEntries: this.config.dedup.maxEntries,
      evictBatch: this.config.dedup.evictBatch,
    });
  }

  public async run(): Promise<DuplexSessionSummary> {
    if (this.started) {
      throw new Error(`session ${this.id} already started`);
    }
    this.started = true;

    const startedAt = this.now();
    sessionStarted(this.transport.kind);
    log.info({ event: 'session_started', ...this.logContext }, 'session started');

    let model: ModelSession | undefined;
    let outcome: ScopeOutcome;
    try {
      const start = await this.transport.waitForStart();
      log.info({ event: 'session_stream_start', ...start, ...this.logContext }, 'transport stream started');

      model = await this.connector.openSession(this.id, this.config.model, this.logContext);
      if (this.stopReason) {
        outcome = { reason: this.stopReason };
      } else {
        this.transport.sendReady();
        outcome = await this.supervise(model);
      }
    } catch (error) {
      outcome = { reason: this.stopReason ?? 'startup_failed', error };
    }

    return this.teardown(outcome, model, startedAt);
  }

  /** Ends the session from outside (shutdown, registry eviction). */
  public stop(reason = 'stopped'): void {
    if (this.tornDown) return;
    this.stopReason = this.stopReason ?? reason;
    if (this.scope) {
      this.scope.abort(reason);
    } else {
      // Unblocks waitForStart().
      this.transport.close(reason);
    }
  }

  public snapshot(): SessionStateSnapshot {
    return this.state.snapshot();
  }

  public getStats(): DuplexSessionStats {
    return { ...this.stats };
  }

  private async supervise(model: ModelSession): Promise<ScopeOutcome> {
    const scope = new TaskScope(this.logContext);
    this.scope = scope;

    scope.onCancel((outcome) => {
      log.info({ event: 'session_cancelling', reason: outcome.reason, ...this.logContext }, 'session cancelling');
    });

    scope.spawn('inbound', (signal) => this.inboundPump(model.sender, signal), { terminal: true });
    scope.spawn('outbound', (signal) => this.outboundPump(model, signal));
    scope.spawn('keepalive', (signal) => this.keepalivePump(signal));
    if (this.config.silenceFallbackMs > 0 && this.vad) {
      scope.spawn('silence_fallback', (signal) => this.silenceFallbackPump(model.sender, signal));
    }

    return scope.join();
  }

  // ---------- inbound ----------

  private async inboundPump(sender: ModelSender, signal: AbortSignal): Promise<void> {
    for await (const message of untilAborted(this.transport.messages(), signal)) {
      switch (message.kind) {
        case 'audio':
          this.handleInboundAudio(message.audio, sender);
          break;
        case 'text':
          // Audio spoken before the typed text goes first.
          this.flushInbound(sender);
          sender.sendText(message.text);
          this.endUserTurn(sender, 'text');
          break;
        case 'end_of_turn':
          this.endUserTurn(sender, 'client');
          break;
        case 'mark':
          log.debug({ event: 'mark_received', name: message.name, ...this.logContext }, 'mark received');
          break;
        case 'stop':
          log.info({ event: 'stream_stop_received', ...this.logContext }, 'transport stop received');
          this.flushInbound(sender);
          return;
      }
    }

    log.info({ event: 'transport_stream_ended', ...this.logContext }, 'transport stream ended');
    this.flushInbound(sender);
  }

  private handleInboundAudio(audio: RawAudio, sender: ModelSender): void {
    this.stats.framesIn += 1;
    incInboundAudioFrames(this.transport.kind);

    let pcm16: Buffer;
    try {
      pcm16 = this.transport.toModelAudio(audio);
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      this.stats.framesDropped += 1;
      incInboundAudioFramesDropped('decode_error');
      if (this.stats.framesDropped === 1 || this.stats.framesDropped % 50 === 0) {
        log.warn(
          { err: error, event: 'inbound_frame_dropped', dropped: this.stats.framesDropped, ...this.logContext },
          'inbound frame could not be decoded',
        );
      }
      return;
    }
    if (pcm16.length === 0) return;

    this.state.markAudioActivity(this.now());
    const vadResults = this.vadFrames(pcm16);

    // Audio always reaches the model; the VAD only drives turn signals.
    const first = this.batcher.addChunk(pcm16);
    if (first) this.sendBatch(sender, first);
    for (const batch of this.batcher.drainReady()) {
      this.sendBatch(sender, batch);
    }

    for (const vadResult of vadResults) {
      this.handleVadResult(vadResult, sender);
    }
  }

  /** Cuts inbound audio of any length into fixed-duration frames for the VAD. */
  private vadFrames(pcm16: Buffer): VadResult[] {
    if (!this.vad) return [];
    const pending = this.vadPending.length > 0 ? Buffer.concat([this.vadPending, pcm16]) : pcm16;
    const results: VadResult[] = [];
    let offset = 0;
    while (pending.length - offset >= this.vadFrameBytes) {
      results.push(this.vad.process(pending.subarray(offset, offset + this.vadFrameBytes)));
      offset += this.vadFrameBytes;
    }
    this.vadPending = Buffer.from(pending.subarray(offset));
    return results;
  }

  private handleVadResult(vadResult: VadResult, sender: ModelSender): void {
    if (vadResult.speechStarted) {
      this.stats.speechStarts += 1;
      this.state.markUserSpeechStarted();
      log.info(
        { event: 'speech_started', energy: vadResult.energy, threshold: vadResult.threshold, ...this.logContext },
        'speech started',
      );
      if (this.state.interrupt()) {
        this.stats.interruptions += 1;
        incInterruptions(this.transport.kind);
        log.info({ event: 'barge_in', ...this.logContext }, 'caller interrupted agent');
        this.transport.clearPlayback();
      }
    }

    if (vadResult.speechDiscarded) {
      log.debug({ event: 'speech_discarded', ...this.logContext }, 'short burst discarded');
    }

    if (vadResult.speechEnded) {
      this.stats.speechEnds += 1;
      log.info({ event: 'speech_ended', ...this.logContext }, 'speech ended');
      this.endUserTurn(sender, 'vad');
    }
  }

  private sendBatch(sender: ModelSender, batch: Buffer): void {
    sender.sendAudio(batch, MODEL_SAMPLE_RATE);
    this.stats.batchesSent += 1;
  }

  private flushInbound(sender: ModelSender): void {
    const remainder = this.batcher.flush();
    if (remainder) {
      this.sendBatch(sender, remainder);
    }
  }

  private endUserTurn(sender: ModelSender, source: TurnEndSource): void {
    this.flushInbound(sender);
    sender.sendEndOfTurn();
    this.state.markEndOfTurnSent(this.now());
    this.stats.endOfTurnsSent += 1;
    log.info({ event: 'end_of_turn_sent', source, ...this.logContext }, 'end of turn sent');
  }

  // ---------- outbound ----------

  private async outboundPump(model: ModelSession, signal: AbortSignal): Promise<void> {
    for await (const event of untilAborted(model.events, signal)) {
      await this.handleModelEvent(event, model.sender, signal);
    }
    throw new ModelSessionError('model_stream_closed');
  }

  private async handleModelEvent(event: ModelEvent, sender: ModelSender, signal: AbortSignal): Promise<void> {
    if (event.transcription) {
      this.transport.sendTranscription(event.transcription.direction, event.transcription.text);
    }

    for (const part of event.parts) {
      switch (part.kind) {
        case 'audio':
          await this.deliverAgentAudio(part.data, mimeSampleRate(part.mimeType), signal);
          break;
        case 'text':
          this.transport.sendText(part.text);
          break;
      }
    }

    if (event.toolCalls.length > 0) {
      await this.runToolCalls(event.toolCalls, sender, signal);
    }

    if (event.stateDelta.turnComplete) {
      this.finishAgentTurn('turn_complete');
    }
    if (event.stateDelta.interrupted) {
      this.finishAgentTurn('interrupted');
    }
  }

  private async deliverAgentAudio(data: Buffer, sampleRateHz: number, signal: AbortSignal): Promise<void> {
    if (data.length === 0) {
      incOutboundAudioDropped('empty');
      return;
    }
    if (!this.dedup.shouldSend(data)) {
      this.stats.duplicatesDropped += 1;
      incOutboundAudioDropped('duplicate');
      log.debug({ event: 'duplicate_audio_dropped', bytes: data.length, ...this.logContext }, 'duplicate chunk');
      return;
    }

    // Captured before pacing; an interruption while we wait makes this chunk stale.
    const epoch = this.agentTurnEpoch ?? this.state.currentEpoch();

    if (this.lastOutboundSendAt !== null) {
      const wait = this.config.outboundMinIntervalMs - (this.now() - this.lastOutboundSendAt);
      if (wait > 0) {
        await sleep(wait, signal);
      }
    }

    const decision = this.state.beginAgentAudio(epoch);
    if (decision === 'stale') {
      if (this.audioSequence > 0) {
        // First chunk dropped after a barge-in: forget what this turn already sent.
        this.dedup.clearAll();
        this.audioSequence = 0;
      }
      this.stats.staleDropped += 1;
      incOutboundAudioDropped('stale');
      return;
    }

    const sentAt = this.now();
    if (decision === 'started') {
      this.agentTurnEpoch = epoch;
      log.info({ event: 'agent_speaking', ...this.logContext }, 'agent started speaking');
      const latency = this.state.takeResponseLatency(sentAt);
      if (latency !== null) {
        observeResponseLatency(this.transport.kind, latency);
        if (this.batcher instanceof AdaptiveChunkBatcher) {
          this.batcher.updateLatency(latency);
        }
      }
    }

    const pcm24k = sampleRateHz === MODEL_SAMPLE_RATE ? data : resample(data, sampleRateHz, MODEL_SAMPLE_RATE);
    this.transport.sendAudio(pcm24k);
    this.lastOutboundSendAt = sentAt;
    this.audioSequence += 1;
    this.stats.audioChunksOut += 1;
    incOutboundAudioChunks(this.transport.kind);
  }

  private async runToolCalls(calls: ToolCall[], sender: ModelSender, signal: AbortSignal): Promise<void> {
    const results: ToolResult[] = [];
    for (const call of calls) {
      this.stats.toolCalls += 1;
      this.transport.sendFunctionCall(call);
      const result = await this.tools.invoke(call, { signal, logContext: this.logContext });
      incToolInvocation(call.name, result.response.success === true ? 'success' : 'failure');
      results.push(result);
    }
    sender.sendToolResult(results);
  }

  private finishAgentTurn(kind: 'turn_complete' | 'interrupted'): void {
    this.dedup.clearAll();
    this.audioSequence = 0;
    this.agentTurnEpoch = null;
    const wasSpeaking = this.state.endAgentTurn();

    if (kind === 'turn_complete') {
      this.transport.sendTurnComplete();
    } else {
      this.transport.notifyInterrupted();
    }
    log.info({ event: kind, was_speaking: wasSpeaking, ...this.logContext }, `agent ${kind.replace('_', ' ')}`);
  }

  // ---------- timers ----------

  private async keepalivePump(signal: AbortSignal): Promise<void> {
    while (true) {
      await sleep(this.config.keepaliveIntervalMs, signal);
      this.transport.sendKeepalive();
      log.debug({ event: 'keepalive_sent', ...this.logContext }, 'keepalive sent');
    }
  }

  private async silenceFallbackPump(sender: ModelSender, signal: AbortSignal): Promise<void> {
    const silenceMs = this.config.silenceFallbackMs;
    const pollMs = Math.max(20, Math.min(250, Math.floor(silenceMs / 2)));
    while (true) {
      await sleep(pollMs, signal);
      if (this.state.silenceFallbackDue(this.now(), silenceMs)) {
        log.info({ event: 'silence_fallback', silence_ms: silenceMs, ...this.logContext }, 'inbound audio went quiet');
        this.endUserTurn(sender, 'silence_fallback');
      }
    }
  }

  // ---------- teardown ----------

  private async teardown(
    outcome: ScopeOutcome,
    model: ModelSession | undefined,
    startedAt: number,
  ): Promise<DuplexSessionSummary> {
    this.tornDown = true;

    if (model) {
      try {
        await model.sender.close(outcome.reason);
      } catch (error) {
        log.warn({ err: error, event: 'model_close_failed', ...this.logContext }, 'model session close failed');
      }
    }

    if (!isCleanEnd(outcome)) {
      try {
        this.transport.sendError(errorMessage(outcome.error));
      } catch (error) {
        log.debug({ err: error, ...this.logContext }, 'error notice not delivered');
      }
    }
    this.transport.close(outcome.reason);

    const durationMs = this.now() - startedAt;
    recordSessionEnd({ transport: this.transport.kind, reason: outcome.reason, durationMs });

    const fields = {
      event: 'session_ended',
      reason: outcome.reason,
      task: outcome.task,
      duration_ms: durationMs,
      ...this.stats,
      ...this.logContext,
    };
    if (isCleanEnd(outcome)) {
      log.info(fields, 'session ended');
    } else {
      log.error({ err: outcome.error, ...fields }, 'session failed');
    }

    return {
      sessionId: this.id,
      reason: outcome.reason,
      error: outcome.error,
      durationMs,
      stats: { ...this.stats },
    };
  }
}
