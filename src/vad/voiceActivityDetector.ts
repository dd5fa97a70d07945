// src/vad/voiceActivityDetector.ts
// Energy-based speech/silence detector with an adaptive noise floor. One instance per
// call, fed one fixed-duration PCM16 frame at a time.

import { pcm16ToSamples } from '../audio/codec';
import { log } from '../log';

export type VadOptions = {
  frameDurationMs?: number;
  speechThreshold?: number;
  silenceDurationMs?: number;
  minSpeechDurationMs?: number;
  historySize?: number;
  noiseFloorMultiplier?: number;
  initialNoiseFloor?: number;
  logContext?: Record<string, unknown>;
};

export type VadResult = {
  isSpeech: boolean;
  speechStarted: boolean;
  speechEnded: boolean;
  /** Set on the frame where a too-short burst was dropped instead of ending a turn. */
  speechDiscarded: boolean;
  energy: number;
  threshold: number;
  confidence: number;
};

export type VadState = {
  isSpeaking: boolean;
  speechFrameCount: number;
  silenceFrameCount: number;
  energyHistory: readonly number[];
  noiseFloor: number;
};

const FULL_SCALE = 32768;
const NOISE_FLOOR_MIN_HISTORY = 10;

export function rmsEnergy(samples: Int16Array): number {
  if (samples.length === 0) return 0;
  let sumSquares = 0;
  for (let i = 0; i < samples.length; i += 1) {
    const s = samples[i] ?? 0;
    sumSquares += s * s;
  }
  return Math.sqrt(sumSquares / samples.length) / FULL_SCALE;
}

export class VoiceActivityDetector {
  private readonly frameDurationMs: number;
  private readonly speechThreshold: number;
  private readonly silenceDurationMs: number;
  private readonly minSpeechDurationMs: number;
  private readonly historySize: number;
  private readonly noiseFloorMultiplier: number;
  private readonly initialNoiseFloor: number;
  private readonly logContext?: Record<string, unknown>;

  private isSpeaking = false;
  private speechFrames = 0;
  private silenceFrames = 0;
  private energyHistory: number[] = [];
  private noiseFloor: number;

  constructor(options: VadOptions = {}) {
    this.frameDurationMs = options.frameDurationMs ?? 20;
    this.speechThreshold = options.speechThreshold ?? 0.5;
    this.silenceDurationMs = options.silenceDurationMs ?? 200;
    this.minSpeechDurationMs = options.minSpeechDurationMs ?? 100;
    this.historySize = Math.max(1, options.historySize ?? 50);
    this.noiseFloorMultiplier = options.noiseFloorMultiplier ?? 3;
    this.initialNoiseFloor = options.initialNoiseFloor ?? 0.1;
    this.noiseFloor = this.initialNoiseFloor;
    this.logContext = options.logContext;
  }

  public process(pcm16: Buffer): VadResult {
    const energy = rmsEnergy(pcm16ToSamples(pcm16));

    this.energyHistory.push(energy);
    if (this.energyHistory.length > this.historySize) {
      this.energyHistory.shift();
    }

    if (this.energyHistory.length > NOISE_FLOOR_MIN_HISTORY) {
      const sorted = [...this.energyHistory].sort((a, b) => a - b);
      this.noiseFloor = sorted[Math.floor(sorted.length / 4)] ?? this.noiseFloor;
    }

    // The configured threshold is a floor: a quiet history never lowers it.
    const threshold = Math.max(this.speechThreshold, this.noiseFloor * this.noiseFloorMultiplier);
    const isSpeech = energy > threshold;

    const result: VadResult = {
      isSpeech,
      speechStarted: false,
      speechEnded: false,
      speechDiscarded: false,
      energy,
      threshold,
      confidence: isSpeech ? Math.min(1, energy / threshold) : 0,
    };

    if (isSpeech) {
      this.silenceFrames = 0;
      if (!this.isSpeaking) {
        this.isSpeaking = true;
        result.speechStarted = true;
        log.info(
          { event: 'vad_speech_started', energy, threshold, ...(this.logContext ?? {}) },
          'vad speech started',
        );
      }
      this.speechFrames += 1;
      return result;
    }

    if (!this.isSpeaking) {
      return result;
    }

    this.silenceFrames += 1;
    const silenceMs = this.silenceFrames * this.frameDurationMs;
    if (silenceMs < this.silenceDurationMs) {
      return result;
    }

    const speechMs = this.speechFrames * this.frameDurationMs;
    this.isSpeaking = false;
    this.speechFrames = 0;
    this.silenceFrames = 0;

    if (speechMs >= this.minSpeechDurationMs) {
      result.speechEnded = true;
      log.info(
        { event: 'vad_speech_ended', silence_ms: silenceMs, speech_ms: speechMs, ...(this.logContext ?? {}) },
        'vad speech ended',
      );
    } else {
      result.speechDiscarded = true;
      log.debug(
        { event: 'vad_speech_discarded', speech_ms: speechMs, ...(this.logContext ?? {}) },
        'short speech burst ignored',
      );
    }

    return result;
  }

  public reset(): void {
    this.isSpeaking = false;
    this.speechFrames = 0;
    this.silenceFrames = 0;
    this.energyHistory = [];
    this.noiseFloor = this.initialNoiseFloor;
  }

  public getState(): VadState {
    return {
      isSpeaking: this.isSpeaking,
      speechFrameCount: this.speechFrames,
      silenceFrameCount: this.silenceFrames,
      energyHistory: [...this.energyHistory],
      noiseFloor: this.noiseFloor,
    };
  }
}
