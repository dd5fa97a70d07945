// src/audio/codec.ts
// Stateless G.711 mu-law <-> PCM16 conversion and linear-interpolation resampling
// between the telephony rate (8 kHz) and the model rate (24 kHz).

import { DecodeError } from '../errors';

export const TELEPHONY_SAMPLE_RATE = 8000;
export const MODEL_SAMPLE_RATE = 24000;
export const SAMPLE_WIDTH = 2;

const MULAW_BIAS = 0x84;
const MULAW_CLIP = 32635;

function clampInt16(value: number): number {
  if (value > 32767) return 32767;
  if (value < -32768) return -32768;
  return value | 0;
}

function assertWholeSamples(pcm16: Buffer, op: string): void {
  if (pcm16.length % SAMPLE_WIDTH !== 0) {
    throw new DecodeError(`${op}: pcm16 length ${pcm16.length} is not a multiple of ${SAMPLE_WIDTH}`);
  }
}

export function pcm16ToSamples(pcm16: Buffer): Int16Array {
  assertWholeSamples(pcm16, 'pcm16ToSamples');
  const sampleCount = pcm16.length / SAMPLE_WIDTH;
  const view = new DataView(pcm16.buffer, pcm16.byteOffset, pcm16.byteLength);
  const samples = new Int16Array(sampleCount);
  for (let i = 0; i < sampleCount; i += 1) {
    samples[i] = view.getInt16(i * SAMPLE_WIDTH, true);
  }
  return samples;
}

export function samplesToPcm16(samples: Int16Array): Buffer {
  const out = Buffer.alloc(samples.length * SAMPLE_WIDTH);
  for (let i = 0; i < samples.length; i += 1) {
    out.writeInt16LE(samples[i] ?? 0, i * SAMPLE_WIDTH);
  }
  return out;
}

export function muLawToPcmSample(uLawByte: number): number {
  const u = (~uLawByte) & 0xff;
  const sign = u & 0x80;
  const exponent = (u >> 4) & 0x07;
  const mantissa = u & 0x0f;
  let sample = ((mantissa << 3) + MULAW_BIAS) << exponent;
  sample -= MULAW_BIAS;
  if (sign) sample = -sample;
  return clampInt16(sample);
}

export function pcmToMuLawSample(input: number): number {
  let pcm = clampInt16(input);
  const sign = (pcm >> 8) & 0x80;
  if (sign) pcm = -pcm;
  if (pcm > MULAW_CLIP) pcm = MULAW_CLIP;
  pcm += MULAW_BIAS;
  let exponent = 7;
  for (let expMask = 0x4000; (pcm & expMask) === 0 && exponent > 0; exponent -= 1) {
    expMask >>= 1;
  }
  const mantissa = (pcm >> (exponent + 3)) & 0x0f;
  return ~(sign | (exponent << 4) | mantissa) & 0xff;
}

/** mu-law bytes (one per sample) to PCM16 little-endian. */
export function decodeMuLaw(uLaw: Buffer): Buffer {
  const out = Buffer.alloc(uLaw.length * SAMPLE_WIDTH);
  for (let i = 0; i < uLaw.length; i += 1) {
    out.writeInt16LE(muLawToPcmSample(uLaw[i] ?? 0xff), i * SAMPLE_WIDTH);
  }
  return out;
}

export function encodeMuLaw(pcm16: Buffer): Buffer {
  assertWholeSamples(pcm16, 'encodeMuLaw');
  const out = Buffer.alloc(pcm16.length / SAMPLE_WIDTH);
  for (let i = 0; i < out.length; i += 1) {
    out[i] = pcmToMuLawSample(pcm16.readInt16LE(i * SAMPLE_WIDTH));
  }
  return out;
}

/** Constant-ratio linear interpolation. Equal rates return `pcm16` itself. */
export function resample(pcm16: Buffer, fromRate: number, toRate: number): Buffer {
  if (fromRate <= 0 || toRate <= 0) {
    throw new DecodeError(`resample: invalid rates ${fromRate} -> ${toRate}`);
  }
  assertWholeSamples(pcm16, 'resample');
  if (fromRate === toRate || pcm16.length === 0) return pcm16;

  const input = pcm16ToSamples(pcm16);
  const outputLength = Math.max(1, Math.round(input.length * (toRate / fromRate)));
  const output = new Int16Array(outputLength);
  const ratio = fromRate / toRate;

  for (let i = 0; i < outputLength; i += 1) {
    const position = i * ratio;
    const index = Math.min(Math.floor(position), input.length - 1);
    const nextIndex = Math.min(index + 1, input.length - 1);
    const frac = position - index;
    const sample0 = input[index] ?? 0;
    const sample1 = input[nextIndex] ?? sample0;
    output[i] = clampInt16(Math.round(sample0 + (sample1 - sample0) * frac));
  }

  return samplesToPcm16(output);
}

export function decodeBase64Audio(payload: string): Buffer {
  const decoded = Buffer.from(payload, 'base64');
  if (decoded.length === 0 && payload.trim() !== '') {
    throw new DecodeError('base64 payload decoded to zero bytes');
  }
  return decoded;
}

/** base64 mu-law @ 8 kHz -> PCM16 @ 24 kHz */
export function transportToModel(base64MuLaw: string): Buffer {
  const uLaw = decodeBase64Audio(base64MuLaw);
  const pcm8k = decodeMuLaw(uLaw);
  return resample(pcm8k, TELEPHONY_SAMPLE_RATE, MODEL_SAMPLE_RATE);
}

/** PCM16 @ 24 kHz -> base64 mu-law @ 8 kHz */
export function modelToTransport(pcm24k: Buffer): string {
  const pcm8k = resample(pcm24k, MODEL_SAMPLE_RATE, TELEPHONY_SAMPLE_RATE);
  return encodeMuLaw(pcm8k).toString('base64');
}

export function pcm16DurationMs(pcm16: Buffer, sampleRateHz: number): number {
  return (pcm16.length / SAMPLE_WIDTH / sampleRateHz) * 1000;
}
