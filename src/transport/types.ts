import type { ToolCall, TranscriptionDirection } from '../model/types';

export type TransportKind = 'telephony' | 'browser';

/** Transport-native audio: base64 text (JSON envelopes) or raw bytes (binary frames). */
export type RawAudio = string | Buffer;

export type InboundMessage =
  | { kind: 'audio'; audio: RawAudio }
  | { kind: 'text'; text: string }
  | { kind: 'end_of_turn' }
  | { kind: 'mark'; name: string }
  | { kind: 'stop' };

export interface SessionStart {
  /** Telephony call identifier, when the transport carries one. */
  callSid?: string;
  streamSid?: string;
}

export interface DuplexTransport {
  readonly id: string;
  readonly kind: TransportKind;
  readonly logContext: Record<string, unknown>;
  /** Whether the local VAD should drive turn signals for this transport. */
  readonly vadEnabled: boolean;

  waitForStart(): Promise<SessionStart>;
  messages(): AsyncIterable<InboundMessage>;
  /** Normalizes one inbound frame to PCM16 at the model rate; throws DecodeError. */
  toModelAudio(audio: RawAudio): Buffer;

  sendReady(): void;
  sendAudio(pcm16: Buffer): void;
  clearPlayback(): void;
  notifyInterrupted(): void;
  sendKeepalive(): void;
  sendTranscription(direction: TranscriptionDirection, text: string): void;
  sendText(text: string): void;
  sendFunctionCall(call: ToolCall): void;
  sendTurnComplete(): void;
  sendError(message: string): void;
  close(reason: string): void;
}
