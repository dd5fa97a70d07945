import type { ModelSessionConfig } from './sessionConfig';

export type ContentPart =
  | { kind: 'audio'; data: Buffer; mimeType: string }
  | { kind: 'text'; text: string };

export type TranscriptionDirection = 'input' | 'output';

export interface Transcription {
  direction: TranscriptionDirection;
  text: string;
}

export interface ToolCall {
  id?: string;
  name: string;
  args: Record<string, unknown>;
}

export interface ToolResult {
  id?: string;
  name: string;
  response: Record<string, unknown>;
}

export interface StateDelta {
  turnComplete: boolean;
  interrupted: boolean;
}

/** One frame from the model; every field is always present so consumers match exhaustively. */
export interface ModelEvent {
  transcription: Transcription | null;
  parts: ContentPart[];
  toolCalls: ToolCall[];
  stateDelta: StateDelta;
}

export interface ModelSender {
  sendAudio(pcm16: Buffer, sampleRateHz: number): void;
  sendText(text: string): void;
  sendEndOfTurn(): void;
  sendToolResult(results: ToolResult[]): void;
  close(reason?: string): Promise<void> | void;
}

export interface ModelSession {
  id: string;
  sender: ModelSender;
  events: AsyncIterable<ModelEvent>;
}

export interface ModelConnector {
  openSession(
    sessionId: string,
    config: ModelSessionConfig,
    logContext?: Record<string, unknown>,
  ): Promise<ModelSession>;
}

export function emptyModelEvent(): ModelEvent {
  return {
    transcription: null,
    parts: [],
    toolCalls: [],
    stateDelta: { turnComplete: false, interrupted: false },
  };
}
