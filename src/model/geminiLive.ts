// src/model/geminiLive.ts
// Bidirectional model session over the Gemini Live (BidiGenerateContent) WebSocket
// protocol. Server frames are validated and mapped onto fixed-shape ModelEvents.

import WebSocket from 'ws';
import { z } from 'zod';
import { ModelSessionError } from '../errors';
import { log } from '../log';
import { AsyncQueue } from '../streams/asyncQueue';
import type { ModelSessionConfig } from './sessionConfig';
import {
  emptyModelEvent,
  type ContentPart,
  type ModelConnector,
  type ModelEvent,
  type ModelSender,
  type ModelSession,
  type ToolResult,
} from './types';

const WS_OPEN = 1;
const NORMAL_CLOSE = 1000;

export interface LiveSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: WebSocket.RawData) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type LiveSocketFactory = (url: string) => LiveSocket;

const PartSchema = z.object({
  text: z.string().optional(),
  inlineData: z
    .object({
      mimeType: z.string().optional(),
      data: z.string().optional(),
    })
    .optional(),
});

const TranscriptionSchema = z.object({ text: z.string().optional() }).optional();

export const ServerMessageSchema = z.object({
  setupComplete: z.object({}).passthrough().optional(),
  serverContent: z
    .object({
      modelTurn: z.object({ parts: z.array(PartSchema).optional() }).optional(),
      turnComplete: z.boolean().optional(),
      interrupted: z.boolean().optional(),
      generationComplete: z.boolean().optional(),
      inputTranscription: TranscriptionSchema,
      outputTranscription: TranscriptionSchema,
    })
    .optional(),
  toolCall: z
    .object({
      functionCalls: z
        .array(
          z.object({
            id: z.string().optional(),
            name: z.string(),
            args: z.record(z.unknown()).optional(),
          }),
        )
        .optional(),
    })
    .optional(),
  goAway: z.object({ timeLeft: z.string().optional() }).optional(),
});

export type ServerMessage = z.infer<typeof ServerMessageSchema>;

export function buildSetupMessage(config: ModelSessionConfig): Record<string, unknown> {
  const vad = config.automaticVad;
  const setup: Record<string, unknown> = {
    model: config.model.startsWith('models/') ? config.model : `models/${config.model}`,
    generationConfig: {
      responseModalities: config.responseModalities,
      speechConfig: {
        voiceConfig: { prebuiltVoiceConfig: { voiceName: config.voice } },
        languageCode: config.languageCode,
      },
      maxOutputTokens: config.maxOutputTokens,
      temperature: config.temperature,
      topP: config.topP,
      topK: config.topK,
      candidateCount: 1,
    },
    systemInstruction: { parts: [{ text: config.systemInstruction }] },
    realtimeInputConfig: {
      automaticActivityDetection: vad.enabled
        ? {
            disabled: false,
            startOfSpeechSensitivity: `START_SENSITIVITY_${vad.startSensitivity}`,
            endOfSpeechSensitivity: `END_SENSITIVITY_${vad.endSensitivity}`,
            prefixPaddingMs: vad.prefixPaddingMs,
            silenceDurationMs: vad.silenceDurationMs,
          }
        : { disabled: true },
      turnCoverage: 'TURN_INCLUDES_ONLY_ACTIVITY',
    },
  };

  if (config.inputTranscription) setup.inputAudioTranscription = {};
  if (config.outputTranscription) setup.outputAudioTranscription = {};
  if (config.tools.length > 0) {
    setup.tools = [{ functionDeclarations: config.tools }];
  }

  return { setup };
}

/** Maps one server frame to zero or more events (input and output transcripts split). */
export function mapServerMessage(message: ServerMessage): ModelEvent[] {
  const events: ModelEvent[] = [];
  const content = message.serverContent;

  if (content) {
    const event = emptyModelEvent();
    const parts: ContentPart[] = [];
    for (const part of content.modelTurn?.parts ?? []) {
      if (part.inlineData?.data !== undefined) {
        parts.push({
          kind: 'audio',
          data: Buffer.from(part.inlineData.data, 'base64'),
          mimeType: part.inlineData.mimeType ?? 'audio/pcm;rate=24000',
        });
      }
      if (part.text) {
        parts.push({ kind: 'text', text: part.text });
      }
    }
    event.parts = parts;
    event.stateDelta = {
      turnComplete: content.turnComplete === true,
      interrupted: content.interrupted === true,
    };
    if (content.outputTranscription?.text) {
      event.transcription = { direction: 'output', text: content.outputTranscription.text };
    }

    if (content.inputTranscription?.text) {
      const inputEvent = emptyModelEvent();
      inputEvent.transcription = { direction: 'input', text: content.inputTranscription.text };
      events.push(inputEvent);
    }

    const meaningful =
      event.parts.length > 0 ||
      event.transcription !== null ||
      event.stateDelta.turnComplete ||
      event.stateDelta.interrupted;
    if (meaningful) {
      events.push(event);
    }
  }

  const calls = message.toolCall?.functionCalls ?? [];
  if (calls.length > 0) {
    const event = emptyModelEvent();
    event.toolCalls = calls.map((call) => ({ id: call.id, name: call.name, args: call.args ?? {} }));
    events.push(event);
  }

  return events;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

class GeminiLiveSession implements ModelSender {
  public readonly events = new AsyncQueue<ModelEvent>();
  private closedByUs = false;

  constructor(
    private readonly socket: LiveSocket,
    private readonly logContext: Record<string, unknown>,
  ) {}

  public attach(): void {
    this.socket.on('message', (data) => this.onMessage(data));
    this.socket.on('close', (code, reason) => {
      const reasonText = reason.toString('utf8');
      if (this.closedByUs || code === NORMAL_CLOSE) {
        this.events.end();
      } else {
        this.events.end(
          new ModelSessionError(`model_stream_closed code=${code} reason=${reasonText}`, { closeCode: code }),
        );
      }
      log.info(
        { event: 'model_socket_closed', code, reason: reasonText, closed_by_us: this.closedByUs, ...this.logContext },
        'model socket closed',
      );
    });
    this.socket.on('error', (error) => {
      log.error({ err: error, event: 'model_socket_error', ...this.logContext }, 'model socket error');
      this.events.end(new ModelSessionError('model_socket_error', { cause: error }));
    });
  }

  public sendAudio(pcm16: Buffer, sampleRateHz: number): void {
    this.send({
      realtimeInput: {
        audio: { data: pcm16.toString('base64'), mimeType: `audio/pcm;rate=${sampleRateHz}` },
      },
    });
  }

  public sendText(text: string): void {
    this.send({ realtimeInput: { text } });
  }

  public sendEndOfTurn(): void {
    this.send({ realtimeInput: { audioStreamEnd: true } });
  }

  public sendToolResult(results: ToolResult[]): void {
    if (results.length === 0) return;
    this.send({
      toolResponse: {
        functionResponses: results.map((result) => ({
          id: result.id,
          name: result.name,
          response: result.response,
        })),
      },
    });
  }

  public close(reason = 'session_closed'): void {
    if (this.closedByUs) return;
    this.closedByUs = true;
    this.events.end();
    try {
      this.socket.close(NORMAL_CLOSE, reason);
    } catch (error) {
      log.warn({ err: error, ...this.logContext }, 'model socket close failed');
    }
  }

  private send(payload: Record<string, unknown>): void {
    if (this.socket.readyState !== WS_OPEN) {
      throw new ModelSessionError('model_socket_not_open');
    }
    this.socket.send(JSON.stringify(payload));
  }

  private onMessage(data: WebSocket.RawData): void {
    let json: unknown;
    try {
      json = JSON.parse(rawDataToString(data));
    } catch (error) {
      log.warn({ err: error, event: 'model_frame_unparseable', ...this.logContext }, 'model frame not json');
      return;
    }

    const parsed = ServerMessageSchema.safeParse(json);
    if (!parsed.success) {
      log.warn(
        { event: 'model_frame_invalid', issues: parsed.error.issues.length, ...this.logContext },
        'model frame failed validation',
      );
      return;
    }

    if (parsed.data.goAway) {
      log.warn({ event: 'model_go_away', time_left: parsed.data.goAway.timeLeft, ...this.logContext }, 'model go away');
    }

    for (const event of mapServerMessage(parsed.data)) {
      this.events.push(event);
    }
  }
}

export type GeminiLiveConnectorOptions = {
  apiKey: string;
  url: string;
  setupTimeoutMs: number;
  createSocket?: LiveSocketFactory;
};

const defaultSocketFactory: LiveSocketFactory = (url) => new WebSocket(url);

export class GeminiLiveConnector implements ModelConnector {
  private readonly apiKey: string;
  private readonly url: string;
  private readonly setupTimeoutMs: number;
  private readonly createSocket: LiveSocketFactory;

  constructor(options: GeminiLiveConnectorOptions) {
    this.apiKey = options.apiKey;
    this.url = options.url;
    this.setupTimeoutMs = options.setupTimeoutMs;
    this.createSocket = options.createSocket ?? defaultSocketFactory;
  }

  public async openSession(
    sessionId: string,
    config: ModelSessionConfig,
    logContext: Record<string, unknown> = {},
  ): Promise<ModelSession> {
    const url = `${this.url}?key=${encodeURIComponent(this.apiKey)}`;
    const socket = this.createSocket(url);
    const context = { model_session_id: sessionId, ...logContext };

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const finish = (error?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          try {
            socket.close(NORMAL_CLOSE, 'setup_failed');
          } catch (closeError) {
            log.debug({ err: closeError, ...context }, 'model socket close after setup failure failed');
          }
          reject(error);
        } else {
          resolve();
        }
      };
      const timer = setTimeout(
        () => finish(new ModelSessionError(`model_setup_timeout after ${this.setupTimeoutMs}ms`)),
        this.setupTimeoutMs,
      );

      socket.on('open', () => {
        try {
          socket.send(JSON.stringify(buildSetupMessage(config)));
        } catch (error) {
          finish(new ModelSessionError('model_setup_send_failed', { cause: error }));
        }
      });
      socket.on('message', (data) => {
        if (settled) return;
        try {
          const parsed = ServerMessageSchema.safeParse(JSON.parse(rawDataToString(data)));
          if (parsed.success && parsed.data.setupComplete) {
            finish();
          }
        } catch (error) {
          log.debug({ err: error, ...context }, 'model setup frame not json');
        }
      });
      socket.on('close', (code) => finish(new ModelSessionError(`model_closed_during_setup code=${code}`, { closeCode: code })));
      socket.on('error', (error) => finish(new ModelSessionError('model_connect_failed', { cause: error })));
    });

    const session = new GeminiLiveSession(socket, context);
    session.attach();

    log.info({ event: 'model_session_open', model: config.model, ...context }, 'model session open');

    return { id: sessionId, sender: session, events: session.events };
  }
}
