import { z } from 'zod';
import { modelToTransport, transportToModel } from '../audio/codec';
import { DecodeError, TransportDisconnect } from '../errors';
import { log } from '../log';
import type { ToolCall, TranscriptionDirection } from '../model/types';
import type { DuplexTransport, InboundMessage, RawAudio, SessionStart } from './types';
import { WS_OPEN, WsMessageQueue, type DuplexSocket } from './wsMessageQueue';

export const KEEPALIVE_MARK_NAME = 'keepalive';

const ConnectedEventSchema = z.object({
  event: z.literal('connected'),
  protocol: z.string().optional(),
});

const StartEventSchema = z.object({
  event: z.literal('start'),
  streamSid: z.string().optional(),
  start: z
    .object({
      streamSid: z.string().optional(),
      callSid: z.string().optional(),
      customParameters: z.record(z.string()).optional(),
      mediaFormat: z
        .object({
          encoding: z.string().optional(),
          sampleRate: z.number().optional(),
          channels: z.number().optional(),
        })
        .optional(),
    })
    .default({}),
});

const MediaEventSchema = z.object({
  event: z.literal('media'),
  media: z.object({
    payload: z.string(),
    track: z.string().optional(),
  }),
});

const MarkEventSchema = z.object({
  event: z.literal('mark'),
  mark: z.object({ name: z.string() }).default({ name: '' }),
});

const StopEventSchema = z.object({
  event: z.literal('stop'),
});

export const MediaStreamEventSchema = z.discriminatedUnion('event', [
  ConnectedEventSchema,
  StartEventSchema,
  MediaEventSchema,
  MarkEventSchema,
  StopEventSchema,
]);

export type MediaStreamEvent = z.infer<typeof MediaStreamEventSchema>;

export type TwilioMediaStreamOptions = {
  sessionId: string;
  vadEnabled?: boolean;
  maxBacklog?: number;
};

/** Telephony media stream: JSON envelopes carrying base64 mu-law @ 8 kHz. */
export class TwilioMediaStreamTransport implements DuplexTransport {
  public readonly id: string;
  public readonly kind = 'telephony' as const;
  public readonly logContext: Record<string, unknown>;
  public readonly vadEnabled: boolean;

  private readonly socket: DuplexSocket;
  private readonly frames: WsMessageQueue;
  private streamSid?: string;
  private callSid?: string;
  private closed = false;

  constructor(socket: DuplexSocket, options: TwilioMediaStreamOptions) {
    this.id = options.sessionId;
    this.socket = socket;
    this.vadEnabled = options.vadEnabled ?? true;
    this.logContext = { session_id: options.sessionId, transport: this.kind };
    this.frames = new WsMessageQueue(socket, { maxBacklog: options.maxBacklog, logContext: this.logContext });
  }

  public async waitForStart(): Promise<SessionStart> {
    while (true) {
      const next = await this.frames.next();
      if (next.done) {
        throw new TransportDisconnect('media stream closed before start');
      }

      const event = this.parse(next.value.data);
      if (!event) continue;

      switch (event.event) {
        case 'connected':
          log.info({ event: 'media_stream_connected', protocol: event.protocol, ...this.logContext }, 'media stream connected');
          break;
        case 'start': {
          this.streamSid = event.start.streamSid ?? event.streamSid;
          this.callSid = event.start.callSid;
          this.logContext.stream_sid = this.streamSid;
          this.logContext.call_sid = this.callSid;
          log.info(
            { event: 'media_stream_start', media_format: event.start.mediaFormat, ...this.logContext },
            'media stream started',
          );
          return { streamSid: this.streamSid, callSid: this.callSid };
        }
        case 'stop':
          throw new TransportDisconnect('media stream stopped before start');
        case 'media':
        case 'mark':
          log.debug({ event: 'media_before_start', kind: event.event, ...this.logContext }, 'frame before start dropped');
          break;
      }
    }
  }

  public async *messages(): AsyncGenerator<InboundMessage> {
    for await (const frame of this.frames) {
      const event = this.parse(frame.data);
      if (!event) continue;

      switch (event.event) {
        case 'media':
          if (event.media.track && event.media.track !== 'inbound') break;
          yield { kind: 'audio', audio: event.media.payload };
          break;
        case 'mark':
          yield { kind: 'mark', name: event.mark.name };
          break;
        case 'stop':
          yield { kind: 'stop' };
          return;
        case 'connected':
        case 'start':
          log.debug({ event: 'media_stream_duplicate', kind: event.event, ...this.logContext }, 'ignoring repeated envelope');
          break;
      }
    }
  }

  public toModelAudio(audio: RawAudio): Buffer {
    if (typeof audio !== 'string') {
      throw new DecodeError('media stream audio arrives as base64 mu-law, not binary frames');
    }
    return transportToModel(audio);
  }

  public sendReady(): void {
    log.info({ event: 'media_stream_ready', ...this.logContext }, 'media stream relaying');
  }

  public sendAudio(pcm16: Buffer): void {
    this.send({ event: 'media', streamSid: this.streamSid, media: { payload: modelToTransport(pcm16) } });
  }

  public clearPlayback(): void {
    this.send({ event: 'clear', streamSid: this.streamSid });
  }

  public notifyInterrupted(): void {
    this.clearPlayback();
  }

  public sendKeepalive(): void {
    this.send({ event: 'mark', streamSid: this.streamSid, mark: { name: KEEPALIVE_MARK_NAME } });
  }

  // The media stream has no channel for these; they are logged.
  public sendTranscription(direction: TranscriptionDirection, text: string): void {
    log.info({ event: 'transcription', direction, text, ...this.logContext }, 'transcription');
  }

  public sendText(text: string): void {
    log.info({ event: 'agent_text', text, ...this.logContext }, 'agent text');
  }

  public sendFunctionCall(call: ToolCall): void {
    log.info({ event: 'function_call', tool: call.name, ...this.logContext }, 'function call');
  }

  public sendTurnComplete(): void {
    log.debug({ event: 'turn_complete', ...this.logContext }, 'turn complete');
  }

  public sendError(message: string): void {
    log.warn({ event: 'session_error', message, ...this.logContext }, 'session error on media stream');
  }

  public close(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    this.frames.end();
    if (this.socket.readyState === WS_OPEN) {
      this.socket.close(1000, reason.slice(0, 120));
    }
  }

  private send(payload: Record<string, unknown>): void {
    if (this.closed || this.socket.readyState !== WS_OPEN) {
      throw new TransportDisconnect('media stream not open');
    }
    this.socket.send(JSON.stringify(payload), { binary: false });
  }

  private parse(data: Buffer): MediaStreamEvent | null {
    let json: unknown;
    try {
      json = JSON.parse(data.toString('utf8'));
    } catch (error) {
      log.warn({ err: error, event: 'media_frame_unparseable', ...this.logContext }, 'media frame is not json');
      return null;
    }

    const parsed = MediaStreamEventSchema.safeParse(json);
    if (!parsed.success) {
      log.debug({ event: 'media_frame_skipped', ...this.logContext }, 'unrecognised media stream envelope');
      return null;
    }
    return parsed.data;
  }
}
