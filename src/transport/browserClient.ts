import { z } from 'zod';
import { decodeBase64Audio, SAMPLE_WIDTH } from '../audio/codec';
import { DecodeError, TransportDisconnect } from '../errors';
import { log } from '../log';
import type { ToolCall, TranscriptionDirection } from '../model/types';
import type { DuplexTransport, InboundMessage, RawAudio, SessionStart } from './types';
import { WS_OPEN, WsMessageQueue, type DuplexSocket } from './wsMessageQueue';

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('audio'), data: z.string() }),
  z.object({ type: z.literal('text'), data: z.string().min(1) }),
  z.object({ type: z.literal('end') }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type BrowserClientOptions = {
  sessionId: string;
  vadEnabled?: boolean;
  maxBacklog?: number;
};

const INTERRUPTED_MESSAGE = 'Response interrupted by user input';

/**
 * Interactive client: JSON control messages interleaved with raw PCM16 @ 24 kHz binary
 * frames. Audio goes back as binary, or as base64 JSON when the binary send fails.
 */
export class BrowserClientTransport implements DuplexTransport {
  public readonly id: string;
  public readonly kind = 'browser' as const;
  public readonly logContext: Record<string, unknown>;
  public readonly vadEnabled: boolean;

  private readonly socket: DuplexSocket;
  private readonly frames: WsMessageQueue;
  private closed = false;
  private binaryFallbacks = 0;

  constructor(socket: DuplexSocket, options: BrowserClientOptions) {
    this.id = options.sessionId;
    this.socket = socket;
    this.vadEnabled = options.vadEnabled ?? false;
    this.logContext = { session_id: options.sessionId, transport: this.kind };
    this.frames = new WsMessageQueue(socket, { maxBacklog: options.maxBacklog, logContext: this.logContext });
  }

  public async waitForStart(): Promise<SessionStart> {
    return {};
  }

  public async *messages(): AsyncGenerator<InboundMessage> {
    for await (const frame of this.frames) {
      if (frame.isBinary) {
        yield { kind: 'audio', audio: frame.data };
        continue;
      }

      const message = this.parse(frame.data);
      if (!message) continue;

      switch (message.type) {
        case 'audio':
          yield { kind: 'audio', audio: message.data };
          break;
        case 'text':
          yield { kind: 'text', text: message.data };
          break;
        case 'end':
          yield { kind: 'end_of_turn' };
          break;
      }
    }
  }

  public toModelAudio(audio: RawAudio): Buffer {
    const pcm16 = typeof audio === 'string' ? decodeBase64Audio(audio) : audio;
    if (pcm16.length % SAMPLE_WIDTH !== 0) {
      throw new DecodeError(`client audio has odd byte length ${pcm16.length}`);
    }
    return pcm16;
  }

  public sendReady(): void {
    this.sendJson({ type: 'ready', data: { session_id: this.id } });
  }

  public sendAudio(pcm16: Buffer): void {
    this.assertOpen();
    try {
      this.socket.send(pcm16, { binary: true }, (error) => {
        if (error) this.sendAudioFallback(pcm16, error);
      });
    } catch (error) {
      this.sendAudioFallback(pcm16, error);
    }
  }

  public clearPlayback(): void {
    this.notifyInterrupted();
  }

  public notifyInterrupted(): void {
    this.sendJson({ type: 'interrupted', data: { message: INTERRUPTED_MESSAGE } });
  }

  public sendKeepalive(): void {
    this.assertOpen();
    this.socket.ping();
  }

  public sendTranscription(direction: TranscriptionDirection, text: string): void {
    this.sendJson({ type: 'transcription', direction, data: text });
  }

  public sendText(text: string): void {
    this.sendJson({ type: 'text', data: text });
  }

  public sendFunctionCall(call: ToolCall): void {
    this.sendJson({ type: 'function_call', data: { name: call.name, args: call.args } });
  }

  public sendTurnComplete(): void {
    this.sendJson({ type: 'turn_complete' });
  }

  public sendError(message: string): void {
    this.sendJson({ type: 'error', data: { message } });
  }

  public close(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    this.frames.end();
    if (this.socket.readyState === WS_OPEN) {
      this.socket.close(1000, reason.slice(0, 120));
    }
  }

  private sendAudioFallback(pcm16: Buffer, error: unknown): void {
    this.binaryFallbacks += 1;
    if (this.binaryFallbacks === 1) {
      log.warn({ err: error, event: 'binary_send_failed', ...this.logContext }, 'binary audio send failed, using base64');
    }
    try {
      this.sendJson({ type: 'audio', data: pcm16.toString('base64') });
    } catch (fallbackError) {
      log.warn({ err: fallbackError, event: 'audio_fallback_failed', ...this.logContext }, 'base64 audio send failed');
    }
  }

  private assertOpen(): void {
    if (this.closed || this.socket.readyState !== WS_OPEN) {
      throw new TransportDisconnect('client socket not open');
    }
  }

  private sendJson(payload: Record<string, unknown>): void {
    this.assertOpen();
    this.socket.send(JSON.stringify(payload), { binary: false });
  }

  private parse(data: Buffer): ClientMessage | null {
    let json: unknown;
    try {
      json = JSON.parse(data.toString('utf8'));
    } catch (error) {
      log.warn({ err: error, event: 'client_frame_unparseable', ...this.logContext }, 'client frame is not json');
      return null;
    }

    const parsed = ClientMessageSchema.safeParse(json);
    if (!parsed.success) {
      log.warn({ event: 'client_message_unsupported', ...this.logContext }, 'unsupported client message');
      return null;
    }
    return parsed.data;
  }
}
