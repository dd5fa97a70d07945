import { Request, Router } from 'express';
import { z } from 'zod';
import { log } from '../log';

export const MEDIA_STREAM_PATH = '/twilio/media-stream';

const GREETING = 'Connecting you to the AI assistant.';
const FAILURE_APOLOGY = 'Sorry, there was an error connecting your call. Please try again later.';

const IncomingCallSchema = z.object({
  CallSid: z.string().min(1),
  From: z.string().optional(),
  To: z.string().optional(),
});

const StatusCallbackSchema = z.object({
  CallSid: z.string().min(1),
  CallStatus: z.string().min(1),
  CallDuration: z.string().optional(),
});

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** http(s) base URL (or bare host) to the media stream's ws(s) URL. */
export function buildMediaStreamUrl(base: string): string {
  const trimmedBase = base.replace(/\/$/, '');
  let wsBase = trimmedBase;
  if (trimmedBase.startsWith('https://')) {
    wsBase = `wss://${trimmedBase.slice('https://'.length)}`;
  } else if (trimmedBase.startsWith('http://')) {
    wsBase = `ws://${trimmedBase.slice('http://'.length)}`;
  } else if (!trimmedBase.startsWith('ws://') && !trimmedBase.startsWith('wss://')) {
    wsBase = `wss://${trimmedBase}`;
  }
  return `${wsBase}${MEDIA_STREAM_PATH}`;
}

export function buildConnectTwiml(streamUrl: string): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<Response>',
    `  <Say>${escapeXml(GREETING)}</Say>`,
    '  <Connect>',
    `    <Stream url="${escapeXml(streamUrl)}"></Stream>`,
    '  </Connect>',
    '</Response>',
  ].join('\n');
}

export function buildHangupTwiml(): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<Response>',
    `  <Say>${escapeXml(FAILURE_APOLOGY)}</Say>`,
    '  <Hangup/>',
    '</Response>',
  ].join('\n');
}

function requestBase(req: Request): string | undefined {
  const forwardedHost = req.header('x-forwarded-host');
  const host = forwardedHost ?? req.header('host');
  if (!host) return undefined;
  const forwardedProto = req.header('x-forwarded-proto')?.split(',')[0]?.trim();
  return `${forwardedProto || req.protocol}://${host}`;
}

export function createTwilioWebhookRouter(options: { publicBaseUrl?: string }): Router {
  const router = Router();

  router.post('/incoming', (req: Request, res) => {
    const requestId: unknown = res.locals.requestId;
    res.type('application/xml');

    const parsed = IncomingCallSchema.safeParse(req.body);
    const base = options.publicBaseUrl ?? requestBase(req);
    if (!parsed.success || !base) {
      log.warn(
        { event: 'incoming_call_rejected', valid_body: parsed.success, has_base_url: Boolean(base), requestId },
        'incoming call could not be connected',
      );
      res.status(200).send(buildHangupTwiml());
      return;
    }

    const streamUrl = buildMediaStreamUrl(base);
    log.info(
      {
        event: 'incoming_call',
        call_sid: parsed.data.CallSid,
        from: parsed.data.From,
        to: parsed.data.To,
        stream_url: streamUrl,
        requestId,
      },
      'incoming call connected to media stream',
    );
    res.status(200).send(buildConnectTwiml(streamUrl));
  });

  router.post('/status', (req: Request, res) => {
    const requestId: unknown = res.locals.requestId;
    const parsed = StatusCallbackSchema.safeParse(req.body);
    if (!parsed.success) {
      log.warn({ event: 'call_status_invalid', requestId }, 'call status callback missing fields');
      res.status(400).json({ status: 'error', message: 'CallSid and CallStatus are required' });
      return;
    }

    const { CallSid, CallStatus, CallDuration } = parsed.data;
    const fields = { event: 'call_status', call_sid: CallSid, call_status: CallStatus, duration_s: CallDuration, requestId };
    if (CallStatus === 'failed' || CallStatus === 'busy' || CallStatus === 'no-answer') {
      log.warn(fields, 'call did not complete');
    } else {
      log.info(fields, 'call status update');
    }
    res.status(200).json({ status: 'ok' });
  });

  return router;
}
