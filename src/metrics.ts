import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';
import { log } from './log';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures SECONDS; durations here are recorded in
 * milliseconds to match the *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'voice_relay_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [register],
});

const inboundAudioFramesTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_frames_total`,
  help: 'Inbound audio frames received from transports',
  labelNames: ['transport'] as const,
  registers: [register],
});

const inboundAudioFramesDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_frames_dropped_total`,
  help: 'Inbound audio frames dropped before reaching the model',
  labelNames: ['reason'] as const,
  registers: [register],
});

const outboundAudioChunksTotal = new client.Counter({
  name: `${METRICS_PREFIX}outbound_audio_chunks_total`,
  help: 'Model audio chunks delivered to transports',
  labelNames: ['transport'] as const,
  registers: [register],
});

const outboundAudioDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}outbound_audio_dropped_total`,
  help: 'Model audio chunks not delivered (duplicate, empty, stale after interruption)',
  labelNames: ['reason'] as const,
  registers: [register],
});

const interruptionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}interruptions_total`,
  help: 'Caller speech detected while the agent was speaking',
  labelNames: ['transport'] as const,
  registers: [register],
});

const activeSessions = new client.Gauge({
  name: `${METRICS_PREFIX}active_sessions`,
  help: 'Sessions currently relaying audio',
  labelNames: ['transport'] as const,
  registers: [register],
});

const sessionTeardownsTotal = new client.Counter({
  name: `${METRICS_PREFIX}session_teardowns_total`,
  help: 'Sessions torn down, by first cause',
  labelNames: ['transport', 'reason'] as const,
  registers: [register],
});

const sessionDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}session_duration_seconds`,
  help: 'Session duration in seconds',
  labelNames: ['transport'] as const,
  buckets: [5, 10, 30, 60, 120, 300, 900],
  registers: [register],
});

const responseLatencyMs = new client.Histogram({
  name: `${METRICS_PREFIX}response_latency_ms`,
  help: 'End-of-turn sent to first agent audio, in milliseconds',
  labelNames: ['transport'] as const,
  buckets: [100, 200, 300, 500, 750, 1000, 1500, 2500, 5000],
  registers: [register],
});

const toolInvocationsTotal = new client.Counter({
  name: `${METRICS_PREFIX}tool_invocations_total`,
  help: 'Tool calls requested by the model, by outcome',
  labelNames: ['tool', 'outcome'] as const,
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

function safely(metric: string, update: () => void): void {
  try {
    update();
  } catch (error) {
    log.debug({ err: error, metric }, 'metric update failed');
  }
}

function labelOrUnknown(value: string | undefined): string {
  return value && value.trim() !== '' ? value : 'unknown';
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  if (route && typeof route === 'object' && 'path' in route && typeof route.path === 'string') {
    return req.baseUrl ? `${req.baseUrl}${route.path}` : route.path;
  }

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b(CA|MZ)[0-9a-f]{32}\b/gi, ':sid')
    .replace(/\b\d{6,}\b/g, ':n');
}

// ---------- exports used by server ----------

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    safely('http_request_duration_ms', () => {
      httpRequestDurationMs.observe(
        { method: req.method, route: getRouteLabel(req), code: String(res.statusCode) },
        nsToMs(nowNs() - start),
      );
    });
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

// ---------- relay API ----------

export function incInboundAudioFrames(transport: string, count = 1): void {
  safely('inbound_audio_frames_total', () => inboundAudioFramesTotal.inc({ transport }, count));
}

export function incInboundAudioFramesDropped(reason: string, count = 1): void {
  safely('inbound_audio_frames_dropped_total', () =>
    inboundAudioFramesDroppedTotal.inc({ reason: labelOrUnknown(reason) }, count),
  );
}

export function incOutboundAudioChunks(transport: string, count = 1): void {
  safely('outbound_audio_chunks_total', () => outboundAudioChunksTotal.inc({ transport }, count));
}

export function incOutboundAudioDropped(reason: 'duplicate' | 'empty' | 'stale', count = 1): void {
  safely('outbound_audio_dropped_total', () => outboundAudioDroppedTotal.inc({ reason }, count));
}

export function incInterruptions(transport: string): void {
  safely('interruptions_total', () => interruptionsTotal.inc({ transport }));
}

export function observeResponseLatency(transport: string, latencyMs: number): void {
  safely('response_latency_ms', () => responseLatencyMs.observe({ transport }, latencyMs));
}

export function incToolInvocation(tool: string, outcome: 'success' | 'failure'): void {
  safely('tool_invocations_total', () => toolInvocationsTotal.inc({ tool, outcome }));
}

export function sessionStarted(transport: string): void {
  safely('active_sessions', () => activeSessions.inc({ transport }));
}

/** Records a teardown; pairs with sessionStarted. */
export function recordSessionEnd(opts: { transport: string; reason?: string; durationMs: number }): void {
  safely('session_teardowns_total', () => {
    activeSessions.dec({ transport: opts.transport });
    sessionTeardownsTotal.inc({ transport: opts.transport, reason: labelOrUnknown(opts.reason) });
    sessionDurationSeconds.observe({ transport: opts.transport }, opts.durationMs / 1000);
  });
}
