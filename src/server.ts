import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import type { Duplex } from 'stream';
import WebSocket, { WebSocketServer } from 'ws';
import { createDuplexSessionFactory, SessionManager } from './calls/sessionManager';
import { env, type Env } from './env';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { GeminiLiveConnector } from './model/geminiLive';
import type { ModelConnector } from './model/types';
import { createHealthRouter } from './routes/health';
import { createTwilioWebhookRouter, MEDIA_STREAM_PATH } from './routes/twilioWebhook';
import { createScheduleMeetingTool } from './tools/scheduleMeeting';
import { ToolRegistry } from './tools/toolRegistry';
import { BrowserClientTransport } from './transport/browserClient';
import { TwilioMediaStreamTransport } from './transport/twilioMediaStream';
import type { DuplexTransport } from './transport/types';

export const CLIENT_WS_PATH = '/ws';

type UpgradeTarget = 'browser' | 'telephony';

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  log.error({ err, requestId: res.locals.requestId }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export function resolveUpgradeTarget(rawUrl: string | undefined, host = 'localhost'): UpgradeTarget | null {
  if (!rawUrl) {
    return null;
  }
  const { pathname } = new URL(rawUrl, `http://${host}`);
  const normalized = pathname.replace(/\/$/, '');
  if (normalized === CLIENT_WS_PATH) return 'browser';
  if (normalized === MEDIA_STREAM_PATH) return 'telephony';
  return null;
}

export function buildToolRegistry(config: Env): ToolRegistry {
  return new ToolRegistry({ timeoutMs: config.TOOL_TIMEOUT_MS }).register(
    createScheduleMeetingTool(config.SCHEDULING_WEBHOOK_URL),
  );
}

function attachWebSocketServer(
  server: http.Server,
  createTransport: (target: UpgradeTarget, ws: WebSocket) => DuplexTransport,
  sessionManager: SessionManager,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    const target = resolveUpgradeTarget(request.url, request.headers.host);
    if (!target) {
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      const transport = createTransport(target, ws);
      log.info({ event: 'ws_connected', path: request.url, ...transport.logContext }, 'websocket connected');
      sessionManager.startSession(transport);
    });
  });

  return wss;
}

export type ServerDeps = {
  config?: Env;
  connector?: ModelConnector;
  tools?: ToolRegistry;
};

export function buildServer(deps: ServerDeps = {}): {
  app: express.Express;
  server: http.Server;
  sessionManager: SessionManager;
  wss: WebSocketServer;
} {
  const config = deps.config ?? env;
  const connector =
    deps.connector ??
    new GeminiLiveConnector({
      apiKey: config.GEMINI_API_KEY,
      url: config.GEMINI_LIVE_URL,
      setupTimeoutMs: config.GEMINI_SETUP_TIMEOUT_MS,
    });
  const tools = deps.tools ?? buildToolRegistry(config);
  const sessionManager = new SessionManager({
    createSession: createDuplexSessionFactory({ config, connector, tools }),
    maxSessions: config.MAX_CONCURRENT_SESSIONS,
  });

  const app = express();
  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use('/health', createHealthRouter(sessionManager));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/twilio', createTwilioWebhookRouter({ publicBaseUrl: config.PUBLIC_BASE_URL }));

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachWebSocketServer(
    server,
    (target, ws) => {
      const sessionId = randomUUID();
      return target === 'telephony'
        ? new TwilioMediaStreamTransport(ws, { sessionId })
        : new BrowserClientTransport(ws, { sessionId, vadEnabled: config.BROWSER_LOCAL_VAD_ENABLED });
    },
    sessionManager,
  );

  return { app, server, sessionManager, wss };
}
