import { env } from './env';
import { log } from './log';
import { buildServer } from './server';

const { server, sessionManager, wss } = buildServer();

server.listen(env.PORT, () => {
  log.info({ port: env.PORT, model: env.GEMINI_MODEL }, 'server listening');
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal, active_sessions: sessionManager.activeCount() }, 'shutting down');

  await sessionManager.shutdown(`signal_${signal.toLowerCase()}`);
  wss.close();
  server.close((error) => {
    if (error) {
      log.error({ err: error }, 'http server close failed');
      process.exitCode = 1;
    }
  });
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log.error({ err: error }, 'shutdown failed');
      process.exitCode = 1;
    });
  });
}
