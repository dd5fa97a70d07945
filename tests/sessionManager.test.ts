import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { DuplexSessionConfig } from '../src/calls/duplexSession';
import type { SessionFactory } from '../src/calls/sessionManager';
import { FakeDuplexSocket, FakeModelConnector, waitFor } from './helpers/fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

async function sessionFactory(connector: FakeModelConnector): Promise<SessionFactory> {
  const { DuplexSession, duplexSessionConfigFromEnv } = await import('../src/calls/duplexSession');
  const { parseEnv } = await import('../src/env');
  const { parseModelSessionConfig } = await import('../src/model/sessionConfig');
  const { ToolRegistry } = await import('../src/tools/toolRegistry');
  const config: DuplexSessionConfig = duplexSessionConfigFromEnv(
    parseEnv({ PORT: '3000', GEMINI_API_KEY: 'test' }),
    parseModelSessionConfig({ model: 'test-model' }),
  );
  return (transport) =>
    new DuplexSession({ transport, connector, tools: new ToolRegistry({ timeoutMs: 1000 }), config });
}

async function browserTransport(sessionId: string) {
  const { BrowserClientTransport } = await import('../src/transport/browserClient');
  const socket = new FakeDuplexSocket();
  return { socket, transport: new BrowserClientTransport(socket, { sessionId }) };
}

test('a started session is tracked until it ends', async () => {
  const { SessionManager } = await import('../src/calls/sessionManager');
  const manager = new SessionManager({ createSession: await sessionFactory(new FakeModelConnector()) });
  const { socket, transport } = await browserTransport('sm-1');

  const session = manager.startSession(transport);
  assert.equal(session?.id, 'sm-1');
  assert.equal(manager.activeCount(), 1);

  await waitFor(() => socket.jsonSent().length === 1);
  socket.disconnect(1000);
  const summary = await manager.waitForSession('sm-1');
  assert.equal(summary?.reason, 'inbound_completed');
  assert.equal(manager.activeCount(), 0);
  assert.equal(await manager.waitForSession('sm-1'), null);
});

test('a second transport with an active id is turned away', async () => {
  const { SessionManager } = await import('../src/calls/sessionManager');
  const manager = new SessionManager({ createSession: await sessionFactory(new FakeModelConnector()) });
  const first = await browserTransport('sm-2');
  const second = await browserTransport('sm-2');

  assert.notEqual(manager.startSession(first.transport), null);
  assert.equal(manager.startSession(second.transport), null);
  assert.deepEqual(second.socket.closes, [{ code: 1000, reason: 'duplicate_session' }]);

  await manager.shutdown('test_done');
});

test('sessions beyond capacity get an error and are closed', async () => {
  const { SessionManager } = await import('../src/calls/sessionManager');
  const manager = new SessionManager({
    createSession: await sessionFactory(new FakeModelConnector()),
    maxSessions: 1,
  });
  const first = await browserTransport('sm-3');
  const second = await browserTransport('sm-4');

  manager.startSession(first.transport);
  assert.equal(manager.startSession(second.transport), null);
  assert.deepEqual(second.socket.jsonSent(), [{ type: 'error', data: { message: 'capacity_reached' } }]);
  assert.deepEqual(second.socket.closes, [{ code: 1000, reason: 'capacity_reached' }]);
  assert.equal(manager.activeCount(), 1);

  await manager.shutdown('test_done');
});

test('stopSession and shutdown end sessions with the given reason', async () => {
  const { SessionManager } = await import('../src/calls/sessionManager');
  const manager = new SessionManager({ createSession: await sessionFactory(new FakeModelConnector()) });
  const a = await browserTransport('sm-5');
  const b = await browserTransport('sm-6');
  manager.startSession(a.transport);
  manager.startSession(b.transport);

  assert.equal(manager.stopSession('missing'), false);
  assert.equal(manager.stopSession('sm-5', 'operator_stop'), true);
  assert.equal((await manager.waitForSession('sm-5'))?.reason, 'operator_stop');

  await manager.shutdown('server_shutdown');
  assert.equal(manager.activeCount(), 0);
  assert.deepEqual(b.socket.closes, [{ code: 1000, reason: 'server_shutdown' }]);
});

test('the env-driven factory gives telephony sessions model config without automatic activity detection', async () => {
  const { createDuplexSessionFactory, SessionManager } = await import('../src/calls/sessionManager');
  const { parseEnv } = await import('../src/env');
  const { TwilioMediaStreamTransport } = await import('../src/transport/twilioMediaStream');
  const { buildToolRegistry } = await import('../src/server');

  const config = parseEnv({ PORT: '3000', GEMINI_API_KEY: 'test' });
  const connector = new FakeModelConnector();
  const manager = new SessionManager({
    createSession: createDuplexSessionFactory({ config, connector, tools: buildToolRegistry(config) }),
  });

  const socket = new FakeDuplexSocket();
  manager.startSession(new TwilioMediaStreamTransport(socket, { sessionId: 'sm-7' }));
  socket.receive({ event: 'start', start: { streamSid: 'MZ-test', callSid: 'CA-test' } });
  socket.receive({ event: 'stop' });
  await manager.waitForSession('sm-7');

  const [modelConfig] = connector.configs;
  assert.equal(modelConfig?.automaticVad.enabled, false);
  assert.deepEqual(
    modelConfig?.tools.map((tool) => tool.name),
    ['schedule_meeting'],
  );
});
