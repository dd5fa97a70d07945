import assert from 'node:assert/strict';
import { test } from 'node:test';
import { z } from 'zod';
import type { DuplexSessionConfig } from '../src/calls/duplexSession';
import type { ToolRegistry } from '../src/tools/toolRegistry';
import type { DuplexTransport } from '../src/transport/types';
import { audioEvent, FakeDuplexSocket, FakeModelConnector, modelEvent, pcmFrame, waitFor } from './helpers/fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

const START = { event: 'start', streamSid: 'MZ-test', start: { streamSid: 'MZ-test', callSid: 'CA-test' } };
const SILENT_PAYLOAD = Buffer.alloc(160, 0xff).toString('base64');

async function loudPayload(): Promise<string> {
  const { encodeMuLaw } = await import('../src/audio/codec');
  return encodeMuLaw(pcmFrame(16000, 160)).toString('base64');
}

async function sessionConfig(overrides: Partial<DuplexSessionConfig> = {}): Promise<DuplexSessionConfig> {
  const { parseModelSessionConfig } = await import('../src/model/sessionConfig');
  return {
    vad: {
      frameDurationMs: 20,
      speechThreshold: 0.3,
      silenceDurationMs: 300,
      minSpeechDurationMs: 200,
      noiseFloorMultiplier: 3,
    },
    batch: { minDurationMs: 150, defaultDurationMs: 200, maxDurationMs: 300, adaptive: false },
    dedup: { maxEntries: 100, evictBatch: 20 },
    outboundMinIntervalMs: 0,
    keepaliveIntervalMs: 60_000,
    silenceFallbackMs: 0,
    model: parseModelSessionConfig({ model: 'test-model' }),
    ...overrides,
  };
}

async function startSession(
  transport: DuplexTransport,
  connector: FakeModelConnector,
  options: { config?: Partial<DuplexSessionConfig>; tools?: ToolRegistry } = {},
) {
  const { DuplexSession } = await import('../src/calls/duplexSession');
  const { ToolRegistry } = await import('../src/tools/toolRegistry');
  const session = new DuplexSession({
    transport,
    connector,
    tools: options.tools ?? new ToolRegistry({ timeoutMs: 1000 }),
    config: await sessionConfig(options.config),
  });
  return { session, running: session.run() };
}

async function telephony(sessionId: string) {
  const { TwilioMediaStreamTransport } = await import('../src/transport/twilioMediaStream');
  const socket = new FakeDuplexSocket();
  const transport = new TwilioMediaStreamTransport(socket, { sessionId });
  socket.receive(START);
  return { socket, transport };
}

async function browser(sessionId: string) {
  const { BrowserClientTransport } = await import('../src/transport/browserClient');
  const socket = new FakeDuplexSocket();
  return { socket, transport: new BrowserClientTransport(socket, { sessionId }) };
}

function mediaEvents(socket: FakeDuplexSocket, name: string): unknown[] {
  return socket
    .jsonSent()
    .filter((message) => typeof message === 'object' && message !== null && 'event' in message && message.event === name);
}

test('a spoken turn between silences yields one start, one end and an end-of-turn', async () => {
  const { socket, transport } = await telephony('e2e-1');
  const connector = new FakeModelConnector();
  const loud = await loudPayload();

  for (let i = 0; i < 100; i += 1) socket.receive({ event: 'media', media: { payload: SILENT_PAYLOAD } });
  for (let i = 0; i < 50; i += 1) socket.receive({ event: 'media', media: { payload: loud } });
  for (let i = 0; i < 100; i += 1) socket.receive({ event: 'media', media: { payload: SILENT_PAYLOAD } });
  socket.receive({ event: 'stop' });

  const { running } = await startSession(transport, connector);
  const summary = await running;

  assert.equal(summary.reason, 'inbound_completed');
  assert.equal(summary.error, undefined);
  assert.equal(summary.stats.framesIn, 250);
  assert.equal(summary.stats.speechStarts, 1);
  assert.equal(summary.stats.speechEnds, 1);
  assert.equal(summary.stats.endOfTurnsSent, 1);

  const sent = connector.sender.sent;
  const endIndex = sent.findIndex((item) => item.kind === 'end_of_turn');
  assert.ok(endIndex > 0);
  const bytesBeforeEnd = sent
    .slice(0, endIndex)
    .reduce((sum, item) => sum + (item.kind === 'audio' ? item.bytes : 0), 0);
  assert.equal(bytesBeforeEnd, 152 * 960);
  assert.equal(connector.sender.audioBytes(), 250 * 960);
  assert.ok(sent.every((item) => item.kind !== 'audio' || item.sampleRateHz === 24000));

  assert.equal(connector.configs.length, 1);
  assert.equal(connector.sender.closed, 1);
  assert.deepEqual(mediaEvents(socket, 'clear'), []);
  assert.deepEqual(socket.closes, [{ code: 1000, reason: 'inbound_completed' }]);
});

test('a repeated audio chunk within one turn reaches the client once', async () => {
  const { socket, transport } = await browser('e2e-2');
  const connector = new FakeModelConnector();
  const chunk = pcmFrame(1200, 480);

  const { running } = await startSession(transport, connector);
  connector.events.push(audioEvent(chunk));
  connector.events.push(audioEvent(Buffer.from(chunk)));
  connector.events.push(modelEvent({ stateDelta: { turnComplete: true, interrupted: false } }));

  await waitFor(() => socket.jsonSent().some((message) => JSON.stringify(message) === '{"type":"turn_complete"}'));
  assert.deepEqual(socket.binarySent(), [chunk]);

  connector.events.push(audioEvent(chunk));
  await waitFor(() => socket.binarySent().length === 2);

  socket.disconnect(1000);
  const summary = await running;
  assert.equal(summary.reason, 'inbound_completed');
  assert.equal(summary.stats.duplicatesDropped, 1);
  assert.equal(summary.stats.audioChunksOut, 2);
  assert.deepEqual(socket.jsonSent()[0], { type: 'ready', data: { session_id: 'e2e-2' } });
});

test('caller speech during agent playback clears it and drops the stale remainder', async () => {
  const { socket, transport } = await telephony('e2e-3');
  const connector = new FakeModelConnector();
  const { session, running } = await startSession(transport, connector);

  connector.events.push(audioEvent(pcmFrame(500, 480)));
  await waitFor(() => mediaEvents(socket, 'media').length === 1);
  assert.equal(session.snapshot().isAgentSpeaking, true);

  socket.receive({ event: 'media', media: { payload: await loudPayload() } });
  await waitFor(() => mediaEvents(socket, 'clear').length === 1);
  assert.equal(session.snapshot().isAgentSpeaking, false);
  assert.equal(session.snapshot().interruptionEpoch, 1);

  connector.events.push(audioEvent(pcmFrame(600, 480)));
  connector.events.push(modelEvent({ stateDelta: { turnComplete: false, interrupted: true } }));
  await waitFor(() => mediaEvents(socket, 'clear').length === 2);
  assert.equal(mediaEvents(socket, 'media').length, 1);

  connector.events.push(audioEvent(pcmFrame(700, 480)));
  await waitFor(() => mediaEvents(socket, 'media').length === 2);

  socket.receive({ event: 'stop' });
  const summary = await running;
  assert.equal(summary.stats.interruptions, 1);
  assert.equal(summary.stats.staleDropped, 1);
  assert.equal(summary.stats.audioChunksOut, 2);
});

test('a stop mid-batch flushes the partial buffer exactly once', async () => {
  const { socket, transport } = await telephony('e2e-4');
  const connector = new FakeModelConnector();

  for (let i = 0; i < 3; i += 1) socket.receive({ event: 'media', media: { payload: SILENT_PAYLOAD } });
  socket.receive({ event: 'stop' });
  socket.receive({ event: 'media', media: { payload: SILENT_PAYLOAD } });

  const { running } = await startSession(transport, connector);
  const summary = await running;

  assert.equal(summary.reason, 'inbound_completed');
  assert.deepEqual(connector.sender.sent, [{ kind: 'audio', bytes: 2880, sampleRateHz: 24000 }]);
  assert.equal(summary.stats.batchesSent, 1);
});

test('client text is forwarded and closes the user turn', async () => {
  const { socket, transport } = await browser('text-1');
  const connector = new FakeModelConnector();
  const { running } = await startSession(transport, connector);
  await waitFor(() => socket.jsonSent().length === 1);

  socket.receiveBinary(pcmFrame(100, 240));
  socket.receive({ type: 'text', data: 'book a meeting' });
  socket.receive({ type: 'end' });
  socket.disconnect(1000);
  await running;

  assert.deepEqual(connector.sender.sent, [
    { kind: 'audio', bytes: 480, sampleRateHz: 24000 },
    { kind: 'text', text: 'book a meeting' },
    { kind: 'end_of_turn' },
    { kind: 'end_of_turn' },
  ]);
});

test('model transcripts, text and resampled audio reach the browser', async () => {
  const { socket, transport } = await browser('out-1');
  const connector = new FakeModelConnector();
  const { running } = await startSession(transport, connector);

  connector.events.push(modelEvent({ transcription: { direction: 'input', text: 'hello' } }));
  connector.events.push(
    modelEvent({
      transcription: { direction: 'output', text: 'Hi!' },
      parts: [
        { kind: 'audio', data: pcmFrame(800, 160), mimeType: 'audio/pcm;rate=16000' },
        { kind: 'text', text: 'Hi!' },
      ],
    }),
  );
  await waitFor(() => socket.jsonSent().length === 4);

  assert.deepEqual(socket.jsonSent().slice(1), [
    { type: 'transcription', direction: 'input', data: 'hello' },
    { type: 'transcription', direction: 'output', data: 'Hi!' },
    { type: 'text', data: 'Hi!' },
  ]);
  assert.equal(socket.binarySent()[0]?.length, 480);

  socket.disconnect(1000);
  await running;
});

test('tool calls run through the registry and their results go back to the model', async () => {
  const { ToolRegistry } = await import('../src/tools/toolRegistry');
  const tools = new ToolRegistry({ timeoutMs: 1000 }).register({
    name: 'lookup',
    description: 'Look up an order',
    parameters: {},
    schema: z.object({ order: z.string() }),
    handler: async (args) => ({ success: true, status: `order ${args.order} shipped` }),
  });
  const { socket, transport } = await browser('tool-1');
  const connector = new FakeModelConnector();
  const { running } = await startSession(transport, connector, { tools });

  connector.events.push(modelEvent({ toolCalls: [{ id: 'c1', name: 'lookup', args: { order: '42' } }] }));
  await waitFor(() => connector.sender.sent.length === 1);

  assert.deepEqual(connector.sender.sent, [
    {
      kind: 'tool_result',
      results: [{ id: 'c1', name: 'lookup', response: { success: true, status: 'order 42 shipped' } }],
    },
  ]);
  assert.deepEqual(socket.jsonSent()[1], { type: 'function_call', data: { name: 'lookup', args: { order: '42' } } });

  socket.disconnect(1000);
  const summary = await running;
  assert.equal(summary.stats.toolCalls, 1);
});

test('the silence fallback ends a turn when inbound audio stops arriving', async () => {
  const { socket, transport } = await telephony('quiet-1');
  const connector = new FakeModelConnector();
  const { running } = await startSession(transport, connector, { config: { silenceFallbackMs: 60 } });

  socket.receive({ event: 'media', media: { payload: await loudPayload() } });
  await waitFor(() => connector.sender.sent.some((item) => item.kind === 'end_of_turn'));

  socket.receive({ event: 'stop' });
  const summary = await running;
  assert.equal(summary.stats.speechStarts, 1);
  assert.equal(summary.stats.speechEnds, 0);
  assert.equal(summary.stats.endOfTurnsSent, 1);
});

test('a model failure ends the session and tells the browser', async () => {
  const { ModelSessionError } = await import('../src/errors');
  const { socket, transport } = await browser('fail-1');
  const connector = new FakeModelConnector();
  const { running } = await startSession(transport, connector);

  connector.events.end(new ModelSessionError('model_stream_closed code=1011 reason=overloaded'));
  const summary = await running;

  assert.equal(summary.reason, 'outbound_failed');
  assert.ok(summary.error instanceof ModelSessionError);
  assert.deepEqual(socket.jsonSent().at(-1), {
    type: 'error',
    data: { message: 'model_stream_closed code=1011 reason=overloaded' },
  });
  assert.deepEqual(socket.closes, [{ code: 1000, reason: 'outbound_failed' }]);
});

test('a failed model connection is reported as a startup failure', async () => {
  const { ModelSessionError } = await import('../src/errors');
  const { socket, transport } = await browser('fail-2');
  const connector = new FakeModelConnector();
  connector.failWith = new ModelSessionError('model_setup_timeout after 200ms');

  const { running } = await startSession(transport, connector);
  const summary = await running;

  assert.equal(summary.reason, 'startup_failed');
  assert.deepEqual(socket.jsonSent(), [{ type: 'error', data: { message: 'model_setup_timeout after 200ms' } }]);
  assert.equal(connector.sender.closed, 0);
});

test('stop() ends a running session with the given reason', async () => {
  const { socket, transport } = await browser('stop-1');
  const connector = new FakeModelConnector();
  const { session, running } = await startSession(transport, connector);

  await waitFor(() => socket.jsonSent().length === 1);
  session.stop('server_shutdown');
  const summary = await running;

  assert.equal(summary.reason, 'server_shutdown');
  assert.equal(summary.error, undefined);
  assert.deepEqual(socket.closes, [{ code: 1000, reason: 'server_shutdown' }]);
  await assert.rejects(session.run(), /already started/);
});

function within<T>(promise: Promise<T>, ms: number): Promise<T | 'timed_out'> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<'timed_out'>((resolve) => {
    timer = setTimeout(() => resolve('timed_out'), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

test('a model failure with an idle client still tears the session down promptly', async () => {
  const { ModelSessionError } = await import('../src/errors');
  const { socket, transport } = await browser('idle-1');
  const connector = new FakeModelConnector();
  const { running } = await startSession(transport, connector);
  await waitFor(() => socket.jsonSent().length === 1);

  connector.events.end(new ModelSessionError('boom'));
  const summary = await within(running, 1000);

  assert.notEqual(summary, 'timed_out');
  assert.deepEqual(socket.jsonSent().at(-1), { type: 'error', data: { message: 'boom' } });
  assert.deepEqual(socket.closes, [{ code: 1000, reason: 'outbound_failed' }]);
  assert.equal(connector.sender.closed, 1);
});

test('a failing keepalive ends the session', async () => {
  const { socket, transport } = await browser('ka-1');
  const connector = new FakeModelConnector();
  const { running } = await startSession(transport, connector, { config: { keepaliveIntervalMs: 10 } });

  await waitFor(() => socket.pings >= 2);
  socket.failPing = true;
  const summary = await running;

  assert.equal(summary.reason, 'keepalive_failed');
  assert.ok(summary.error instanceof Error);
  assert.equal(summary.error.message, 'ping refused');
  assert.deepEqual(socket.jsonSent().at(-1), { type: 'error', data: { message: 'ping refused' } });
  assert.deepEqual(socket.closes, [{ code: 1000, reason: 'keepalive_failed' }]);
});

test('outbound pacing delays agent audio without dropping any of it', async () => {
  const { socket, transport } = await browser('pace-1');
  const connector = new FakeModelConnector();
  const { running } = await startSession(transport, connector, { config: { outboundMinIntervalMs: 40 } });

  const chunks = [pcmFrame(100, 480), pcmFrame(200, 480), pcmFrame(300, 480)];
  const pushedAt = Date.now();
  for (const chunk of chunks) connector.events.push(audioEvent(chunk));

  await waitFor(() => socket.binarySent().length === 3);
  assert.ok(Date.now() - pushedAt >= 70);
  assert.deepEqual(socket.binarySent(), chunks);

  socket.disconnect(1000);
  const summary = await running;
  assert.equal(summary.stats.audioChunksOut, 3);
  assert.equal(summary.stats.staleDropped, 0);
  assert.equal(summary.stats.duplicatesDropped, 0);
});

test('an undecodable inbound frame is dropped and the session carries on', async () => {
  const { socket, transport } = await browser('bad-1');
  const connector = new FakeModelConnector();
  const { running } = await startSession(transport, connector);
  await waitFor(() => socket.jsonSent().length === 1);

  socket.receive({ type: 'audio', data: Buffer.from([1, 2, 3]).toString('base64') });
  socket.receiveBinary(pcmFrame(100, 240));
  socket.disconnect(1000);
  const summary = await running;

  assert.equal(summary.reason, 'inbound_completed');
  assert.equal(summary.stats.framesIn, 2);
  assert.equal(summary.stats.framesDropped, 1);
  assert.deepEqual(connector.sender.sent, [{ kind: 'audio', bytes: 480, sampleRateHz: 24000 }]);
});

test('local VAD measures silence in real time for long browser frames', async () => {
  const { BrowserClientTransport } = await import('../src/transport/browserClient');
  const socket = new FakeDuplexSocket();
  const transport = new BrowserClientTransport(socket, { sessionId: 'vad-1', vadEnabled: true });
  const connector = new FakeModelConnector();
  const { session, running } = await startSession(transport, connector);
  await waitFor(() => socket.jsonSent().length === 1);

  // 100 ms frames: 200 ms of speech, then 300 ms of silence ends the turn.
  socket.receiveBinary(pcmFrame(16384, 2400));
  socket.receiveBinary(pcmFrame(16384, 2400));
  socket.receiveBinary(pcmFrame(0, 2400));
  socket.receiveBinary(pcmFrame(0, 2400));
  await waitFor(() => connector.sender.sent.length === 2);
  assert.equal(session.getStats().speechStarts, 1);
  assert.equal(session.getStats().speechEnds, 0);

  socket.receiveBinary(pcmFrame(0, 2400));
  await waitFor(() => connector.sender.sent.some((item) => item.kind === 'end_of_turn'));
  assert.deepEqual(connector.sender.sent, [
    { kind: 'audio', bytes: 9600, sampleRateHz: 24000 },
    { kind: 'audio', bytes: 9600, sampleRateHz: 24000 },
    { kind: 'audio', bytes: 4800, sampleRateHz: 24000 },
    { kind: 'end_of_turn' },
  ]);

  socket.disconnect(1000);
  const summary = await running;
  assert.equal(summary.stats.speechEnds, 1);
  assert.equal(summary.stats.endOfTurnsSent, 1);
});
