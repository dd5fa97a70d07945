import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

class FakeLiveSocket extends EventEmitter {
  public readyState = 0;
  public readonly sent: string[] = [];
  public readonly closes: Array<{ code?: number; reason?: string }> = [];

  public send(data: string): void {
    this.sent.push(data);
  }

  public close(code?: number, reason?: string): void {
    this.closes.push({ code, reason });
    this.readyState = 3;
  }

  public open(): void {
    this.readyState = 1;
    this.emit('open');
  }

  public serverSend(payload: unknown): void {
    this.emit('message', Buffer.from(JSON.stringify(payload)));
  }
}

async function testConfig() {
  const { parseModelSessionConfig } = await import('../src/model/sessionConfig');
  return parseModelSessionConfig({
    model: 'test-model',
    systemInstruction: 'Be brief.',
    automaticVad: { enabled: false },
  });
}

test('buildSetupMessage describes the session with activity detection off', async () => {
  const { buildSetupMessage } = await import('../src/model/geminiLive');
  assert.deepEqual(buildSetupMessage(await testConfig()), {
    setup: {
      model: 'models/test-model',
      generationConfig: {
        responseModalities: ['AUDIO'],
        speechConfig: {
          voiceConfig: { prebuiltVoiceConfig: { voiceName: 'Aoede' } },
          languageCode: 'en-US',
        },
        maxOutputTokens: 256,
        temperature: 0.5,
        topP: 0.8,
        topK: 20,
        candidateCount: 1,
      },
      systemInstruction: { parts: [{ text: 'Be brief.' }] },
      realtimeInputConfig: {
        automaticActivityDetection: { disabled: true },
        turnCoverage: 'TURN_INCLUDES_ONLY_ACTIVITY',
      },
      inputAudioTranscription: {},
      outputAudioTranscription: {},
    },
  });
});

test('buildSetupMessage advertises tools and the activity detection tuning', async () => {
  const { buildSetupMessage } = await import('../src/model/geminiLive');
  const { parseModelSessionConfig } = await import('../src/model/sessionConfig');
  const declaration = { name: 'lookup', description: 'Look up', parameters: { type: 'object' } };
  const config = parseModelSessionConfig({
    model: 'models/already-prefixed',
    systemInstruction: 'Be brief.',
    inputTranscription: false,
    outputTranscription: false,
    automaticVad: { startSensitivity: 'LOW', silenceDurationMs: 500 },
    tools: [declaration],
  });

  assert.deepEqual(buildSetupMessage(config), {
    setup: {
      model: 'models/already-prefixed',
      generationConfig: {
        responseModalities: ['AUDIO'],
        speechConfig: {
          voiceConfig: { prebuiltVoiceConfig: { voiceName: 'Aoede' } },
          languageCode: 'en-US',
        },
        maxOutputTokens: 256,
        temperature: 0.5,
        topP: 0.8,
        topK: 20,
        candidateCount: 1,
      },
      systemInstruction: { parts: [{ text: 'Be brief.' }] },
      realtimeInputConfig: {
        automaticActivityDetection: {
          disabled: false,
          startOfSpeechSensitivity: 'START_SENSITIVITY_LOW',
          endOfSpeechSensitivity: 'END_SENSITIVITY_HIGH',
          prefixPaddingMs: 0,
          silenceDurationMs: 500,
        },
        turnCoverage: 'TURN_INCLUDES_ONLY_ACTIVITY',
      },
      tools: [{ functionDeclarations: [declaration] }],
    },
  });
});

test('mapServerMessage splits the input transcript from the model turn', async () => {
  const { mapServerMessage } = await import('../src/model/geminiLive');
  const events = mapServerMessage({
    serverContent: {
      inputTranscription: { text: 'what time is it' },
      outputTranscription: { text: 'It is noon' },
      modelTurn: {
        parts: [{ inlineData: { data: 'AQI=', mimeType: 'audio/pcm;rate=16000' } }, { text: 'It is noon' }],
      },
    },
  });

  assert.equal(events.length, 2);
  assert.deepEqual(events[0], {
    transcription: { direction: 'input', text: 'what time is it' },
    parts: [],
    toolCalls: [],
    stateDelta: { turnComplete: false, interrupted: false },
  });
  assert.deepEqual(events[1], {
    transcription: { direction: 'output', text: 'It is noon' },
    parts: [
      { kind: 'audio', data: Buffer.from([1, 2]), mimeType: 'audio/pcm;rate=16000' },
      { kind: 'text', text: 'It is noon' },
    ],
    toolCalls: [],
    stateDelta: { turnComplete: false, interrupted: false },
  });
});

test('mapServerMessage keeps turn boundaries and tool calls, and drops empty frames', async () => {
  const { mapServerMessage } = await import('../src/model/geminiLive');

  assert.deepEqual(mapServerMessage({ serverContent: { generationComplete: true } }), []);
  assert.deepEqual(mapServerMessage({ setupComplete: {} }), []);

  const [complete] = mapServerMessage({ serverContent: { turnComplete: true } });
  assert.deepEqual(complete?.stateDelta, { turnComplete: true, interrupted: false });

  const [interrupted] = mapServerMessage({ serverContent: { interrupted: true } });
  assert.deepEqual(interrupted?.stateDelta, { turnComplete: false, interrupted: true });

  const [audio] = mapServerMessage({ serverContent: { modelTurn: { parts: [{ inlineData: { data: 'AAA=' } }] } } });
  const part = audio?.parts[0];
  assert.equal(part?.kind === 'audio' ? part.mimeType : null, 'audio/pcm;rate=24000');

  assert.deepEqual(
    mapServerMessage({ toolCall: { functionCalls: [{ id: 'c1', name: 'schedule_meeting' }] } }).map(
      (event) => event.toolCalls,
    ),
    [[{ id: 'c1', name: 'schedule_meeting', args: {} }]],
  );
});

test('openSession sends setup, waits for setupComplete and relays frames both ways', async () => {
  const { GeminiLiveConnector } = await import('../src/model/geminiLive');
  const { ModelSessionError } = await import('../src/errors');
  const socket = new FakeLiveSocket();
  let requestedUrl = '';
  const connector = new GeminiLiveConnector({
    apiKey: 'test key',
    url: 'ws://model.test/live',
    setupTimeoutMs: 200,
    createSocket: (url) => {
      requestedUrl = url;
      return socket;
    },
  });

  const opening = connector.openSession('session-1', await testConfig());
  socket.open();
  assert.equal(requestedUrl, 'ws://model.test/live?key=test%20key');
  assert.equal(JSON.parse(socket.sent[0] ?? '{}').setup.model, 'models/test-model');

  socket.serverSend({ setupComplete: {} });
  const session = await opening;
  assert.equal(session.id, 'session-1');

  const events = session.events[Symbol.asyncIterator]();
  socket.serverSend({ serverContent: { outputTranscription: { text: 'hello' } } });
  const first = await events.next();
  assert.deepEqual(first.done ? null : first.value.transcription, { direction: 'output', text: 'hello' });

  session.sender.sendAudio(Buffer.from([1, 2]), 24000);
  session.sender.sendText('hi');
  session.sender.sendEndOfTurn();
  session.sender.sendToolResult([{ id: 'c1', name: 'lookup', response: { ok: true } }]);
  session.sender.sendToolResult([]);
  assert.deepEqual(
    socket.sent.slice(1).map((frame) => JSON.parse(frame)),
    [
      { realtimeInput: { audio: { data: 'AQI=', mimeType: 'audio/pcm;rate=24000' } } },
      { realtimeInput: { text: 'hi' } },
      { realtimeInput: { audioStreamEnd: true } },
      { toolResponse: { functionResponses: [{ id: 'c1', name: 'lookup', response: { ok: true } }] } },
    ],
  );

  socket.emit('message', Buffer.from('not json'));
  socket.emit('close', 1011, Buffer.from('internal'));
  await assert.rejects(events.next(), (error: unknown) => {
    assert.ok(error instanceof ModelSessionError);
    assert.equal(error.message, 'model_stream_closed code=1011 reason=internal');
    assert.equal(error.closeCode, 1011);
    return true;
  });
});

test('closing the session ends the event stream cleanly and blocks further sends', async () => {
  const { GeminiLiveConnector } = await import('../src/model/geminiLive');
  const socket = new FakeLiveSocket();
  const connector = new GeminiLiveConnector({
    apiKey: 'test',
    url: 'ws://model.test/live',
    setupTimeoutMs: 200,
    createSocket: () => socket,
  });

  const opening = connector.openSession('session-2', await testConfig());
  socket.open();
  socket.serverSend({ setupComplete: {} });
  const session = await opening;

  await session.sender.close();
  await session.sender.close();
  assert.deepEqual(socket.closes, [{ code: 1000, reason: 'session_closed' }]);

  const events = session.events[Symbol.asyncIterator]();
  assert.deepEqual(await events.next(), { value: undefined, done: true });
  assert.throws(() => session.sender.sendText('late'), /model_socket_not_open/);
});

test('openSession fails when setup does not complete in time', async () => {
  const { GeminiLiveConnector } = await import('../src/model/geminiLive');
  const socket = new FakeLiveSocket();
  const connector = new GeminiLiveConnector({
    apiKey: 'test',
    url: 'ws://model.test/live',
    setupTimeoutMs: 20,
    createSocket: () => socket,
  });

  await assert.rejects(connector.openSession('session-3', await testConfig()), /model_setup_timeout after 20ms/);
  assert.deepEqual(socket.closes, [{ code: 1000, reason: 'setup_failed' }]);
});

test('openSession fails when the model closes during setup', async () => {
  const { GeminiLiveConnector } = await import('../src/model/geminiLive');
  const socket = new FakeLiveSocket();
  const connector = new GeminiLiveConnector({
    apiKey: 'test',
    url: 'ws://model.test/live',
    setupTimeoutMs: 200,
    createSocket: () => socket,
  });

  const opening = connector.openSession('session-4', await testConfig());
  socket.open();
  socket.emit('close', 1008, Buffer.from('bad key'));
  await assert.rejects(opening, /model_closed_during_setup code=1008/);
});
