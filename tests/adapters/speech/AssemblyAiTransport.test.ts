import { AssemblyAiTransport } from '../../../src/adapters/speech/AssemblyAiTransport';
import { AuthError, ConnectionError, SessionStateError } from '../../../src/domain/errors';
import type { AudioChunk } from '../../../src/domain/audio/types';
import type { TransportConfig, TransportEvent } from '../../../src/ports/speech/TranscriptionTransportPort';
import { silentLogger } from '../../helpers/fakes';

type Listener = (...args: unknown[]) => void;

interface MockTranscriber {
  options: Record<string, unknown>;
  connect: jest.Mock<Promise<void>, []>;
  close: jest.Mock<Promise<void>, [boolean?]>;
  sendAudio: jest.Mock<void, [ArrayBufferLike]>;
  emit(event: string, ...args: unknown[]): void;
}

const mockState = {
  transcribers: [] as MockTranscriber[],
  apiKeys: [] as string[],
  connectError: null as Error | null,
};

jest.mock('assemblyai', () => ({
  AssemblyAI: jest.fn().mockImplementation(({ apiKey }: { apiKey: string }) => {
    mockState.apiKeys.push(apiKey);
    return {
      streaming: {
        transcriber: (options: Record<string, unknown>) => {
          const listeners: Record<string, Listener[]> = {};
          const emit = (event: string, ...args: unknown[]) => {
            for (const listener of listeners[event] ?? []) listener(...args);
          };
          const transcriber: MockTranscriber = {
            options,
            connect: jest.fn<Promise<void>, []>(async () => {
              if (mockState.connectError) throw mockState.connectError;
              emit('open', { id: 'session-1' });
            }),
            close: jest.fn<Promise<void>, [boolean?]>(async () => undefined),
            sendAudio: jest.fn<void, [ArrayBufferLike]>(),
            emit,
          };
          mockState.transcribers.push(transcriber);
          return {
            ...transcriber,
            on: (event: string, listener: Listener) => {
              (listeners[event] ||= []).push(listener);
            },
          };
        },
      },
    };
  }),
  StreamingTranscriber: class {},
}));

const config: TransportConfig = { apiKey: 'test-secret', sampleRate: 16000, channels: 1 };

const chunk = (sequence: number, bytes = 1600): AudioChunk => ({
  samples: Buffer.alloc(bytes),
  sequence,
  capturedAt: 0,
});

function lastTranscriber(): MockTranscriber {
  const transcriber = mockState.transcribers[mockState.transcribers.length - 1];
  if (!transcriber) throw new Error('no transcriber created');
  return transcriber;
}

async function drain(events: AsyncIterable<TransportEvent>): Promise<TransportEvent[]> {
  const out: TransportEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

describe('AssemblyAiTransport', () => {
  beforeEach(() => {
    mockState.transcribers = [];
    mockState.apiKeys = [];
    mockState.connectError = null;
  });

  test('connects a pcm_s16le streaming transcriber', async () => {
    const session = await new AssemblyAiTransport({ logger: silentLogger() }).connect('unused', config);

    expect(mockState.apiKeys).toEqual(['test-secret']);
    expect(lastTranscriber().options).toEqual({ sampleRate: 16000, encoding: 'pcm_s16le', formatTurns: true });
    expect(session.state).toBe('Streaming');
  });

  test('accepts mono audio only', async () => {
    await expect(
      new AssemblyAiTransport({ logger: silentLogger() }).connect('unused', { ...config, channels: 2 })
    ).rejects.toThrow(ConnectionError);
  });

  test('maps credential failures to AuthError and others to ConnectionError', async () => {
    const transport = new AssemblyAiTransport({ logger: silentLogger() });

    mockState.connectError = new Error('Unauthorized connection: invalid API key');
    await expect(transport.connect('unused', config)).rejects.toThrow(AuthError);

    mockState.connectError = new Error('socket hang up');
    await expect(transport.connect('unused', config)).rejects.toThrow(
      'Could not connect to AssemblyAI: socket hang up'
    );
  });

  test('rejects chunks shorter than 50 ms and forwards the rest', async () => {
    const session = await new AssemblyAiTransport({ logger: silentLogger() }).connect('unused', config);

    expect(() => session.send(chunk(0, 1000))).toThrow(RangeError);
    session.send(chunk(0));

    const [sent] = lastTranscriber().sendAudio.mock.calls[0];
    expect(sent.byteLength).toBe(1600);
    expect(session.stats()).toEqual({ bytesSent: 1600, chunksSent: 1, sequenceGaps: 0 });
  });

  test('turns become partial tokens until the formatted end of turn', async () => {
    const session = await new AssemblyAiTransport({ logger: silentLogger() }).connect('unused', config);
    const events = drain(session.receive());
    const transcriber = lastTranscriber();

    transcriber.emit('turn', { turn_order: 0, end_of_turn: false, turn_is_formatted: false, transcript: 'hello wor' });
    transcriber.emit('turn', { turn_order: 0, end_of_turn: true, turn_is_formatted: false, transcript: 'hello world' });
    transcriber.emit('turn', {
      turn_order: 0,
      end_of_turn: true,
      turn_is_formatted: true,
      transcript: 'Hello world.',
      end_of_turn_confidence: 0.8,
    });

    session.finish();
    expect(transcriber.close).toHaveBeenCalledWith(true);
    transcriber.emit('close', 1000, '');

    expect(await events).toEqual([
      { kind: 'control', type: 'ready' },
      { kind: 'token', token: { text: 'hello wor', isFinal: false, confidence: 1 } },
      { kind: 'token', token: { text: 'hello world', isFinal: false, confidence: 1 } },
      { kind: 'token', token: { text: 'Hello world.', isFinal: true, confidence: 0.8 } },
    ]);
    expect(session.state).toBe('Closed');
  });

  test('a transcriber error ends the stream with one error event', async () => {
    const session = await new AssemblyAiTransport({ logger: silentLogger() }).connect('unused', config);
    const events = drain(session.receive());

    lastTranscriber().emit('error', new Error('boom'));
    lastTranscriber().emit('close', 1011, 'internal');

    expect(await events).toEqual([
      { kind: 'control', type: 'ready' },
      { kind: 'control', type: 'error', message: 'AssemblyAI transcriber error: boom' },
    ]);
    expect(session.state).toBe('Failed');
    expect(() => session.send(chunk(1))).toThrow(SessionStateError);
  });

  test('close is idempotent', async () => {
    const session = await new AssemblyAiTransport({ logger: silentLogger() }).connect('unused', config);
    await session.close();
    await session.close();

    expect(lastTranscriber().close).toHaveBeenCalledTimes(1);
    expect(lastTranscriber().close).toHaveBeenCalledWith(false);
    expect(session.state).toBe('Closed');
  });
});
