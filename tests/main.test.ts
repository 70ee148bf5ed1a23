import { formatDeviceTable, liveLine, waitForSessionEnd } from '../src/main';
import { SimpleEventBus } from '../src/adapters/sys/SimpleEventBus';
import { Topics } from '../src/domain/events/EventBus';
import type { SessionState } from '../src/domain/session/SessionStateMachine';
import { silentLogger } from './helpers/fakes';

jest.mock('dotenv', () => ({ config: jest.fn() }));
jest.mock('@picovoice/pvrecorder-node', () => ({ PvRecorder: class {} }));

describe('formatDeviceTable', () => {
  test('lists each device with its index and format', () => {
    expect(
      formatDeviceTable([
        { index: 0, name: 'Built-in Mic', channelCount: 1, defaultSampleRate: 16000 },
        { index: 2, name: 'USB Mic', channelCount: 1, defaultSampleRate: 16000 },
      ])
    ).toBe('Input devices:\n  [0] Built-in Mic (1 ch, 16000 Hz)\n  [2] USB Mic (1 ch, 16000 Hz)');
  });

  test('says so when there are none', () => {
    expect(formatDeviceTable([])).toBe('No input devices found.');
  });
});

describe('liveLine', () => {
  test('flattens whitespace', () => {
    expect(liveLine('hello\nthere  friend')).toBe('hello there friend');
  });

  test('keeps the tail of long transcripts', () => {
    expect(liveLine('abcdefghij', 5)).toBe('…ghij');
  });
});

describe('waitForSessionEnd', () => {
  const sigintListeners = () => process.listenerCount('SIGINT');
  let baseline = 0;

  beforeEach(() => {
    baseline = sigintListeners();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('returns at once for a session that already failed', async () => {
    const bus = new SimpleEventBus(silentLogger());
    const session: { state: SessionState } = { state: 'Failed' };

    await expect(waitForSessionEnd(session, bus, 60)).resolves.toBeUndefined();
    expect(sigintListeners()).toBe(baseline);
  });

  test('returns when the session fails while waiting', async () => {
    const bus = new SimpleEventBus(silentLogger());
    const session: { state: SessionState } = { state: 'Streaming' };

    const waiting = waitForSessionEnd(session, bus);
    expect(sigintListeners()).toBe(baseline + 1);
    bus.publish(Topics.SessionStateChanged, { state: 'Failed', previous: 'Streaming' });

    await expect(waiting).resolves.toBeUndefined();
    expect(sigintListeners()).toBe(baseline);
  });

  test('returns after the requested duration', async () => {
    jest.useFakeTimers();
    const bus = new SimpleEventBus(silentLogger());
    const session: { state: SessionState } = { state: 'Streaming' };

    const waiting = waitForSessionEnd(session, bus, 2);
    jest.advanceTimersByTime(2_000);

    await expect(waiting).resolves.toBeUndefined();
    expect(sigintListeners()).toBe(baseline);
  });
});
