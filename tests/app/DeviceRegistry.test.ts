import { DeviceRegistry } from '../../src/app/DeviceRegistry';
import { DeviceEnumerationError } from '../../src/domain/errors';
import { FakeAudioBackend, silentLogger } from '../helpers/fakes';

const devices = [
  { name: 'HDMI Output', maxInputChannels: 0, defaultSampleRate: 48000 },
  { name: 'USB Mic', maxInputChannels: 2, defaultSampleRate: 48000 },
  { name: 'Built-in Microphone', maxInputChannels: 1, defaultSampleRate: 16000 },
];

describe('DeviceRegistry', () => {
  test('lists input-capable devices with their backend index', () => {
    const backend = new FakeAudioBackend(devices);
    const registry = new DeviceRegistry(backend, silentLogger());

    expect(registry.listDevices()).toEqual([
      { index: 1, name: 'USB Mic', channelCount: 2, defaultSampleRate: 48000 },
      { index: 2, name: 'Built-in Microphone', channelCount: 1, defaultSampleRate: 16000 },
    ]);
    expect(backend.opened).toHaveLength(0);
  });

  test('an empty backend gives an empty list, not an error', () => {
    const registry = new DeviceRegistry(new FakeAudioBackend([]), silentLogger());
    expect(registry.listDevices()).toEqual([]);
  });

  test('wraps backend failures in DeviceEnumerationError', () => {
    const backend = new FakeAudioBackend();
    jest.spyOn(backend, 'listDevices').mockImplementation(() => {
      throw new Error('no audio backend');
    });
    const registry = new DeviceRegistry(backend, silentLogger());

    expect(() => registry.listDevices()).toThrow(DeviceEnumerationError);
    expect(() => registry.listDevices()).toThrow('Could not enumerate audio devices (no audio backend).');
  });

  describe('findDevice', () => {
    const registry = new DeviceRegistry(new FakeAudioBackend(devices), silentLogger());

    test('"default" and empty labels mean the system default', () => {
      expect(registry.findDevice('default')).toBeUndefined();
      expect(registry.findDevice('DEFAULT')).toBeUndefined();
      expect(registry.findDevice()).toBeUndefined();
    });

    test('matches by index or case-insensitive name fragment', () => {
      expect(registry.findDevice('2')?.name).toBe('Built-in Microphone');
      expect(registry.findDevice('usb')?.index).toBe(1);
    });

    test('lists the candidates when nothing matches', () => {
      expect(() => registry.findDevice('headset')).toThrow(
        'Audio device "headset" not found. Available devices:\n  [1] USB Mic\n  [2] Built-in Microphone'
      );
      expect(() => registry.findDevice('0')).toThrow(DeviceEnumerationError);
    });
  });
});
