import { PvRecorder } from "@picovoice/pvrecorder-node";
import type { AudioDevicePort, RawAudioStream, RawDeviceInfo } from "../../ports/audio/AudioDevicePort";

// PvRecorder always captures 16 kHz mono int16.
const PVRECORDER_SAMPLE_RATE = 16000;
const PVRECORDER_CHANNELS = 1;

export interface PvRecorderDeviceBackendOptions {
  bufferedFramesCount?: number;
}

export class PvRecorderDeviceBackend implements AudioDevicePort {
  constructor(private readonly options: PvRecorderDeviceBackendOptions = {}) {}

  listDevices(): RawDeviceInfo[] {
    return PvRecorder.getAvailableDevices().map((name) => ({
      name,
      maxInputChannels: PVRECORDER_CHANNELS,
      defaultSampleRate: PVRECORDER_SAMPLE_RATE,
    }));
  }

  openStream(deviceIndex: number, frameLength: number): RawAudioStream {
    const recorder = new PvRecorder(frameLength, deviceIndex, this.options.bufferedFramesCount ?? 50);
    return new PvRecorderStream(recorder);
  }
}

class PvRecorderStream implements RawAudioStream {
  readonly channels = PVRECORDER_CHANNELS;
  private released = false;

  constructor(private readonly recorder: PvRecorder) {}

  get sampleRate(): number {
    return this.recorder.sampleRate;
  }

  start(): void {
    this.recorder.start();
  }

  read(): Promise<Int16Array> {
    return this.recorder.read();
  }

  stop(): void {
    if (this.released || !this.recorder.isRecording) return;
    this.recorder.stop();
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.recorder.release();
  }
}
