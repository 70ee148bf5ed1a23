export interface RawDeviceInfo {
  name: string;
  maxInputChannels: number;
  defaultSampleRate: number;
}

/** An opened input device delivering interleaved int16 frames in its native format. */
export interface RawAudioStream {
  readonly sampleRate: number;
  readonly channels: number;
  start(): void;
  read(): Promise<Int16Array>;
  stop(): void;
  release(): void;
}

export interface AudioDevicePort {
  /** Input-capable devices, in backend order. The array position is the device index. */
  listDevices(): RawDeviceInfo[];
  openStream(deviceIndex: number, frameLength: number): RawAudioStream;
}
