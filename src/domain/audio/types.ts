export interface Device {
  readonly index: number;
  readonly name: string;
  readonly channelCount: number;
  readonly defaultSampleRate: number;
}

export interface AudioFormat {
  sampleRate: number;
  channels: number;
}

/**
 * A fixed-size block of PCM16 little-endian samples (interleaved when
 * `channels > 1`). Never mutated once created.
 */
export interface AudioChunk {
  readonly samples: Buffer;
  readonly sequence: number;
  readonly capturedAt: number;
}

export const PCM16_BYTES_PER_SAMPLE = 2;
export const PCM16_FULL_SCALE = 32768;
