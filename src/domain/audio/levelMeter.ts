import { PCM16_BYTES_PER_SAMPLE, PCM16_FULL_SCALE, type AudioChunk } from "./types";

export const DEFAULT_LEVEL_GAIN = 10;

/** Display loudness of a chunk: RMS relative to int16 full scale, amplified by `gain`, clamped to [0, 1]. */
export function level(chunk: AudioChunk, gain: number = DEFAULT_LEVEL_GAIN): number {
  const { samples } = chunk;
  const count = Math.floor(samples.length / PCM16_BYTES_PER_SAMPLE);
  if (!count) return 0;

  let sumSquares = 0;
  for (let i = 0; i < count; i++) {
    const sample = samples.readInt16LE(i * PCM16_BYTES_PER_SAMPLE);
    sumSquares += sample * sample;
  }
  const rms = Math.sqrt(sumSquares / count) / PCM16_FULL_SCALE;
  return Math.min(1, Math.max(0, rms * gain));
}
