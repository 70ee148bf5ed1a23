import { PCM16_BYTES_PER_SAMPLE, type AudioFormat } from "./types";

const INT16_MIN = -32768;
const INT16_MAX = 32767;

function clampInt16(value: number): number {
  return Math.max(INT16_MIN, Math.min(INT16_MAX, Math.round(value)));
}

export function int16ToBuffer(samples: Int16Array): Buffer {
  const out = Buffer.alloc(samples.length * PCM16_BYTES_PER_SAMPLE);
  for (let i = 0; i < samples.length; i++) {
    out.writeInt16LE(samples[i], i * PCM16_BYTES_PER_SAMPLE);
  }
  return out;
}

export function bufferToInt16(buffer: Buffer): Int16Array {
  const count = Math.floor(buffer.length / PCM16_BYTES_PER_SAMPLE);
  const out = new Int16Array(count);
  for (let i = 0; i < count; i++) {
    out[i] = buffer.readInt16LE(i * PCM16_BYTES_PER_SAMPLE);
  }
  return out;
}

/**
 * Converts interleaved frames between channel counts. Mono output averages
 * every input channel; mono input is copied to every output channel; other
 * layouts map output channel `c` to input channel `c % from`.
 */
export function mixChannels(samples: Int16Array, from: number, to: number): Int16Array {
  if (from === to) return samples;
  const frames = Math.floor(samples.length / from);
  const out = new Int16Array(frames * to);

  for (let f = 0; f < frames; f++) {
    const base = f * from;
    if (to === 1) {
      let sum = 0;
      for (let c = 0; c < from; c++) sum += samples[base + c];
      out[f] = clampInt16(sum / from);
      continue;
    }
    for (let c = 0; c < to; c++) {
      out[f * to + c] = samples[base + (c % from)];
    }
  }
  return out;
}

/**
 * Streaming linear-interpolation resampler for interleaved int16 frames.
 * Keeps the last input frame and the fractional read position between calls
 * so consecutive blocks join without a seam.
 */
export class LinearResampler {
  private readonly step: number;
  private position = 0;
  private previous: Int16Array | null = null;

  constructor(
    readonly fromRate: number,
    readonly toRate: number,
    readonly channels: number
  ) {
    if (fromRate <= 0 || toRate <= 0) {
      throw new RangeError("Sample rates must be positive.");
    }
    this.step = fromRate / toRate;
  }

  process(input: Int16Array): Int16Array {
    if (this.fromRate === this.toRate) return input;

    const ch = this.channels;
    const frames = Math.floor(input.length / ch);
    if (frames === 0) return new Int16Array(0);

    const sampleAt = (frame: number, c: number): number => {
      if (frame < 0) return this.previous ? this.previous[c] : input[c];
      return input[frame * ch + c];
    };

    const out: number[] = [];
    let pos = this.position;
    while (pos <= frames - 1) {
      const i0 = Math.floor(pos);
      const frac = pos - i0;
      for (let c = 0; c < ch; c++) {
        const s0 = sampleAt(i0, c);
        out.push(frac === 0 ? s0 : clampInt16(s0 + (sampleAt(i0 + 1, c) - s0) * frac));
      }
      pos += this.step;
    }

    this.position = pos - frames;
    this.previous = input.slice((frames - 1) * ch, frames * ch);
    return Int16Array.from(out);
  }
}

/** Re-slices a stream of interleaved samples into blocks of exactly `frames` frames. */
export class ChunkFramer {
  private pending: Int16Array = new Int16Array(0);
  private readonly blockSamples: number;

  constructor(frames: number, channels: number) {
    this.blockSamples = frames * channels;
  }

  push(samples: Int16Array): Int16Array[] {
    const merged = new Int16Array(this.pending.length + samples.length);
    merged.set(this.pending, 0);
    merged.set(samples, this.pending.length);

    const blocks: Int16Array[] = [];
    let offset = 0;
    while (merged.length - offset >= this.blockSamples) {
      blocks.push(merged.slice(offset, offset + this.blockSamples));
      offset += this.blockSamples;
    }
    this.pending = merged.slice(offset);
    return blocks;
  }

  /** Samples held back because they do not fill a whole block. */
  get buffered(): number {
    return this.pending.length;
  }
}

/** Converts native device frames into the requested format. */
export class FormatConverter {
  private readonly resampler: LinearResampler;

  constructor(
    private readonly source: AudioFormat,
    private readonly target: AudioFormat
  ) {
    this.resampler = new LinearResampler(source.sampleRate, target.sampleRate, target.channels);
  }

  convert(samples: Int16Array): Int16Array {
    const mixed = mixChannels(samples, this.source.channels, this.target.channels);
    return this.resampler.process(mixed);
  }
}
