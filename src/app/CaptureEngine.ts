import { BoundedChannel, type OverflowPolicy } from "../domain/audio/BoundedChannel";
import { ChunkFramer, FormatConverter, int16ToBuffer } from "../domain/audio/pcm";
import type { AudioChunk, AudioFormat, Device } from "../domain/audio/types";
import { DeviceEnumerationError, DeviceLostError, SessionStateError, describeError } from "../domain/errors";
import type { AudioDevicePort, RawAudioStream } from "../ports/audio/AudioDevicePort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import type { DeviceRegistry } from "./DeviceRegistry";

/** Device index the audio layer understands as "system default input". */
export const DEFAULT_DEVICE_INDEX = -1;

export interface CaptureOptions {
  device?: Device;
  sampleRate?: number;
  channels?: number;
  /** Frames per chunk. */
  chunkSize?: number;
}

export interface PullOptions {
  durationMs?: number;
  signal?: AbortSignal;
  bufferChunks?: number;
}

export interface PushOptions {
  overflow?: OverflowPolicy;
  /** Chunks allowed to wait for the handler before the overflow policy applies. */
  backlog?: number;
  durationMs?: number;
  onError?: (err: DeviceLostError) => void;
  onDrop?: (chunk: AudioChunk) => void;
}

export type CaptureEndReason = "closed" | "cancelled" | "duration" | "device-lost";

export interface PushSubscription {
  cancel(): void;
  readonly done: Promise<CaptureEndReason>;
}

export type ChunkHandler = (chunk: AudioChunk) => void | Promise<void>;

export interface CaptureEngineOptions {
  logger?: LoggerPort;
  now?: () => number;
}

export class CaptureEngine {
  private readonly logger: LoggerPort;
  private readonly now: () => number;

  constructor(
    private readonly registry: DeviceRegistry,
    private readonly backend: AudioDevicePort,
    options: CaptureEngineOptions = {}
  ) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.now = options.now ?? Date.now;
  }

  open(options: CaptureOptions = {}): CaptureHandle {
    const format: AudioFormat = {
      sampleRate: options.sampleRate ?? 16000,
      channels: options.channels ?? 1,
    };
    const chunkSize = options.chunkSize ?? 256;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer (got ${chunkSize}).`);
    }

    const devices = this.registry.listDevices();
    if (!devices.length) {
      throw new DeviceEnumerationError("no input device available");
    }

    const requested = options.device;
    let device: Device | undefined;
    if (requested) {
      device = devices.find((d) => d.index === requested.index && d.name === requested.name);
      if (!device) {
        throw new DeviceEnumerationError(
          `Audio device [${requested.index}] ${requested.name} is no longer available.`
        );
      }
    }

    const nativeRate = device?.defaultSampleRate ?? devices[0].defaultSampleRate;
    const frameLength = Math.max(1, Math.round((chunkSize * nativeRate) / format.sampleRate));
    const label = device ? `[${device.index}] ${device.name}` : "default";

    let stream: RawAudioStream;
    try {
      stream = this.backend.openStream(device?.index ?? DEFAULT_DEVICE_INDEX, frameLength);
      stream.start();
    } catch (err) {
      throw new DeviceLostError(`Could not open audio device ${label} (${describeError(err)}).`, { cause: err });
    }

    this.logger.info(
      `Initialised microphone capture: ${format.sampleRate}Hz, ${format.channels} channel(s), chunk_size=${chunkSize}`,
      { device: label, nativeSampleRate: stream.sampleRate, nativeChannels: stream.channels }
    );
    return new CaptureHandle(stream, device, format, chunkSize, label, this.logger, this.now);
  }
}

/**
 * An open input device. Chunks flow from a single capture pump through a
 * bounded channel to exactly one consumer, either pulled with `chunks()` or
 * pushed with `onChunk()`.
 */
export class CaptureHandle {
  private readonly converter: FormatConverter;
  private readonly framer: ChunkFramer;
  private channel: BoundedChannel<AudioChunk> | null = null;
  private pumping: Promise<CaptureEndReason> | null = null;
  private releasing: Promise<void> | null = null;
  private closed = false;
  private nextSequence = 0;
  private dropped = 0;

  constructor(
    private readonly stream: RawAudioStream,
    readonly device: Device | undefined,
    readonly format: AudioFormat,
    readonly chunkSize: number,
    private readonly label: string,
    private readonly logger: LoggerPort,
    private readonly now: () => number
  ) {
    this.converter = new FormatConverter({ sampleRate: stream.sampleRate, channels: stream.channels }, format);
    this.framer = new ChunkFramer(chunkSize, format.channels);
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  get chunksCaptured(): number {
    return this.nextSequence;
  }

  get droppedChunks(): number {
    return this.dropped;
  }

  /** Nominal length of one chunk in milliseconds. */
  get chunkDurationMs(): number {
    return (this.chunkSize / this.format.sampleRate) * 1000;
  }

  chunks(options: PullOptions = {}): AsyncIterableIterator<AudioChunk> {
    const channel = this.attach(new BoundedChannel<AudioChunk>(options.bufferChunks ?? 32, "block"));
    this.pumping = this.pump(channel, this.chunkLimit(options.durationMs));
    return this.iterate(channel, options.signal);
  }

  onChunk(handler: ChunkHandler, options: PushOptions = {}): PushSubscription {
    const channel = this.attach(
      new BoundedChannel<AudioChunk>(options.backlog ?? 1, options.overflow ?? "drop-oldest", (chunk) => {
        this.dropped += 1;
        this.logger.warn("Capture consumer fell behind; dropped oldest chunk", { sequence: chunk.sequence });
        options.onDrop?.(chunk);
      })
    );
    const pumped = this.pump(channel, this.chunkLimit(options.durationMs));
    this.pumping = pumped;
    let cancelled = false;

    const deliver = async (): Promise<CaptureEndReason> => {
      try {
        while (true) {
          const next = await channel.take();
          if (next.done) break;
          try {
            await handler(next.value);
          } catch (err) {
            this.logger.warn("Audio chunk handler failed", { sequence: next.value.sequence, error: describeError(err) });
          }
        }
      } catch (err) {
        const lost =
          err instanceof DeviceLostError ? err : new DeviceLostError(describeError(err), { cause: err });
        options.onError?.(lost);
        return "device-lost";
      }
      if (cancelled) return "cancelled";
      if (this.closed) return "closed";
      return pumped;
    };

    return {
      cancel: () => {
        cancelled = true;
        channel.close();
      },
      done: deliver(),
    };
  }

  /** Idempotent; stops capture and releases the device once the pump has let go of it. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.channel?.close();
    this.stopStream();
    const pending = this.pumping ?? Promise.resolve<CaptureEndReason>("closed");
    this.releasing = pending.then(() => this.releaseStream());
    this.logger.info(`Stopped audio capture after ${this.nextSequence} chunks`, {
      device: this.label,
      dropped: this.dropped,
    });
  }

  /** Resolves once the device has been released after `close()`. */
  whenReleased(): Promise<void> {
    return this.releasing ?? Promise.resolve();
  }

  private attach(channel: BoundedChannel<AudioChunk>): BoundedChannel<AudioChunk> {
    if (this.closed) {
      throw new SessionStateError("Capture handle is closed.");
    }
    if (this.channel) {
      throw new SessionStateError("Capture handle already has a consumer.");
    }
    this.channel = channel;
    return channel;
  }

  private chunkLimit(durationMs?: number): number | undefined {
    if (durationMs === undefined) return undefined;
    return Math.floor(((durationMs / 1000) * this.format.sampleRate) / this.chunkSize);
  }

  private async *iterate(channel: BoundedChannel<AudioChunk>, signal?: AbortSignal) {
    const abort = () => channel.close();
    signal?.addEventListener("abort", abort, { once: true });
    try {
      while (!signal?.aborted) {
        const next = await channel.take();
        if (next.done || signal?.aborted) return;
        yield next.value;
      }
    } finally {
      signal?.removeEventListener("abort", abort);
      channel.close();
    }
  }

  private async pump(channel: BoundedChannel<AudioChunk>, limit: number | undefined): Promise<CaptureEndReason> {
    let emitted = 0;
    try {
      while (limit === undefined || emitted < limit) {
        if (this.closed) return "closed";
        if (channel.isClosed) return "cancelled";

        let frame: Int16Array;
        try {
          frame = await this.stream.read();
        } catch (err) {
          if (this.closed) return "closed";
          throw new DeviceLostError(`Audio device ${this.label} stopped delivering audio (${describeError(err)}).`, {
            cause: err,
          });
        }
        if (this.closed) return "closed";

        for (const block of this.framer.push(this.converter.convert(frame))) {
          if (limit !== undefined && emitted >= limit) break;
          await channel.push(this.createChunk(block));
          emitted += 1;
        }
      }
      channel.close();
      this.stopStream();
      return "duration";
    } catch (err) {
      this.logger.error("Audio capture failed", { device: this.label, error: describeError(err) });
      this.stopStream();
      channel.close(err);
      return "device-lost";
    }
  }

  private createChunk(block: Int16Array): AudioChunk {
    const chunk: AudioChunk = Object.freeze({
      samples: int16ToBuffer(block),
      sequence: this.nextSequence,
      capturedAt: this.now(),
    });
    this.nextSequence += 1;
    return chunk;
  }

  private stopStream() {
    try {
      this.stream.stop();
    } catch (err) {
      this.logger.warn("Failed to stop audio stream", { device: this.label, error: describeError(err) });
    }
  }

  private releaseStream() {
    try {
      this.stream.release();
    } catch (err) {
      this.logger.warn("Failed to release audio device", { device: this.label, error: describeError(err) });
    }
  }
}
