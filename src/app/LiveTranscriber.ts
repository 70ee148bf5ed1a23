import type { OverflowPolicy } from "../domain/audio/BoundedChannel";
import { DEFAULT_LEVEL_GAIN, level } from "../domain/audio/levelMeter";
import type { AudioChunk, Device } from "../domain/audio/types";
import { BackendError, SessionStateError, describeError } from "../domain/errors";
import type { EventBus } from "../domain/events/EventBus";
import { Topics } from "../domain/events/EventBus";
import { SessionStateMachine, isTerminal, type SessionState } from "../domain/session/SessionStateMachine";
import { computeStats } from "../domain/transcript/stats";
import { EMPTY_TRANSCRIPT, reduceTranscript, renderTranscript } from "../domain/transcript/TranscriptReducer";
import type { Stats, TranscriptState } from "../domain/transcript/types";
import type {
  TranscriptionTransport,
  TransportConfig,
  TransportSession,
} from "../ports/speech/TranscriptionTransportPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { CaptureEngine, CaptureHandle, PushSubscription } from "./CaptureEngine";
import type { DeviceRegistry } from "./DeviceRegistry";

export interface StartOptions {
  endpoint: string;
  transport: Omit<TransportConfig, "sampleRate" | "channels">;
  sampleRate?: number;
  channels?: number;
  chunkSize?: number;
  backlog?: number;
  overflow?: OverflowPolicy;
  drainTimeoutMs?: number;
  levelGain?: number;
}

export interface SessionSnapshot {
  state: SessionState;
  text: string;
  transcript: TranscriptState;
  stats: Stats;
  level: number;
  droppedChunks: number;
  error?: Error;
}

export interface TranscriptUpdate {
  text: string;
  transcript: TranscriptState;
  stats: Stats;
}

export interface LevelUpdate {
  sequence: number;
  level: number;
}

export interface LiveTranscriberDeps {
  registry: DeviceRegistry;
  capture: CaptureEngine;
  transport: TranscriptionTransport;
  bus: EventBus;
  logger: LoggerPort;
  now?: () => number;
}

/** Owns the selected device and at most one live session. */
export class LiveTranscriber {
  private active: LiveSession | null = null;
  private selected: Device | undefined;

  constructor(private readonly deps: LiveTranscriberDeps) {}

  listDevices(): Device[] {
    return this.deps.registry.listDevices();
  }

  selectDevice(device: Device | undefined) {
    this.selected = device;
    this.deps.logger.info(device ? `Selected microphone [${device.index}] ${device.name}` : "Selected default microphone");
  }

  get selectedDevice(): Device | undefined {
    return this.selected;
  }

  current(): LiveSession | null {
    return this.active;
  }

  async start(options: StartOptions): Promise<LiveSession> {
    if (this.active && !isTerminal(this.active.state)) {
      throw new SessionStateError(`A session is already ${this.active.state}; stop it before starting another.`);
    }
    const session = new LiveSession(this.deps, this.selected, options);
    this.active = session;
    await session.begin();
    return session;
  }

  async stop(): Promise<void> {
    await this.active?.stop();
  }

  reset() {
    this.active?.reset();
  }
}

/**
 * One capture → transport → transcript run. Only the receive loop mutates the
 * transcript; everything else reads snapshots.
 */
export class LiveSession {
  private readonly machine = new SessionStateMachine();
  private readonly now: () => number;
  private capture: CaptureHandle | null = null;
  private transport: TransportSession | null = null;
  private subscription: PushSubscription | null = null;
  private receiving: Promise<void> | null = null;
  private teardown: Promise<void> | null = null;
  private transcript: TranscriptState = EMPTY_TRANSCRIPT;
  private startedAt: number | null = null;
  private endedAt: number | null = null;
  private bytesBeforeReset = 0;
  private lastLevel = 0;
  private failure: Error | undefined;

  constructor(
    private readonly deps: LiveTranscriberDeps,
    private readonly device: Device | undefined,
    private readonly options: StartOptions
  ) {
    this.now = deps.now ?? Date.now;
    this.machine.onChange((next, previous) => {
      this.deps.logger.debug(`Session ${previous} -> ${next}`);
      this.deps.bus.publish(Topics.SessionStateChanged, { state: next, previous });
    });
  }

  get state(): SessionState {
    return this.machine.value;
  }

  get error(): Error | undefined {
    return this.failure;
  }

  async begin(): Promise<void> {
    const { options } = this;
    const sampleRate = options.sampleRate ?? 16000;
    const channels = options.channels ?? 1;

    this.machine.transition("RequestingDevice");
    try {
      this.capture = this.deps.capture.open({
        device: this.device,
        sampleRate,
        channels,
        chunkSize: options.chunkSize,
      });
    } catch (err) {
      await this.fail(err);
      throw err;
    }

    this.machine.transition("Connecting");
    try {
      this.transport = await this.deps.transport.connect(options.endpoint, {
        ...options.transport,
        sampleRate,
        channels,
      });
    } catch (err) {
      await this.fail(err);
      throw err;
    }
    if (this.machine.value !== "Connecting") {
      // stop() won the race while the handshake was in flight; teardown already ran without this transport.
      await this.transport.close();
      throw this.failure ?? new SessionStateError("Session stopped while connecting.");
    }

    this.machine.transition("Streaming");
    this.startedAt = this.now();
    this.receiving = this.consume(this.transport);
    this.subscription = this.capture.onChunk((chunk) => this.handleChunk(chunk), {
      overflow: options.overflow,
      backlog: options.backlog,
      onError: (err) => this.failInBackground(err),
      onDrop: (chunk) => {
        this.deps.bus.publish(Topics.ChunkDropped, { sequence: chunk.sequence });
      },
    });
    this.deps.logger.info("Streaming microphone audio", { endpoint: options.endpoint });
  }

  /** Idempotent; waits for the full teardown either way. */
  async stop(): Promise<void> {
    if (this.machine.value === "Streaming") {
      this.machine.transition("Stopping");
    } else if (!this.teardown && !isTerminal(this.machine.value)) {
      this.failure = new SessionStateError(`Session stopped while ${this.machine.value}.`);
      this.machine.transition("Failed");
    }
    await this.shutdown();
    if (this.machine.value === "Stopping") {
      this.machine.transition("Stopped");
    }
  }

  snapshot(): SessionSnapshot {
    return {
      state: this.machine.value,
      text: renderTranscript(this.transcript),
      transcript: this.transcript,
      stats: this.stats(),
      level: this.lastLevel,
      droppedChunks: this.capture?.droppedChunks ?? 0,
      ...(this.failure ? { error: this.failure } : {}),
    };
  }

  /** Clears the transcript and restarts the duration and byte counters from zero. */
  reset() {
    this.transcript = reduceTranscript(this.transcript, { type: "reset" });
    this.bytesBeforeReset = this.totalBytesSent();
    if (this.startedAt !== null) {
      this.startedAt = this.endedAt ?? this.now();
    }
    this.deps.logger.debug("Transcript cleared");
    this.publishTranscript();
  }

  stats(): Stats {
    return computeStats({
      startedAt: this.startedAt,
      now: this.endedAt ?? this.now(),
      transcript: this.transcript,
      bytesSent: this.totalBytesSent() - this.bytesBeforeReset,
    });
  }

  private totalBytesSent(): number {
    return this.transport?.stats().bytesSent ?? 0;
  }

  private publishTranscript() {
    this.deps.bus.publish<TranscriptUpdate>(Topics.TranscriptUpdated, {
      text: renderTranscript(this.transcript),
      transcript: this.transcript,
      stats: this.stats(),
    });
  }

  private handleChunk(chunk: AudioChunk) {
    const state = this.machine.value;
    if (!this.transport || (state !== "Streaming" && state !== "Stopping")) {
      this.deps.logger.debug("Discarding audio chunk after the session ended", { sequence: chunk.sequence, state });
      return;
    }

    this.lastLevel = level(chunk, this.options.levelGain ?? DEFAULT_LEVEL_GAIN);
    this.deps.bus.publish<LevelUpdate>(Topics.LevelMeasured, { sequence: chunk.sequence, level: this.lastLevel });

    try {
      this.transport.send(chunk);
    } catch (err) {
      this.failInBackground(err);
    }
  }

  private async consume(transport: TransportSession): Promise<void> {
    try {
      for await (const event of transport.receive()) {
        if (event.kind === "token") {
          this.transcript = reduceTranscript(this.transcript, { type: "token", token: event.token });
          this.publishTranscript();
        } else if (event.type === "ready") {
          this.deps.logger.info("Backend ready to receive audio");
        } else {
          throw new BackendError(event.message);
        }
      }
    } catch (err) {
      // Not awaited: the teardown drains this very loop.
      this.failInBackground(err);
    }
  }

  private failInBackground(err: unknown) {
    this.fail(err).catch((teardownErr: unknown) => {
      this.deps.logger.error("Session teardown failed", { error: describeError(teardownErr) });
    });
  }

  private async fail(err: unknown): Promise<void> {
    if (isTerminal(this.machine.value)) return;
    this.failure = err instanceof Error ? err : new Error(describeError(err));
    this.deps.logger.error("Transcription session failed", { error: this.failure.message, state: this.machine.value });
    this.machine.transition("Failed");
    await this.shutdown();
  }

  private shutdown(): Promise<void> {
    if (!this.teardown) {
      this.teardown = this.runTeardown();
    }
    return this.teardown;
  }

  /** Stop audio intake → finish → drain → close transport → release device. */
  private async runTeardown(): Promise<void> {
    if (this.startedAt !== null) {
      this.endedAt = this.now();
    }

    const subscription = this.subscription;
    if (subscription) {
      subscription.cancel();
      // Chunks already taken from the device go out ahead of end-of-audio.
      await subscription.done;
    }

    const transport = this.transport;
    if (transport) {
      transport.finish();
      if (this.receiving) {
        await this.drain(this.receiving);
      }
      await transport.close();
    }

    this.capture?.close();
    this.deps.logger.info("Session torn down", { state: this.machine.value, ...this.stats() });
  }

  private async drain(receiving: Promise<void>) {
    const graceMs = this.options.drainTimeoutMs ?? 5000;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      const handle = setTimeout(() => resolve("timeout"), graceMs);
      handle.unref();
      timer = handle;
    });
    let outcome: "drained" | "timeout";
    try {
      outcome = await Promise.race([receiving.then(() => "drained" as const), timedOut]);
    } finally {
      clearTimeout(timer);
    }
    if (outcome === "timeout") {
      this.deps.logger.warn(`Backend did not finish within ${graceMs} ms; closing anyway.`);
    }
  }
}
