import { EventEmitter } from "events";
import { AssemblyAI, StreamingTranscriber } from "assemblyai";
import type { AudioChunk } from "../../domain/audio/types";
import { AuthError, ConnectionError, SessionStateError, describeError } from "../../domain/errors";
import type {
  TranscriptionTransport,
  TransportConfig,
  TransportEvent,
  TransportSession,
  TransportState,
  TransportStats,
} from "../../ports/speech/TranscriptionTransportPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { ConsoleLogger } from "../sys/ConsoleLogger";

// The streaming API rejects audio messages shorter than 50 ms.
const MIN_CHUNK_MS = 50;
const AUTH_FAILURE = /unauthori[sz]ed|invalid api key|authentication|\b40[13]\b/i;

export interface AssemblyAiTransportOptions {
  logger?: LoggerPort;
  formatTurns?: boolean;
}

/**
 * AssemblyAI streaming behind the transport port. Each turn message becomes
 * one token: partial while the turn is open, final once the turn ends (after
 * formatting when `formatTurns` is on).
 */
export class AssemblyAiTransport implements TranscriptionTransport {
  private readonly logger: LoggerPort;

  constructor(private readonly options: AssemblyAiTransportOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger();
  }

  /** The SDK picks its own streaming URL, so `endpoint` is only logged. */
  async connect(endpoint: string, config: TransportConfig): Promise<TransportSession> {
    if (config.channels !== 1) {
      throw new ConnectionError("AssemblyAI streaming accepts mono audio only.");
    }
    const client = new AssemblyAI({ apiKey: config.apiKey });
    const transcriber = client.streaming.transcriber({
      sampleRate: config.sampleRate,
      encoding: "pcm_s16le",
      formatTurns: this.options.formatTurns ?? true,
    });
    const session = new AssemblyAiSession(transcriber, config, this.options.formatTurns ?? true, this.logger);

    try {
      await transcriber.connect();
    } catch (err) {
      session.abandon();
      const message = describeError(err);
      throw AUTH_FAILURE.test(message)
        ? new AuthError(`AssemblyAI rejected credentials: ${message}`, { cause: err })
        : new ConnectionError(`Could not connect to AssemblyAI: ${message}`, { cause: err });
    }
    session.markStreaming();
    this.logger.info("[AAI] Streaming transcriber connected.", { requestedEndpoint: endpoint });
    return session;
  }
}

class AssemblyAiSession implements TransportSession {
  private current: TransportState = "Connecting";
  private readonly queue: TransportEvent[] = [];
  private readonly emitter = new EventEmitter();
  private readonly minChunkBytes: number;
  private ended = false;
  private consumed = false;
  private lastSequence: number | null = null;
  private counters: TransportStats = { bytesSent: 0, chunksSent: 0, sequenceGaps: 0 };

  constructor(
    private readonly transcriber: StreamingTranscriber,
    config: TransportConfig,
    private readonly formatTurns: boolean,
    private readonly logger: LoggerPort
  ) {
    this.minChunkBytes = Math.round((config.sampleRate * MIN_CHUNK_MS) / 1000) * 2;
    this.attach();
  }

  get state(): TransportState {
    return this.current;
  }

  markStreaming() {
    this.current = "Streaming";
  }

  abandon() {
    this.current = "Failed";
    this.end();
  }

  send(chunk: AudioChunk): void {
    if (this.current !== "Streaming") {
      throw new SessionStateError(`Cannot send audio while transport is ${this.current}.`);
    }
    if (chunk.samples.length < this.minChunkBytes) {
      throw new RangeError(
        `AssemblyAI needs at least ${MIN_CHUNK_MS} ms of audio per message (${this.minChunkBytes} bytes, got ${chunk.samples.length}).`
      );
    }
    if (this.lastSequence !== null) {
      if (chunk.sequence <= this.lastSequence) {
        throw new SessionStateError(
          `Chunk sequence ${chunk.sequence} does not follow ${this.lastSequence}; audio must be sent in order.`
        );
      }
      if (chunk.sequence - this.lastSequence > 1) {
        this.counters.sequenceGaps += 1;
        this.logger.warn("[AAI] Audio sequence gap before send", { sequence: chunk.sequence });
      }
    }
    this.lastSequence = chunk.sequence;

    const { samples } = chunk;
    this.transcriber.sendAudio(samples.buffer.slice(samples.byteOffset, samples.byteOffset + samples.byteLength));
    this.counters.bytesSent += samples.length;
    this.counters.chunksSent += 1;
  }

  finish(): void {
    if (this.current !== "Streaming") return;
    this.current = "Finishing";
    this.transcriber.close(true).catch((err: unknown) => {
      this.fail(`Failed to terminate AssemblyAI session: ${describeError(err)}`);
    });
  }

  receive(): AsyncIterable<TransportEvent> {
    if (this.consumed) {
      throw new SessionStateError("Transport events can only be consumed once.");
    }
    this.consumed = true;
    return this.iterate();
  }

  async close(): Promise<void> {
    if (this.current === "Closed" || this.current === "Failed") return;
    this.current = "Closed";
    this.end();
    try {
      await this.transcriber.close(false);
    } catch (err) {
      this.logger.warn("Failed to close AssemblyAI transcriber", { error: describeError(err) });
    }
  }

  stats(): TransportStats {
    return { ...this.counters };
  }

  private attach() {
    this.transcriber.on("open", () => {
      this.push({ kind: "control", type: "ready" });
    });

    this.transcriber.on("turn", (turn) => {
      const text = typeof turn.transcript === "string" ? turn.transcript : "";
      const isFinal = Boolean(turn.end_of_turn) && (!this.formatTurns || Boolean(turn.turn_is_formatted));
      const confidence =
        "end_of_turn_confidence" in turn && typeof turn.end_of_turn_confidence === "number"
          ? turn.end_of_turn_confidence
          : 1;
      this.logger.debug(`[AAI] turn order=${turn.turn_order} final=${isFinal} transcript="${text}"`);
      this.push({
        kind: "token",
        token: { text, isFinal, confidence: Math.min(1, Math.max(0, confidence)) },
      });
    });

    this.transcriber.on("error", (err) => {
      this.fail(`AssemblyAI transcriber error: ${describeError(err)}`);
    });

    this.transcriber.on("close", (code: number, reason: string) => {
      if (this.ended) return;
      if (this.current === "Finishing") {
        this.current = "Closed";
        this.end();
        return;
      }
      this.fail(`AssemblyAI session closed unexpectedly (code=${code} reason=${reason})`);
    });
  }

  private async *iterate(): AsyncIterableIterator<TransportEvent> {
    while (true) {
      const next = this.queue.shift();
      if (next) {
        yield next;
        continue;
      }
      if (this.ended) return;
      await new Promise<void>((resolve) => this.emitter.once("event", () => resolve()));
    }
  }

  private fail(message: string) {
    if (this.ended) return;
    this.logger.error(message);
    this.current = "Failed";
    this.push({ kind: "control", type: "error", message });
    this.end();
  }

  private push(event: TransportEvent) {
    if (this.ended) return;
    this.queue.push(event);
    this.emitter.emit("event");
  }

  private end() {
    this.ended = true;
    this.emitter.emit("event");
  }
}
