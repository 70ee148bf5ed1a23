import { EventEmitter } from "events";
import type { IncomingMessage } from "http";
import WebSocket from "ws";
import type { AudioChunk } from "../../domain/audio/types";
import {
  AuthError,
  ConnectionError,
  ProtocolError,
  SessionStateError,
  describeError,
} from "../../domain/errors";
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
import { parseBackendMessage } from "./backendMessages";

const END_OF_AUDIO = Buffer.alloc(0);
// Normal closure, or a close frame without a status code.
const CLEAN_CLOSE_CODES = new Set([1000, 1005]);

export interface WebSocketTransportOptions {
  logger?: LoggerPort;
}

export class WebSocketTransport implements TranscriptionTransport {
  private readonly logger: LoggerPort;

  constructor(options: WebSocketTransportOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger();
  }

  async connect(endpoint: string, config: TransportConfig): Promise<TransportSession> {
    const session = new WebSocketSession(endpoint, config, this.logger);
    await session.opened;
    return session;
  }
}

class WebSocketSession implements TransportSession {
  readonly opened: Promise<void>;
  private current: TransportState = "Idle";
  private readonly ws: WebSocket;
  private readonly queue: TransportEvent[] = [];
  private readonly emitter = new EventEmitter();
  private ended = false;
  private failure: Error | null = null;
  private consumed = false;
  private lastSequence: number | null = null;
  private counters: TransportStats = { bytesSent: 0, chunksSent: 0, sequenceGaps: 0 };

  constructor(
    endpoint: string,
    private readonly config: TransportConfig,
    private readonly logger: LoggerPort
  ) {
    this.current = "Connecting";
    this.ws = new WebSocket(endpoint, {
      headers: { Authorization: `Bearer ${config.apiKey}` },
      handshakeTimeout: config.connectTimeoutMs,
    });
    this.opened = this.waitForOpen(endpoint);

    this.ws.on("message", (data, isBinary) => this.handleMessage(data, isBinary));
    this.ws.on("close", (code, reason) => this.handleClose(code, reason.toString()));
  }

  get state(): TransportState {
    return this.current;
  }

  send(chunk: AudioChunk): void {
    if (this.current !== "Streaming") {
      throw new SessionStateError(`Cannot send audio while transport is ${this.current}.`);
    }
    if (this.lastSequence !== null) {
      if (chunk.sequence <= this.lastSequence) {
        throw new SessionStateError(
          `Chunk sequence ${chunk.sequence} does not follow ${this.lastSequence}; audio must be sent in order.`
        );
      }
      const missing = chunk.sequence - this.lastSequence - 1;
      if (missing > 0) {
        this.counters.sequenceGaps += 1;
        this.logger.warn("Audio sequence gap before send", { missing, sequence: chunk.sequence });
      }
    }
    this.lastSequence = chunk.sequence;

    this.ws.send(chunk.samples, { binary: true }, (err) => {
      if (err) this.fail(new ConnectionError(`Failed to send audio: ${err.message}`, { cause: err }));
    });
    this.counters.bytesSent += chunk.samples.length;
    this.counters.chunksSent += 1;
  }

  finish(): void {
    if (this.current !== "Streaming") return;
    this.current = "Finishing";
    this.logger.debug("Signalling end of audio", { chunksSent: this.counters.chunksSent });
    this.ws.send(END_OF_AUDIO, { binary: true }, (err) => {
      if (err) this.fail(new ConnectionError(`Failed to signal end of audio: ${err.message}`, { cause: err }));
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
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(1000, "client closed");
    }
  }

  stats(): TransportStats {
    return { ...this.counters };
  }

  private async *iterate(): AsyncIterableIterator<TransportEvent> {
    while (true) {
      const next = this.queue.shift();
      if (next) {
        yield next;
        continue;
      }
      if (this.ended) {
        if (this.failure) throw this.failure;
        return;
      }
      await once(this.emitter, "event");
    }
  }

  private waitForOpen(endpoint: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const settle = (err?: Error) => {
        this.ws.off("open", onOpen);
        this.ws.off("unexpected-response", onUnexpectedResponse);
        if (err) {
          this.current = "Failed";
          this.end();
          reject(err);
        } else {
          resolve();
        }
      };
      const onOpen = () => {
        this.current = "Streaming";
        this.ws.send(JSON.stringify(this.startMessage()));
        this.logger.info("Transcription stream connected", { endpoint });
        settle();
      };
      const onUnexpectedResponse = (_req: unknown, res: IncomingMessage) => {
        const status = res.statusCode ?? 0;
        this.ws.terminate();
        settle(
          status === 401 || status === 403
            ? new AuthError(`Backend rejected credentials (HTTP ${status}).`)
            : new ConnectionError(`Backend refused the connection (HTTP ${status}).`)
        );
      };

      this.ws.on("open", onOpen);
      this.ws.on("unexpected-response", onUnexpectedResponse);
      this.ws.on("error", (err) => {
        if (this.current === "Connecting") {
          settle(new ConnectionError(`Could not connect to ${endpoint}: ${err.message}`, { cause: err }));
          return;
        }
        this.fail(new ConnectionError(`Transport error: ${err.message}`, { cause: err }));
      });
    });
  }

  private startMessage() {
    return {
      type: "start",
      model: this.config.model,
      audio_format: "pcm_s16le",
      sample_rate: this.config.sampleRate,
      num_channels: this.config.channels,
      language: this.config.language,
      enable_speaker_diarization: this.config.enableSpeakerDiarization ?? false,
    };
  }

  private handleMessage(data: WebSocket.RawData, isBinary: boolean) {
    if (this.ended) return;
    if (isBinary) {
      this.fail(new ProtocolError("Backend sent an unexpected binary frame."));
      return;
    }

    let event: TransportEvent;
    try {
      event = parseBackendMessage(data.toString());
    } catch (err) {
      this.fail(err instanceof ProtocolError ? err : new ProtocolError(describeError(err), { cause: err }));
      return;
    }

    this.push(event);
    if (event.kind === "control" && event.type === "error") {
      this.logger.error("Backend reported an error", { message: event.message });
      this.current = "Failed";
      this.end();
      this.ws.close(1011, "backend error");
    }
  }

  private handleClose(code: number, reason: string) {
    if (this.ended) return;
    if (this.current === "Finishing" && CLEAN_CLOSE_CODES.has(code)) {
      this.current = "Closed";
      this.logger.info("Transcription stream finished", { code, chunksSent: this.counters.chunksSent });
      this.end();
      return;
    }
    if (this.current === "Streaming" || this.current === "Finishing") {
      this.logger.warn("Transcription stream closed unexpectedly", { code, reason });
      this.current = "Failed";
      this.push({
        kind: "control",
        type: "error",
        message: `Connection closed unexpectedly (code=${code}${reason ? ` reason=${reason}` : ""})`,
      });
      this.end();
    }
  }

  private fail(err: Error) {
    if (this.ended) return;
    this.logger.error("Transport failed", { error: err.message });
    this.current = "Failed";
    if (err instanceof ProtocolError) {
      this.failure = err;
    } else {
      this.push({ kind: "control", type: "error", message: err.message });
    }
    this.end();
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.close(1011, "client error");
    }
  }

  private push(event: TransportEvent) {
    this.queue.push(event);
    this.emitter.emit("event");
  }

  private end() {
    this.ended = true;
    this.emitter.emit("event");
  }
}

function once(emitter: EventEmitter, event: string): Promise<void> {
  return new Promise((resolve) => {
    emitter.once(event, () => resolve());
  });
}
