import type { AudioChunk } from "../../domain/audio/types";
import type { Token } from "../../domain/transcript/types";

export type TransportState = "Idle" | "Connecting" | "Streaming" | "Finishing" | "Closed" | "Failed";

export type ControlEvent = { kind: "control"; type: "ready" } | { kind: "control"; type: "error"; message: string };

export type TransportEvent = { kind: "token"; token: Token } | ControlEvent;

export interface TransportConfig {
  apiKey: string;
  sampleRate: number;
  channels: number;
  model?: string;
  language?: string;
  enableSpeakerDiarization?: boolean;
  connectTimeoutMs?: number;
}

export interface TransportStats {
  bytesSent: number;
  chunksSent: number;
  sequenceGaps: number;
}

export interface TransportSession {
  readonly state: TransportState;
  send(chunk: AudioChunk): void;
  finish(): void;
  receive(): AsyncIterable<TransportEvent>;
  close(): Promise<void>;
  stats(): TransportStats;
}

export interface TranscriptionTransport {
  connect(endpoint: string, config: TransportConfig): Promise<TransportSession>;
}
