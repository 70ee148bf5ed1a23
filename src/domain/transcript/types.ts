export interface Token {
  text: string;
  isFinal: boolean;
  confidence: number;
  speakerId?: number;
}

export interface FinalSegment {
  readonly text: string;
  readonly confidence: number;
  readonly speakerId?: number;
}

export interface TranscriptState {
  readonly segments: readonly FinalSegment[];
  readonly partial: string | null;
  readonly wordCount: number;
}

export type TranscriptEvent = { type: "token"; token: Token } | { type: "reset" };

export interface Stats {
  elapsedSeconds: number;
  wordCount: number;
  bytesSent: number;
}
