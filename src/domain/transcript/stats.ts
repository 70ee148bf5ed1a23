import type { Stats, TranscriptState } from "./types";

export interface StatsInput {
  startedAt: number | null;
  now: number;
  transcript: TranscriptState;
  bytesSent: number;
}

export interface FormattedStats {
  duration: string;
  words: string;
  dataSent: string;
}

export function computeStats({ startedAt, now, transcript, bytesSent }: StatsInput): Stats {
  const elapsedMs = startedAt === null ? 0 : Math.max(0, now - startedAt);
  return {
    elapsedSeconds: Math.floor(elapsedMs / 1000),
    wordCount: transcript.wordCount,
    bytesSent,
  };
}

export function formatStats(stats: Stats): FormattedStats {
  const minutes = Math.floor(stats.elapsedSeconds / 60);
  const seconds = stats.elapsedSeconds % 60;
  return {
    duration: `${minutes}:${seconds.toString().padStart(2, "0")}`,
    words: stats.wordCount.toString(),
    dataSent: `${(stats.bytesSent / 1024).toFixed(1)} KB`,
  };
}
