import type { FinalSegment, TranscriptEvent, TranscriptState } from "./types";

export const EMPTY_TRANSCRIPT: TranscriptState = Object.freeze({
  segments: Object.freeze([]),
  partial: null,
  wordCount: 0,
});

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Folds one event into the transcript. Partial tokens replace the trailing
 * hypothesis; final tokens append a frozen segment and clear it.
 */
export function reduceTranscript(state: TranscriptState, event: TranscriptEvent): TranscriptState {
  if (event.type === "reset") return EMPTY_TRANSCRIPT;

  const { token } = event;
  if (!token.isFinal) {
    return { ...state, partial: token.text };
  }

  const text = token.text.trim();
  if (!text) {
    return state.partial === null ? state : { ...state, partial: null };
  }

  const segment: FinalSegment = Object.freeze({
    text: `${text} `,
    confidence: token.confidence,
    ...(token.speakerId !== undefined ? { speakerId: token.speakerId } : {}),
  });
  const segments = Object.freeze([...state.segments, segment]);
  return {
    segments,
    partial: null,
    wordCount: countWords(segments.map((s) => s.text).join("")),
  };
}

export function renderTranscript(state: TranscriptState): string {
  const finalized = state.segments.map((segment) => segment.text).join("");
  return state.partial === null ? finalized : finalized + state.partial;
}

/** Finalized text only, as copied out of the transcript view. */
export function finalText(state: TranscriptState): string {
  return state.segments
    .map((segment) => segment.text)
    .join("")
    .trim();
}
