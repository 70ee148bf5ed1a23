import {
  EMPTY_TRANSCRIPT,
  countWords,
  finalText,
  reduceTranscript,
  renderTranscript,
} from '../../../src/domain/transcript/TranscriptReducer';
import type { Token, TranscriptState } from '../../../src/domain/transcript/types';

const token = (text: string, isFinal: boolean, extra: Pick<Token, 'speakerId'> = {}) => ({
  type: 'token' as const,
  token: { text, isFinal, confidence: 0.9, ...extra },
});

const feed = (events: ReturnType<typeof token>[], start: TranscriptState = EMPTY_TRANSCRIPT) =>
  events.reduce<TranscriptState>((state, event) => reduceTranscript(state, event), start);

describe('reduceTranscript', () => {
  test('partials replace each other and finals commit with a trailing space', () => {
    const state = feed([token('he', false), token('hell', false), token('hello', false), token('hello ', true)]);

    expect(renderTranscript(state)).toBe('hello ');
    expect(state.wordCount).toBe(1);
    expect(state.partial).toBeNull();
    expect(state.segments).toEqual([{ text: 'hello ', confidence: 0.9 }]);
  });

  test('a partial renders after the finalized text and is not counted', () => {
    const state = feed([token('good morning', true), token('every', false)]);

    expect(renderTranscript(state)).toBe('good morning every');
    expect(state.wordCount).toBe(2);
  });

  test('keeps the speaker on a final segment', () => {
    const state = feed([token('hi', true, { speakerId: 2 })]);
    expect(state.segments[0]).toEqual({ text: 'hi ', confidence: 0.9, speakerId: 2 });
  });

  test('a whitespace-only final only clears the partial', () => {
    const withPartial = feed([token('one', true), token('tw', false)]);
    const cleared = reduceTranscript(withPartial, token('   ', true));

    expect(cleared.partial).toBeNull();
    expect(cleared.segments).toBe(withPartial.segments);
    expect(renderTranscript(cleared)).toBe('one ');

    expect(reduceTranscript(cleared, token('', true))).toBe(cleared);
  });

  test('finalized segments are frozen and never rewritten', () => {
    const first = feed([token('alpha', true)]);
    const second = reduceTranscript(first, token('beta', true));

    expect(Object.isFrozen(second.segments)).toBe(true);
    expect(Object.isFrozen(second.segments[0])).toBe(true);
    expect(second.segments[0]).toBe(first.segments[0]);
    expect(first.segments).toHaveLength(1);
  });

  test('reset returns the empty transcript', () => {
    const state = feed([token('some words', true), token('more', false)]);
    const reset = reduceTranscript(state, { type: 'reset' });

    expect(reset).toBe(EMPTY_TRANSCRIPT);
    expect(renderTranscript(reset)).toBe('');
    expect(reset.wordCount).toBe(0);
  });
});

describe('finalText', () => {
  test('joins finalized segments and trims, ignoring the partial', () => {
    const state = feed([token('first', true), token('second', true), token('thi', false)]);
    expect(finalText(state)).toBe('first second');
  });
});

describe('countWords', () => {
  test('splits on any whitespace', () => {
    expect(countWords('  a\tb\n c  ')).toBe(3);
    expect(countWords('   ')).toBe(0);
  });
});
