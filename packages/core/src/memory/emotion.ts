/**
 * Emotion tagging
 *
 * Keyword lists are checked in priority order; the first list with a
 * substring hit wins, so "sad but happy" is tagged `sad`.
 */

import type { Emotion } from './types.js';

const EMOTION_KEYWORDS: ReadonlyArray<readonly [Emotion, readonly string[]]> = [
  ['sad', ['sad', 'depressed', 'tired', 'lonely']],
  ['happy', ['happy', 'joy', 'excited', 'great']],
  ['angry', ['angry', 'mad', 'furious', 'upset']],
];

/**
 * Derive an emotion tag from free text, or null when no keyword appears.
 * Matching is a case-insensitive substring test ("madness" counts as mad).
 */
export function classifyEmotion(text: string): Emotion | null {
  const lowered = text.toLowerCase();
  for (const [emotion, keywords] of EMOTION_KEYWORDS) {
    if (keywords.some((word) => lowered.includes(word))) {
      return emotion;
    }
  }
  return null;
}

/**
 * Combine caller tags with the derived tag, dropping duplicates and
 * keeping first-insertion order.
 */
export function mergeTags(tags: readonly string[] | undefined, derived: string | null): string[] {
  const merged = new Set(tags ?? []);
  if (derived) merged.add(derived);
  return [...merged];
}
