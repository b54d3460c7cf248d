/**
 * Encrypted memory records: types, emotion tagging and query matching
 */

export * from './types.js';
export { classifyEmotion, mergeTags } from './emotion.js';
export { hasQueryFilter, matchesFilter, scanMemories } from './query.js';
