/**
 * Cache Utilities
 *
 * Cue identity for the render cache and the style table.
 *
 * Two cues share a key exactly when their boundaries are the same doubles and
 * their content is structurally equal. Boundaries are written with the
 * shortest round-trip number form, so keys only agree for times produced by
 * the same conversion (the parsers always use `totalMilliseconds / 1000`).
 */

import type { Cue, CueContent, WordStyle } from '../types/subtitle';

export type CueKey = string;

function wordFields(word: WordStyle): unknown[] {
  return [
    word.text,
    word.font,
    word.size,
    word.color,
    word.strokeColor ?? null,
    word.strokeWidth,
    word.bgColor,
  ];
}

function contentFields(content: CueContent): unknown[] {
  return content.kind === 'plain'
    ? ['plain', content.text]
    : ['styled', content.words.map(wordFields)];
}

/**
 * Serialize a cue to its structural identity key
 */
export function serializeCueKey(cue: Cue): CueKey {
  return JSON.stringify([cue.start, cue.end, ...contentFields(cue.content)]);
}

/**
 * Structural cue equality
 */
export function cuesMatch(a: Cue, b: Cue): boolean {
  return serializeCueKey(a) === serializeCueKey(b);
}

/**
 * Estimate the in-memory size of a pixel buffer in bytes
 */
export function estimateByteSize(width: number, height: number, channels: number): number {
  return Math.max(0, width) * Math.max(0, height) * channels;
}

/**
 * Format bytes as a human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
