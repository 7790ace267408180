/**
 * SRT Generator
 *
 * Text output for cue lists: the compact `start - end` representation used to
 * persist an edited track, and numbered SubRip blocks.
 * @see https://en.wikipedia.org/wiki/SubRip
 */

import type { Cue } from '../types/subtitle';
import { cueText } from '../types/subtitle';
import { TEXT_EXPORT } from './constants';

// ============================================================================
// Types
// ============================================================================

/**
 * SRT generation options
 */
export interface SRTGenerationOptions {
  /** Include UTF-8 BOM (default: false) */
  includeBOM?: boolean;
  /** Use Windows line endings (default: false) */
  useWindowsLineEndings?: boolean;
}

// ============================================================================
// Timestamp Formatting
// ============================================================================

/**
 * Format seconds to SRT timestamp
 * Format: HH:MM:SS,mmm
 */
export function formatSRTTimestamp(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const milliseconds = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);

  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const secs = totalSeconds % 60;

  const hh = hours.toString().padStart(2, '0');
  const mm = minutes.toString().padStart(2, '0');
  const ss = secs.toString().padStart(2, '0');
  const mmm = milliseconds.toString().padStart(3, '0');

  return `${hh}:${mm}:${ss},${mmm}`;
}

// ============================================================================
// Text Representation
// ============================================================================

/**
 * Serialize cues as `HH:MM:SS,mmm - HH:MM:SS,mmm\n<text>` blocks separated
 * by a blank line. The plain parser reads this back.
 */
export function generateTextRepresentation(cues: Iterable<Cue>): string {
  const blocks: string[] = [];

  for (const cue of cues) {
    const range = `${formatSRTTimestamp(cue.start)}${TEXT_EXPORT.RANGE_SEPARATOR}${formatSRTTimestamp(cue.end)}`;
    blocks.push(`${range}\n${cueText(cue.content)}`);
  }

  return blocks.join(TEXT_EXPORT.BLOCK_SEPARATOR);
}

// ============================================================================
// SRT Generation
// ============================================================================

/**
 * Generate numbered SubRip content from cues
 */
export function generateSRT(cues: Iterable<Cue>, options: SRTGenerationOptions = {}): string {
  const { includeBOM = false, useWindowsLineEndings = false } = options;

  const lineEnding = useWindowsLineEndings ? '\r\n' : '\n';
  const lines: string[] = [];

  let cueNumber = 1;

  for (const cue of cues) {
    const text = cueText(cue.content).trim();

    // Skip cues with no text
    if (!text) {
      continue;
    }

    lines.push(String(cueNumber));
    lines.push(`${formatSRTTimestamp(cue.start)}${TEXT_EXPORT.SRT_ARROW}${formatSRTTimestamp(cue.end)}`);
    lines.push(...text.split('\n'));
    lines.push('');

    cueNumber++;
  }

  let content = lines.join(lineEnding);

  if (includeBOM) {
    content = '\ufeff' + content;
  }

  return content;
}
