/**
 * Subtitle-related type definitions
 */

/**
 * Supported subtitle file formats
 */
export type SubtitleFormat = 'srt' | 'styled-json';

/**
 * Per-word styling used by the styled format
 */
export interface WordStyle {
  /** Word text (styled parser appends a trailing space) */
  text: string;

  /** Font family or font file name */
  font: string;

  /** Font size in pixels */
  size: number;

  /** Fill color (any CSS-like color string) */
  color: string;

  /** Outline color, no outline when absent */
  strokeColor?: string;

  /** Outline width in pixels (default: 1) */
  strokeWidth: number;

  /** Background color behind the word, or 'transparent' */
  bgColor: string;
}

/**
 * Cue content: plain text, or a list of individually styled words
 */
export type CueContent =
  | { kind: 'plain'; text: string }
  | { kind: 'styled'; words: readonly WordStyle[] };

/**
 * Right-open time interval in seconds
 */
export interface Interval {
  /** Start time in seconds (inclusive) */
  start: number;

  /** End time in seconds (exclusive) */
  end: number;
}

/**
 * A single subtitle cue, active for `start <= t < end` (seconds)
 */
export interface Cue extends Interval {
  content: CueContent;
}

/**
 * Literal cue entry: `[[start, end], text | words]`
 */
export type CueEntry = readonly [
  readonly [start: number, end: number],
  string | readonly WordStyle[],
];

/**
 * Style side-table produced by the styled parser, keyed by cue key
 */
export type StyleTable = ReadonlyMap<string, readonly WordStyle[]>;

export function plainContent(text: string): CueContent {
  return { kind: 'plain', text };
}

export function styledContent(words: readonly WordStyle[]): CueContent {
  return { kind: 'styled', words };
}

/**
 * Textual form of a cue's content (styled: concatenated word texts)
 */
export function cueText(content: CueContent): string {
  return content.kind === 'plain'
    ? content.text
    : content.words.map((word) => word.text).join('');
}

/**
 * Whether `t` falls in the right-open interval `[start, end)`
 */
export function isActiveAt(cue: Interval, t: number): boolean {
  return cue.start <= t && t < cue.end;
}
