/**
 * Package Constants
 */

import type { TextStyle } from '../types/render';

// ============================================================================
// Rendering
// ============================================================================

/**
 * Style used for plain cues when the caller supplies only a rasterizer
 */
export const DEFAULT_TEXT_STYLE: Readonly<TextStyle> = {
  font: 'Georgia-Bold',
  size: 24,
  color: 'white',
  strokeColor: 'black',
  strokeWidth: 0.5,
  bgColor: 'transparent',
};

/**
 * Text rendered once per session to find out whether artifacts carry a mask
 */
export const MASK_PROBE_TEXT = 'T';

// ============================================================================
// Styled Format
// ============================================================================

export const WORD_STYLE_DEFAULTS = {
  STROKE_WIDTH: 1,
  BG_COLOR: 'transparent',
} as const;

/** Styled timestamps are milliseconds */
export const MS_PER_SECOND = 1000;

// ============================================================================
// Text Export
// ============================================================================

export const TEXT_EXPORT = {
  /** Separator between start and end in the text representation */
  RANGE_SEPARATOR: ' - ',
  /** Separator between start and end in SubRip output */
  SRT_ARROW: ' --> ',
  BLOCK_SEPARATOR: '\n\n',
} as const;
