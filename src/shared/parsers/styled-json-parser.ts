/**
 * Styled JSON Parser
 *
 * Parses word-level styled subtitles: a JSON array of lines, each with
 * millisecond `startTimestamp`/`endTimestamp` and a list of styled words.
 *
 * ```json
 * [{ "startTimestamp": 1000, "endTimestamp": 2500,
 *    "words": [{ "text": "Hello", "font": "Arial", "size": 32, "color": "yellow" }] }]
 * ```
 *
 * Each line becomes one plain-text cue (the words joined with a trailing
 * space each) plus a style-table entry holding the words themselves.
 */

import type { Cue, StyleTable, WordStyle } from '../types/subtitle';
import { plainContent } from '../types/subtitle';
import { serializeCueKey, type CueKey } from '../cache/cache-utils';
import { MS_PER_SECOND, WORD_STYLE_DEFAULTS } from '../utils/constants';
import {
  formatValidationErrors,
  isRecord,
  validateField,
  type FieldSchema,
} from '../utils/config-validator';
import { ErrorCodes, MalformedInputError } from '../utils/error-handler';
import { createLogger } from '../utils/logger';

const logger = createLogger('StyledJSONParser');

// ============================================================================
// Types
// ============================================================================

export interface StyledParseResult {
  cues: Cue[];
  styles: StyleTable;
}

// ============================================================================
// Schema
// ============================================================================

const WORD_SCHEMA: FieldSchema = {
  type: 'object',
  properties: {
    text: { type: 'string', required: true },
    font: { type: 'string', required: true },
    size: { type: 'number', required: true, min: 0 },
    color: { type: 'string', required: true },
    strokeColor: { type: 'string' },
    stroke_color: { type: 'string' },
    strokeWidth: { type: 'number', min: 0 },
    stroke_width: { type: 'number', min: 0 },
    bgColor: { type: 'string' },
    bg_color: { type: 'string' },
  },
};

export const STYLED_DOCUMENT_SCHEMA: FieldSchema = {
  type: 'array',
  required: true,
  items: {
    type: 'object',
    properties: {
      startTimestamp: { type: 'number', required: true, min: 0 },
      endTimestamp: { type: 'number', required: true, min: 0 },
      words: { type: 'array', required: true, minItems: 1, items: WORD_SCHEMA },
    },
  },
};

/** Only the first problems are reported; a broken file tends to repeat them */
const MAX_REPORTED_ERRORS = 5;

// ============================================================================
// Field Access
// ============================================================================

function optionalString(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

function optionalNumber(record: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'number') return value;
  }
  return undefined;
}

function required<T>(value: T | undefined, path: string): T {
  if (value === undefined) {
    throw new MalformedInputError(`Missing field ${path}`);
  }
  return value;
}

function toWordStyle(word: unknown, path: string): WordStyle {
  if (!isRecord(word)) {
    throw new MalformedInputError(`Expected an object at ${path}`);
  }

  return {
    text: required(optionalString(word, 'text'), `${path}.text`) + ' ',
    font: required(optionalString(word, 'font'), `${path}.font`),
    size: required(optionalNumber(word, 'size'), `${path}.size`),
    color: required(optionalString(word, 'color'), `${path}.color`),
    strokeColor: optionalString(word, 'strokeColor', 'stroke_color'),
    strokeWidth: optionalNumber(word, 'strokeWidth', 'stroke_width') ?? WORD_STYLE_DEFAULTS.STROKE_WIDTH,
    bgColor: optionalString(word, 'bgColor', 'bg_color') ?? WORD_STYLE_DEFAULTS.BG_COLOR,
  };
}

// ============================================================================
// Main Parser
// ============================================================================

/**
 * Parse styled JSON content into cues and their word-style table
 */
export function parseStyledJSON(content: string): StyledParseResult {
  let data: unknown;
  try {
    data = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new MalformedInputError('Styled subtitles are not valid JSON', {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const errors = validateField(data, STYLED_DOCUMENT_SCHEMA, 'lines');
  if (errors.length > 0) {
    throw new MalformedInputError(
      `Invalid styled subtitles:\n${formatValidationErrors(errors.slice(0, MAX_REPORTED_ERRORS))}`,
      { context: { errorCount: errors.length } }
    );
  }

  if (!Array.isArray(data)) {
    throw new MalformedInputError('Styled subtitles must be a JSON array');
  }

  const cues: Cue[] = [];
  const styles = new Map<CueKey, readonly WordStyle[]>();

  data.forEach((line: unknown, i) => {
    const path = `lines[${i}]`;
    if (!isRecord(line) || !Array.isArray(line.words)) {
      throw new MalformedInputError(`Expected a line object at ${path}`);
    }

    const startMs = required(optionalNumber(line, 'startTimestamp'), `${path}.startTimestamp`);
    const endMs = required(optionalNumber(line, 'endTimestamp'), `${path}.endTimestamp`);
    const words = line.words.map((word: unknown, j) => toWordStyle(word, `${path}.words[${j}]`));

    const cue: Cue = {
      start: startMs / MS_PER_SECOND,
      end: endMs / MS_PER_SECOND,
      content: plainContent(words.map((word) => word.text).join('')),
    };
    cues.push(cue);

    const key = serializeCueKey(cue);
    if (styles.has(key)) {
      logger.warn('Duplicate styled line, keeping the first styles', { line: i, start: cue.start });
      return;
    }
    styles.set(key, Object.freeze(words));
  });

  if (cues.length === 0) {
    throw new MalformedInputError('Styled subtitles contain no lines', { code: ErrorCodes.PARSE_EMPTY_CONTENT });
  }

  return { cues, styles };
}

/**
 * Check if content looks like styled JSON (a JSON array)
 */
export function isStyledJSONFormat(content: string): boolean {
  return content.replace(/^\uFEFF/, '').trimStart().startsWith('[');
}
