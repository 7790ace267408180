/**
 * SRT Parser
 *
 * Parses line-based timestamped subtitles: SubRip files, and the compact
 * `start - end` blocks produced by the text export.
 * @see https://en.wikipedia.org/wiki/SubRip
 */

import type { Cue } from '../types/subtitle';
import { plainContent } from '../types/subtitle';
import { ErrorCodes, MalformedInputError } from '../utils/error-handler';
import { createLogger } from '../utils/logger';

const logger = createLogger('SRTParser');

// ============================================================================
// Types
// ============================================================================

/**
 * SRT parsing result
 */
export interface SRTParseResult {
  cues: Cue[];
}

interface OpenBlock {
  start: number;
  end: number;
  line: number;
  text: string[];
}

// ============================================================================
// Timestamp Parsing
// ============================================================================

/** HH:MM:SS,mmm with `.` accepted as millisecond separator */
const TIMESTAMP_PATTERN = /(\d{1,3}):(\d{2}):(\d{2})[,.](\d{3})/g;

function timestampToSeconds(hours: string, minutes: string, seconds: string, milliseconds: string): number {
  const totalMs =
    (parseInt(hours, 10) * 3600 + parseInt(minutes, 10) * 60 + parseInt(seconds, 10)) * 1000 +
    parseInt(milliseconds, 10);
  return totalMs / 1000;
}

/**
 * Parse SRT timestamp to seconds
 * Format: HH:MM:SS,mmm or HH:MM:SS.mmm (period variant)
 */
export function parseSRTTimestamp(timestamp: string): number {
  const match = /^(\d{1,3}):(\d{2}):(\d{2})[,.](\d{3})$/.exec(timestamp.trim());

  if (!match) {
    throw new MalformedInputError(`Invalid SRT timestamp format: ${timestamp}`, {
      code: ErrorCodes.PARSE_INVALID_TIMESTAMP,
    });
  }

  return timestampToSeconds(match[1], match[2], match[3], match[4]);
}

/**
 * All timestamps on a line, in seconds
 */
function findTimestamps(line: string): number[] {
  return Array.from(line.matchAll(TIMESTAMP_PATTERN), (m) => timestampToSeconds(m[1], m[2], m[3], m[4]));
}

// ============================================================================
// Main Parser
// ============================================================================

/**
 * Parse SRT content into cues.
 *
 * A line holding timestamps opens a block and must hold exactly two. Text
 * lines follow until a blank line, the next timing line or the end of input.
 * Lines outside a block (cue numbers) are ignored.
 */
export function parseSRT(content: string): SRTParseResult {
  const lines = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').split('\n');
  const cues: Cue[] = [];
  let block: OpenBlock | null = null;

  const closeBlock = (): void => {
    if (!block) return;

    const text = block.text.join('\n').trim();
    if (text) {
      cues.push({ start: block.start, end: block.end, content: plainContent(text) });
    } else {
      logger.debug('Skipping cue without text', { line: block.line });
    }
    block = null;
  };

  lines.forEach((line, i) => {
    const lineNumber = i + 1;
    const timestamps = findTimestamps(line);

    if (timestamps.length > 0) {
      closeBlock();

      if (timestamps.length !== 2) {
        throw new MalformedInputError(
          `Expected a start and end timestamp on line ${lineNumber}, found ${timestamps.length}`,
          { code: ErrorCodes.PARSE_INVALID_TIMESTAMP, line: lineNumber }
        );
      }

      block = { start: timestamps[0], end: timestamps[1], line: lineNumber, text: [] };
      return;
    }

    if (line.trim() === '') {
      closeBlock();
      return;
    }

    if (block) {
      block.text.push(line);
    }
  });

  closeBlock();

  return { cues };
}

/**
 * Check if content looks like SRT format: its first non-blank lines include a
 * timing line
 */
export function isSRTFormat(content: string): boolean {
  const lines = content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '')
    .slice(0, 3);

  return lines.some((line) => findTimestamps(line).length === 2);
}
