/**
 * Parsers barrel export
 */

export * from './srt-parser';
export * from './styled-json-parser';

import { readFile } from 'node:fs/promises';
import type { Cue, StyleTable, SubtitleFormat } from '../types/subtitle';
import { parseSRT, isSRTFormat } from './srt-parser';
import { parseStyledJSON, isStyledJSONFormat } from './styled-json-parser';
import { ErrorCodes, MalformedInputError, createFileError } from '../utils/error-handler';
import { createTimer } from '../utils/logger';
import { DEFAULT_ENCODING, decodeText } from '../utils/text-encoding';

/**
 * Parsed subtitle file. `styles` is present for the styled format only.
 */
export interface ParsedSubtitles {
  format: SubtitleFormat;
  cues: Cue[];
  styles?: StyleTable;
}

export interface ReadSubtitleOptions {
  /** Input format (default: detected from the content) */
  format?: SubtitleFormat | 'auto';
  /** WHATWG encoding label (default: utf-8) */
  encoding?: string;
}

/**
 * Detect subtitle format from content
 */
export function detectSubtitleFormat(content: string): SubtitleFormat | null {
  if (isStyledJSONFormat(content)) {
    return 'styled-json';
  }

  if (isSRTFormat(content)) {
    return 'srt';
  }

  return null;
}

/**
 * Parse subtitle content in the given (or detected) format
 */
export function parseSubtitles(content: string, format: SubtitleFormat | 'auto' = 'auto'): ParsedSubtitles {
  const resolved = format === 'auto' ? detectSubtitleFormat(content) : format;

  switch (resolved) {
    case 'srt': {
      const { cues } = parseSRT(content);
      if (cues.length === 0) {
        throw new MalformedInputError('Subtitle file contains no cues', { code: ErrorCodes.PARSE_EMPTY_CONTENT });
      }
      return { format: 'srt', cues };
    }
    case 'styled-json': {
      const { cues, styles } = parseStyledJSON(content);
      return { format: 'styled-json', cues, styles };
    }
    case null:
      throw new MalformedInputError('Unrecognized subtitle format');
  }
}

/**
 * Read and parse a subtitle file
 */
export async function readSubtitleFile(path: string, options: ReadSubtitleOptions = {}): Promise<ParsedSubtitles> {
  const done = createTimer('SubtitleFile', `Read ${path}`);

  try {
    let bytes: Buffer;
    try {
      bytes = await readFile(path);
    } catch (error) {
      throw createFileError(ErrorCodes.FILE_READ_ERROR, path, error);
    }

    return parseSubtitles(decodeText(bytes, options.encoding ?? DEFAULT_ENCODING), options.format ?? 'auto');
  } finally {
    done();
  }
}
