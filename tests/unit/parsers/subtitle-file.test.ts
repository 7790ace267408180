/**
 * Format detection and file loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { detectSubtitleFormat, parseSubtitles, readSubtitleFile } from '@shared/parsers';
import { AppError, ErrorCodes, MalformedInputError } from '@shared/utils/error-handler';
import { clearLogHandler, setLogHandler, setLogLevel, type LogEntry } from '@shared/utils/logger';
import { plainContent } from '@shared/types/subtitle';

const SRT = `1
00:00:01,000 --> 00:00:02,000
Hello
`;

const STYLED = JSON.stringify([
  { startTimestamp: 0, endTimestamp: 1000, words: [{ text: 'Hi', font: 'Arial', size: 20, color: 'white' }] },
]);

describe('detectSubtitleFormat', () => {
  it('should detect both formats', () => {
    expect(detectSubtitleFormat(SRT)).toBe('srt');
    expect(detectSubtitleFormat(STYLED)).toBe('styled-json');
  });

  it('should return null for unknown content', () => {
    expect(detectSubtitleFormat('WEBVTT\n\nnothing here')).toBeNull();
  });
});

describe('parseSubtitles', () => {
  it('should parse SubRip content without styles', () => {
    const parsed = parseSubtitles(SRT);

    expect(parsed.format).toBe('srt');
    expect(parsed.cues).toEqual([{ start: 1, end: 2, content: plainContent('Hello') }]);
    expect(parsed.styles).toBeUndefined();
  });

  it('should parse styled content with its style table', () => {
    const parsed = parseSubtitles(STYLED);

    expect(parsed.format).toBe('styled-json');
    expect(parsed.cues).toHaveLength(1);
    expect(parsed.styles?.size).toBe(1);
  });

  it('should honour an explicit format', () => {
    expect(() => parseSubtitles(SRT, 'styled-json')).toThrow('Styled subtitles are not valid JSON');
  });

  it('should reject a SubRip file without cues', () => {
    try {
      parseSubtitles('1\n00:00:01,000 --> 00:00:02,000\n', 'srt');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedInputError);
      expect(error).toMatchObject({ code: ErrorCodes.PARSE_EMPTY_CONTENT });
    }
  });

  it('should reject unrecognized content', () => {
    expect(() => parseSubtitles('no subtitles here')).toThrow('Unrecognized subtitle format');
  });
});

describe('readSubtitleFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'subtitle-file-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read and parse a file', async () => {
    const path = join(dir, 'movie.srt');
    await writeFile(path, SRT, 'utf8');

    const parsed = await readSubtitleFile(path);

    expect(parsed.format).toBe('srt');
    expect(parsed.cues).toHaveLength(1);
  });

  it('should decode a legacy single-byte encoding', async () => {
    const path = join(dir, 'cp1252.srt');
    await writeFile(
      path,
      Buffer.concat([
        Buffer.from('00:00:00,000 --> 00:00:01,000\n', 'ascii'),
        Buffer.from([0x93, 0x43, 0x61, 0x66, 0xe9, 0x94, 0x20, 0x80, 0x35, 0x0a]),
      ])
    );

    const parsed = await readSubtitleFile(path, { encoding: 'windows-1252' });

    expect(parsed.cues[0].content).toEqual(plainContent('\u201cCaf\u00e9\u201d \u20ac5'));
  });

  it('should decode utf-16le files with a byte order mark', async () => {
    const path = join(dir, 'utf16.srt');
    await writeFile(path, Buffer.from('\ufeff00:00:00,000 --> 00:00:01,000\nHello\n', 'utf16le'));

    const parsed = await readSubtitleFile(path, { encoding: 'utf-16le' });

    expect(parsed.cues).toEqual([{ start: 0, end: 1, content: plainContent('Hello') }]);
  });

  it('should reject bytes that are invalid in the encoding', async () => {
    const path = join(dir, 'cp1252-as-utf8.srt');
    await writeFile(path, Buffer.from('00:00:00,000 --> 00:00:01,000\nCaf\u00e9\n', 'latin1'));

    const error = await readSubtitleFile(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error).toMatchObject({
      code: ErrorCodes.PARSE_INVALID_ENCODING,
      message: 'Input is not valid utf-8 text',
    });
  });

  it('should reject an unknown encoding label', async () => {
    const path = join(dir, 'movie.srt');
    await writeFile(path, SRT, 'utf8');

    await expect(readSubtitleFile(path, { encoding: 'klingon' })).rejects.toMatchObject({
      code: ErrorCodes.VALIDATION_INVALID_VALUE,
      message: 'Unsupported text encoding: klingon',
    });
  });

  it('should log the read time even when parsing fails', async () => {
    const entries: LogEntry[] = [];
    setLogLevel('debug');
    setLogHandler((entry) => entries.push(entry));
    const path = join(dir, 'notes.txt');
    await writeFile(path, 'no subtitles here', 'utf8');

    try {
      await expect(readSubtitleFile(path)).rejects.toThrow('Unrecognized subtitle format');
    } finally {
      clearLogHandler();
      setLogLevel('none');
    }

    expect(entries.map((e) => e.message)).toContain(`Read ${path} completed`);
  });

  it('should report a missing file as a read error', async () => {
    const path = join(dir, 'missing.srt');

    const error = await readSubtitleFile(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({
      code: ErrorCodes.FILE_READ_ERROR,
      category: 'io',
      context: { path },
    });
  });
});
