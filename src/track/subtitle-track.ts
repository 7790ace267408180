/**
 * Subtitle Track
 *
 * Owns everything a subtitle layer needs for one session: the cue timeline,
 * the render cache, the renderer and (for styled files) the word-style table.
 * Frames are rendered lazily, once per cue, and reused until the track is
 * dropped.
 *
 * ```ts
 * const track = await SubtitleTrack.fromFile('movie.srt', { rasterizer });
 * const frame = track.frameAt(12.5);
 * const mask = track.mask?.maskAt(12.5);
 * ```
 */

import { writeFile } from 'node:fs/promises';
import type { Cue, CueEntry, StyleTable } from '../shared/types/subtitle';
import { plainContent } from '../shared/types/subtitle';
import type { MaskFrame, PixelFrame, RenderArtifact, Renderer, TextRasterizer, TextStyle } from '../shared/types/render';
import { RenderCache } from '../shared/cache/render-cache';
import { readSubtitleFile } from '../shared/parsers';
import {
  loadTrackSettings,
  type MaskSupportMode,
  type TrackSettings,
} from '../shared/utils/config-validator';
import { MASK_PROBE_TEXT } from '../shared/utils/constants';
import {
  ErrorCodes,
  RenderFailureError,
  createFileError,
  createValidationError,
} from '../shared/utils/error-handler';
import { createLogger, setLogLevel } from '../shared/utils/logger';
import { generateSRT, type SRTGenerationOptions } from '../shared/utils/srt-generator';
import { createTextRenderer } from '../render/text-renderer';
import { FrameResolver } from './frame-resolver';
import { CueTimeline, type CuePattern } from './timeline';

const logger = createLogger('SubtitleTrack');

// ============================================================================
// Types
// ============================================================================

export type TrackMode = 'plain' | 'styled';

export interface SubtitleTrackOptions {
  /** Renders cue content; takes precedence over `rasterizer` */
  renderer?: Renderer;
  /** Text engine used to build a renderer when none is given */
  rasterizer?: TextRasterizer;
  /** Style for plain cues when rendering through `rasterizer` */
  plainStyle?: TextStyle;
  /** Word styles per cue; makes the track a styled session */
  styles?: StyleTable;
  /** Mask detection (default: 'probe', renders MASK_PROBE_TEXT once) */
  maskSupport?: MaskSupportMode;
}

export interface LoadTrackOptions
  extends Omit<SubtitleTrackOptions, 'styles' | 'maskSupport'>,
    Partial<TrackSettings> {}

/**
 * Mask channel of a track whose renderer produces masks
 */
export interface TrackMask {
  maskAt(t: number): MaskFrame;
}

// ============================================================================
// Helpers
// ============================================================================

function resolveRenderer(options: SubtitleTrackOptions): Renderer {
  if (options.renderer) {
    return options.renderer;
  }
  if (options.rasterizer) {
    return createTextRenderer(options.rasterizer, { plainStyle: options.plainStyle });
  }
  throw createValidationError('A subtitle track needs a renderer or a rasterizer');
}

function probeMaskSupport(renderer: Renderer, mode: MaskSupportMode): boolean {
  if (mode !== 'probe') {
    return mode === 'always';
  }

  let probe: RenderArtifact;
  try {
    probe = renderer(plainContent(MASK_PROBE_TEXT));
  } catch (error) {
    throw new RenderFailureError('Renderer failed while probing for mask support', {
      cause: error instanceof Error ? error : undefined,
    });
  }
  return typeof probe.maskAt === 'function';
}

// ============================================================================
// Subtitle Track
// ============================================================================

export class SubtitleTrack implements Iterable<Cue> {
  readonly timeline: CueTimeline;
  readonly cache = new RenderCache<RenderArtifact>();
  readonly mode: TrackMode;
  /** Null when the renderer's artifacts have no mask channel */
  readonly mask: TrackMask | null;

  private readonly renderer: Renderer;
  private readonly styles?: StyleTable;
  private readonly resolver: FrameResolver;

  constructor(timeline: CueTimeline, options: SubtitleTrackOptions) {
    this.timeline = timeline;
    this.styles = options.styles;
    this.mode = options.styles ? 'styled' : 'plain';
    this.renderer = resolveRenderer(options);
    this.resolver = new FrameResolver(timeline, this.cache, this.renderer, this.styles);

    const resolver = this.resolver;
    this.mask = probeMaskSupport(this.renderer, options.maskSupport ?? 'probe')
      ? { maskAt: (t) => resolver.maskAt(t) }
      : null;
  }

  /**
   * Build a track from literal `[[start, end], text | words]` entries
   */
  static fromEntries(entries: readonly CueEntry[], options: SubtitleTrackOptions): SubtitleTrack {
    return new SubtitleTrack(CueTimeline.fromEntries(entries), options);
  }

  /**
   * Load a track from a subtitle file. Settings not given in `options` come
   * from SUBTITLE_TRACK_* environment variables, then defaults.
   */
  static async fromFile(path: string, options: LoadTrackOptions = {}): Promise<SubtitleTrack> {
    const settings = loadTrackSettings(process.env, {
      format: options.format,
      encoding: options.encoding,
      maskSupport: options.maskSupport,
      logLevel: options.logLevel,
    });
    if (options.logLevel) {
      setLogLevel(settings.logLevel);
    }

    const parsed = await readSubtitleFile(path, { format: settings.format, encoding: settings.encoding });
    const track = new SubtitleTrack(new CueTimeline(parsed.cues), {
      renderer: options.renderer,
      rasterizer: options.rasterizer,
      plainStyle: options.plainStyle,
      styles: parsed.styles,
      maskSupport: settings.maskSupport,
    });

    logger.info('Loaded subtitle track', {
      path,
      format: parsed.format,
      cues: parsed.cues.length,
      duration: track.duration,
      mask: track.mask !== null,
    });

    return track;
  }

  get duration(): number {
    return this.timeline.duration;
  }

  get start(): number {
    return this.timeline.start;
  }

  get end(): number {
    return this.timeline.end;
  }

  get length(): number {
    return this.timeline.length;
  }

  at(index: number): Cue | undefined {
    return this.timeline.at(index);
  }

  [Symbol.iterator](): Iterator<Cue> {
    return this.timeline[Symbol.iterator]();
  }

  // ==========================================================================
  // Frames
  // ==========================================================================

  /**
   * Subtitle frame at `t`; a 1x1 black frame when no cue is active
   */
  frameAt(t: number): PixelFrame {
    return this.resolver.frameAt(t);
  }

  /**
   * Cue shown at `t`, without rendering it
   */
  activeCue(t: number): Cue | null {
    return this.resolver.activeCue(t);
  }

  // ==========================================================================
  // Editing
  // ==========================================================================

  /**
   * Cues overlapping `[start, end)`, clamped to it
   */
  subRange(start?: number, end?: number): Cue[] {
    return this.timeline.subRange(start, end);
  }

  /**
   * New track with the matching cues. It shares this track's renderer, styles
   * and mask support but starts with an empty cache.
   */
  filter(pattern: CuePattern): SubtitleTrack {
    return new SubtitleTrack(this.timeline.filter(pattern), {
      renderer: this.renderer,
      styles: this.styles,
      maskSupport: this.mask ? 'always' : 'never',
    });
  }

  // ==========================================================================
  // Export
  // ==========================================================================

  toTextRepresentation(): string {
    return this.timeline.toTextRepresentation();
  }

  toString(): string {
    return this.toTextRepresentation();
  }

  /**
   * Numbered SubRip output
   */
  toSrt(options?: SRTGenerationOptions): string {
    return generateSRT(this.timeline, options);
  }

  /**
   * Write the text representation to `path`
   */
  async writeSrt(path: string): Promise<void> {
    try {
      await writeFile(path, this.toTextRepresentation(), { encoding: 'utf8' });
    } catch (error) {
      throw createFileError(ErrorCodes.FILE_WRITE_ERROR, path, error);
    }
    logger.debug('Wrote subtitle track', { path, cues: this.length });
  }
}
