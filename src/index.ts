/**
 * subtitle-track
 *
 * Lazily rendered, memoized subtitle layers for video compositing.
 */

// Track
export { SubtitleTrack } from './track/subtitle-track';
export type { LoadTrackOptions, SubtitleTrackOptions, TrackMask, TrackMode } from './track/subtitle-track';
export { CueTimeline } from './track/timeline';
export type { CuePattern, RenderedCheck } from './track/timeline';
export { FrameResolver } from './track/frame-resolver';

// Rendering
export { createTextRenderer, composeHorizontally, wordTextStyle } from './render/text-renderer';
export type { CompositeArtifact, TextRendererOptions } from './render/text-renderer';
export { blankFrame, blankMask, blitFrame, blitMask, createFrame, createMask } from './render/pixel-buffer';

// Cache
export * from './shared/cache';

// Parsers
export {
  parseSRT,
  parseSRTTimestamp,
  isSRTFormat,
  parseStyledJSON,
  isStyledJSONFormat,
  STYLED_DOCUMENT_SCHEMA,
  detectSubtitleFormat,
  parseSubtitles,
  readSubtitleFile,
} from './shared/parsers';
export type { ParsedSubtitles, ReadSubtitleOptions, SRTParseResult, StyledParseResult } from './shared/parsers';

// Types
export * from './shared/types/subtitle';
export type {
  AsyncRenderer,
  MaskFrame,
  PixelFrame,
  Placement,
  RenderArtifact,
  Renderer,
  TextRasterizer,
  TextStyle,
} from './shared/types/render';

// Errors
export {
  AppError,
  ErrorCodes,
  MalformedInputError,
  RenderFailureError,
  StyleLookupError,
  classifyError,
  normalizeError,
  logError,
} from './shared/utils/error-handler';
export type { ErrorCategory, ErrorCode, ErrorInfo, ErrorSeverity } from './shared/utils/error-handler';

// Configuration
export {
  DEFAULT_TRACK_SETTINGS,
  MASK_SUPPORT_MODES,
  SETTINGS_ENV_VARS,
  TRACK_SETTINGS_SCHEMA,
  loadTrackSettings,
} from './shared/utils/config-validator';
export type { MaskSupportMode, TrackSettings } from './shared/utils/config-validator';

// Logging
export {
  createLogger,
  setLogLevel,
  setLogHandler,
  clearLogHandler,
  enableModules,
  disableModules,
  resetModuleFilters,
} from './shared/utils/logger';
export type { LogEntry, LogHandler, LogLevel, Logger } from './shared/utils/logger';

// Export helpers
export { formatSRTTimestamp, generateSRT, generateTextRepresentation } from './shared/utils/srt-generator';
export { DEFAULT_ENCODING, decodeText, isSupportedEncoding } from './shared/utils/text-encoding';
export type { SRTGenerationOptions } from './shared/utils/srt-generator';
