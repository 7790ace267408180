/**
 * Configuration Validator
 *
 * Schema-based validation for track settings and for loosely typed input
 * (styled subtitle JSON), with path-qualified error messages.
 */

import type { SubtitleFormat } from '../types/subtitle';
import { createValidationError } from './error-handler';
import { createLogger, LOG_LEVELS, isLogLevel, type LogLevel } from './logger';
import { DEFAULT_ENCODING, isSupportedEncoding } from './text-encoding';

const logger = createLogger('ConfigValidator');

// ============================================================================
// Types
// ============================================================================

/**
 * Validation error
 */
export interface ValidationError {
  path: string;
  message: string;
  code: string;
  expected?: unknown;
  received?: unknown;
}

/**
 * Schema definition for a field
 */
export interface FieldSchema {
  type: 'string' | 'number' | 'boolean' | 'array' | 'object' | 'enum';
  required?: boolean;
  description?: string;
  // String options
  minLength?: number;
  pattern?: RegExp;
  // Number options
  min?: number;
  max?: number;
  integer?: boolean;
  // Array options
  items?: FieldSchema;
  minItems?: number;
  // Enum options
  enum?: readonly string[];
  // Object options
  properties?: Record<string, FieldSchema>;
  // Custom validation
  validate?: (value: unknown) => string | null;
}

/**
 * Configuration schema
 */
export type ConfigSchema = Record<string, FieldSchema>;

// ============================================================================
// Validation Functions
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isOneOf<T extends string>(value: unknown, options: readonly T[]): value is T {
  return typeof value === 'string' && options.some((option) => option === value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Validate a value against a field schema
 */
export function validateField(value: unknown, schema: FieldSchema, path: string = ''): ValidationError[] {
  const errors: ValidationError[] = [];

  if (value === undefined || value === null) {
    if (schema.required) {
      errors.push({ path, message: 'Field is required', code: 'REQUIRED' });
    }
    return errors;
  }

  const mismatch = (expected: string): void => {
    errors.push({
      path,
      message: `Expected ${expected}, got ${describe(value)}`,
      code: 'TYPE_MISMATCH',
      expected,
      received: describe(value),
    });
  };

  switch (schema.type) {
    case 'string':
      if (typeof value !== 'string') {
        mismatch('string');
      } else {
        validateString(value, schema, path, errors);
      }
      break;

    case 'number':
      if (typeof value !== 'number' || Number.isNaN(value)) {
        mismatch('number');
      } else {
        validateNumber(value, schema, path, errors);
      }
      break;

    case 'boolean':
      if (typeof value !== 'boolean') {
        mismatch('boolean');
      }
      break;

    case 'array':
      if (!Array.isArray(value)) {
        mismatch('array');
      } else {
        validateArray(value, schema, path, errors);
      }
      break;

    case 'object':
      if (!isRecord(value)) {
        mismatch('object');
      } else {
        validateObject(value, schema, path, errors);
      }
      break;

    case 'enum':
      if (!isOneOf(value, schema.enum ?? [])) {
        errors.push({
          path,
          message: `Value must be one of: ${(schema.enum ?? []).join(', ')}`,
          code: 'INVALID_ENUM',
          expected: schema.enum,
          received: value,
        });
      }
      break;
  }

  if (errors.length === 0 && schema.validate) {
    const customError = schema.validate(value);
    if (customError) {
      errors.push({ path, message: customError, code: 'CUSTOM_VALIDATION' });
    }
  }

  return errors;
}

function validateString(value: string, schema: FieldSchema, path: string, errors: ValidationError[]): void {
  if (schema.minLength !== undefined && value.length < schema.minLength) {
    errors.push({
      path,
      message: `String must be at least ${schema.minLength} characters`,
      code: 'MIN_LENGTH',
      expected: schema.minLength,
      received: value.length,
    });
  }

  if (schema.pattern && !schema.pattern.test(value)) {
    errors.push({
      path,
      message: 'String does not match required pattern',
      code: 'PATTERN_MISMATCH',
      expected: schema.pattern.toString(),
      received: value,
    });
  }
}

function validateNumber(value: number, schema: FieldSchema, path: string, errors: ValidationError[]): void {
  if (schema.min !== undefined && value < schema.min) {
    errors.push({
      path,
      message: `Number must be at least ${schema.min}`,
      code: 'MIN_VALUE',
      expected: schema.min,
      received: value,
    });
  }

  if (schema.max !== undefined && value > schema.max) {
    errors.push({
      path,
      message: `Number must be at most ${schema.max}`,
      code: 'MAX_VALUE',
      expected: schema.max,
      received: value,
    });
  }

  if (schema.integer && !Number.isInteger(value)) {
    errors.push({ path, message: 'Number must be an integer', code: 'NOT_INTEGER', received: value });
  }
}

function validateArray(value: unknown[], schema: FieldSchema, path: string, errors: ValidationError[]): void {
  if (schema.minItems !== undefined && value.length < schema.minItems) {
    errors.push({
      path,
      message: `Array must have at least ${schema.minItems} items`,
      code: 'MIN_ITEMS',
      expected: schema.minItems,
      received: value.length,
    });
  }

  const itemSchema = schema.items;
  if (itemSchema) {
    value.forEach((item, i) => {
      errors.push(...validateField(item, itemSchema, `${path}[${i}]`));
    });
  }
}

function validateObject(
  value: Record<string, unknown>,
  schema: FieldSchema,
  path: string,
  errors: ValidationError[]
): void {
  if (schema.properties) {
    errors.push(...validateConfig(value, schema.properties, path));
  }
}

/**
 * Validate every field of an object against a schema
 */
export function validateConfig(config: unknown, schema: ConfigSchema, basePath: string = ''): ValidationError[] {
  if (!isRecord(config)) {
    return [{
      path: basePath,
      message: 'Configuration must be an object',
      code: 'TYPE_MISMATCH',
      expected: 'object',
      received: describe(config),
    }];
  }

  const errors: ValidationError[] = [];
  for (const [key, fieldSchema] of Object.entries(schema)) {
    const path = basePath ? `${basePath}.${key}` : key;
    errors.push(...validateField(config[key], fieldSchema, path));
  }
  return errors;
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => `${e.path ? `${e.path}: ` : ''}${e.message}`).join('\n');
}

// ============================================================================
// Track Settings
// ============================================================================

export type MaskSupportMode = 'probe' | 'always' | 'never';

export const TRACK_FORMATS: readonly (SubtitleFormat | 'auto')[] = ['auto', 'srt', 'styled-json'];

export const MASK_SUPPORT_MODES: readonly MaskSupportMode[] = ['probe', 'always', 'never'];

/**
 * Settings shared by every track loaded from a file
 */
export interface TrackSettings {
  /** Input format, detected from the content when 'auto' */
  format: SubtitleFormat | 'auto';
  /** Text encoding of subtitle files (any WHATWG encoding label) */
  encoding: string;
  /** Whether masks are probed from the renderer or forced on/off */
  maskSupport: MaskSupportMode;
  /** Minimum log level for the package's loggers */
  logLevel: LogLevel;
}

export const DEFAULT_TRACK_SETTINGS: Readonly<TrackSettings> = {
  format: 'auto',
  encoding: DEFAULT_ENCODING,
  maskSupport: 'probe',
  logLevel: 'info',
};

/**
 * Track settings schema
 */
export const TRACK_SETTINGS_SCHEMA: ConfigSchema = {
  format: {
    type: 'enum',
    enum: TRACK_FORMATS,
    description: 'Subtitle file format',
  },
  encoding: {
    type: 'string',
    validate: (value) => (typeof value === 'string' && isSupportedEncoding(value) ? null : `Unsupported text encoding: ${String(value)}`),
    description: 'Subtitle file text encoding',
  },
  maskSupport: {
    type: 'enum',
    enum: MASK_SUPPORT_MODES,
    description: 'Mask channel detection',
  },
  logLevel: {
    type: 'enum',
    enum: Object.keys(LOG_LEVELS),
    description: 'Minimum log level',
  },
};

/**
 * Environment variables read by loadTrackSettings
 */
export const SETTINGS_ENV_VARS: Record<keyof TrackSettings, string> = {
  format: 'SUBTITLE_TRACK_FORMAT',
  encoding: 'SUBTITLE_TRACK_ENCODING',
  maskSupport: 'SUBTITLE_TRACK_MASK_SUPPORT',
  logLevel: 'SUBTITLE_TRACK_LOG_LEVEL',
};

/**
 * Resolve track settings: overrides, then environment, then defaults.
 * Throws a validation error listing every invalid field.
 */
export function loadTrackSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<TrackSettings> = {}
): TrackSettings {
  const raw: Record<keyof TrackSettings, unknown> = {
    format: overrides.format ?? env[SETTINGS_ENV_VARS.format],
    encoding: overrides.encoding ?? env[SETTINGS_ENV_VARS.encoding],
    maskSupport: overrides.maskSupport ?? env[SETTINGS_ENV_VARS.maskSupport],
    logLevel: overrides.logLevel ?? env[SETTINGS_ENV_VARS.logLevel]?.toLowerCase(),
  };

  const errors = validateConfig(raw, TRACK_SETTINGS_SCHEMA);
  if (errors.length > 0) {
    logger.debug('Settings validation failed', { errors });
    throw createValidationError(`Invalid track settings:\n${formatValidationErrors(errors)}`, { errors });
  }

  return {
    format: isOneOf(raw.format, TRACK_FORMATS) ? raw.format : DEFAULT_TRACK_SETTINGS.format,
    encoding: typeof raw.encoding === 'string' ? raw.encoding : DEFAULT_TRACK_SETTINGS.encoding,
    maskSupport: isOneOf(raw.maskSupport, MASK_SUPPORT_MODES) ? raw.maskSupport : DEFAULT_TRACK_SETTINGS.maskSupport,
    logLevel: isLogLevel(raw.logLevel) ? raw.logLevel : DEFAULT_TRACK_SETTINGS.logLevel,
  };
}
