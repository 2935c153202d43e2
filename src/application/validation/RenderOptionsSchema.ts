import { z } from 'zod';
import {
  RENDER_RESOLUTIONS,
  QualityPreset,
  RenderOptions,
  RenderResolution,
  RotationAxis,
  VideoFormat,
} from '../../core/entities/RenderJob.js';
import { OrchestratorError } from '../../core/errors/OrchestratorError.js';

export interface RenderDefaults {
  axis: RotationAxis;
  quality: QualityPreset;
  format: VideoFormat;
  size: RenderResolution;
}

const AXES: readonly RotationAxis[] = ['X', 'Y', 'Z'];
const QUALITIES: readonly QualityPreset[] = ['fast', 'standard', 'ultra'];
const FORMATS: readonly VideoFormat[] = ['mp4', 'webm'];

const TRUE_VALUES = new Set(['1', 'true', 'on', 'yes']);
const FALSE_VALUES = new Set(['0', 'false', 'off', 'no']);

const scalar = z.union([z.string(), z.number(), z.boolean()]).optional();

function isBlankText(value: string | number | boolean): boolean {
  return typeof value === 'string' && value.trim() === '';
}

function flag(fallback: boolean) {
  return scalar.transform((value, ctx): boolean => {
    if (value === undefined || isBlankText(value)) return fallback;
    if (typeof value === 'boolean') return value;

    const text = String(value).trim().toLowerCase();
    if (TRUE_VALUES.has(text)) return true;
    if (FALSE_VALUES.has(text)) return false;

    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean flag, got "${value}"` });
    return z.NEVER;
  });
}

function toNumber(value: string | number | boolean): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return NaN;
  return Number(value.trim());
}

/**
 * Numeric field clamped into [min, max]
 */
function clamped(fallback: number, min: number, max: number, integer = false) {
  return scalar.transform((value, ctx): number => {
    if (value === undefined || isBlankText(value)) return fallback;

    const parsed = toNumber(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a number, got "${value}"` });
      return z.NEVER;
    }
    if (integer && !Number.isInteger(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a whole number, got "${value}"` });
      return z.NEVER;
    }
    return Math.min(max, Math.max(min, parsed));
  });
}

/**
 * Enum field; unknown values fall back to the default
 */
function choice<T extends string>(allowed: readonly T[], fallback: T, normalise: (text: string) => string) {
  return scalar.transform((value): T => {
    if (typeof value !== 'string') return fallback;
    const text = normalise(value.trim());
    return allowed.find((candidate) => candidate === text) ?? fallback;
  });
}

function resolution(fallback: RenderResolution) {
  return scalar.transform((value, ctx): RenderResolution => {
    if (value === undefined || isBlankText(value)) return fallback;

    const parsed = toNumber(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a resolution, got "${value}"` });
      return z.NEVER;
    }
    return RENDER_RESOLUTIONS.find((size) => size === parsed) ?? fallback;
  });
}

/**
 * Raw request fields (query string or form values) to normalised render options
 */
export function createRenderOptionsSchema(defaults: RenderDefaults) {
  return z
    .object({
      axis: choice(AXES, defaults.axis, (text) => text.toUpperCase()),
      offset: clamped(0, 0, 360),
      auto: flag(true),
      quality: choice(QUALITIES, defaults.quality, (text) => text.toLowerCase()),
      format: choice(FORMATS, defaults.format, (text) => text.toLowerCase()),
      size: resolution(defaults.size),
      watermark: flag(false),
      kelvin: clamped(5600, 2000, 10000, true),
      auto_brightness: flag(true),
      exposure: clamped(0, -2, 2),
    })
    .transform((raw): RenderOptions => ({
      axis: raw.axis,
      offset: raw.offset,
      autoOrientation: raw.auto,
      quality: raw.quality,
      format: raw.format,
      resolution: raw.size,
      watermark: raw.watermark,
      kelvin: raw.kelvin,
      autoBrightness: raw.auto_brightness,
      // The renderer meters exposure itself in auto mode
      exposure: raw.auto_brightness ? 0 : raw.exposure,
    }));
}

export function parseRenderOptions(raw: Record<string, unknown>, defaults: RenderDefaults): RenderOptions {
  const result = createRenderOptionsSchema(defaults).safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    throw OrchestratorError.badInput(`Invalid render options: ${summary}`, { issues });
  }
  return result.data;
}
