import type { RotationAxis } from '../entities/RenderJob.js';

/**
 * Typed events recognised in the renderer's merged output.
 *
 *   [AUTO] axis=<X|Y|Z> offset=<float>   auto-orientation decision
 *   Fra:<int> ...                        frame progress
 *   anything else non-blank              free-text status
 */
export type RendererEvent =
  | { kind: 'auto-orientation'; line: string; axis?: RotationAxis; offset?: number }
  | { kind: 'frame-progress'; line: string; frame: number }
  | { kind: 'status-text'; line: string };

export const AUTO_ORIENTATION_MARKER = '[AUTO]';
export const FRAME_PROGRESS_MARKER = 'Fra:';

const AXES: ReadonlySet<string> = new Set(['X', 'Y', 'Z']);

function isAxis(value: string): value is RotationAxis {
  return AXES.has(value);
}

function parseAutoOrientation(line: string): RendererEvent | null {
  const fields = new Map<string, string>();
  for (const segment of line.replace(/[[\]]/g, ' ').split(/\s+/)) {
    const eq = segment.indexOf('=');
    if (eq > 0) {
      fields.set(segment.slice(0, eq), segment.slice(eq + 1));
    }
  }

  const rawAxis = fields.get('axis')?.toUpperCase();
  const axis = rawAxis !== undefined && isAxis(rawAxis) ? rawAxis : undefined;

  const rawOffset = fields.get('offset');
  const parsedOffset = rawOffset !== undefined && rawOffset !== '' ? Number(rawOffset) : NaN;
  const offset = Number.isFinite(parsedOffset) ? parsedOffset : undefined;

  if (axis === undefined && offset === undefined) {
    return null;
  }

  return { kind: 'auto-orientation', line, axis, offset };
}

function parseFrameIndex(line: string): number | null {
  const tokens = line.replace(/:/g, ' ').split(/\s+/).filter(Boolean);
  const digits = tokens.find((token) => /^\d+$/.test(token));
  return digits === undefined ? null : parseInt(digits, 10);
}

/**
 * Classify one line of renderer output. Returns null for lines that carry
 * nothing: blanks and auto-orientation lines that fail to parse.
 */
export function classifyLine(rawLine: string): RendererEvent | null {
  const line = rawLine.trim();
  if (!line) return null;

  if (line.startsWith(AUTO_ORIENTATION_MARKER)) {
    return parseAutoOrientation(line);
  }

  if (line.startsWith(FRAME_PROGRESS_MARKER)) {
    const frame = parseFrameIndex(line);
    if (frame !== null) {
      return { kind: 'frame-progress', line, frame };
    }
  }

  return { kind: 'status-text', line };
}
