/**
 * Frame-timing ETA estimation: recency-weighted average frame time,
 * scaled by a safety factor.
 */

export interface EtaSettings {
  /** Durations kept for the weighted average */
  window: number;
  /** Durations required before any estimate is produced */
  warmup: number;
  /** Multiplier applied to the base estimate */
  safetyFactor: number;
  /** Current frame is considered slow past this multiple of the average */
  stallThreshold: number;
  /** Share of the overrun added at query time */
  stallDamping: number;
}

export const DEFAULT_ETA_SETTINGS: EtaSettings = {
  window: 20,
  warmup: 5,
  safetyFactor: 1.25,
  stallThreshold: 1.5,
  stallDamping: 0.5,
};

export interface EtaInput {
  /** Inter-frame durations in seconds, oldest first */
  durations: readonly number[];
  totalFrames: number;
  lastFrameIndex: number;
  /** Seconds spent so far on the frame after lastFrameIndex */
  elapsedOnCurrentFrame: number;
}

export interface EtaEstimate {
  etaSeconds: number;
  averageFrameSeconds: number;
}

/**
 * Linearly recency-weighted mean: the i-th sample (1-based, oldest first) has weight i
 */
export function weightedAverage(samples: readonly number[]): number | null {
  if (samples.length === 0) return null;

  let weightedSum = 0;
  let weightTotal = 0;
  samples.forEach((value, index) => {
    const weight = index + 1;
    weightedSum += value * weight;
    weightTotal += weight;
  });

  return weightedSum / weightTotal;
}

/**
 * Append a duration, keeping at most `window` entries
 */
export function pushDuration(durations: readonly number[], duration: number, window: number): number[] {
  const next = [...durations, duration];
  return next.length > window ? next.slice(next.length - window) : next;
}

export function estimateEta(input: EtaInput, settings: EtaSettings = DEFAULT_ETA_SETTINGS): EtaEstimate | null {
  if (input.durations.length < settings.warmup) {
    return null;
  }

  const sample = input.durations.slice(-settings.window);
  const avg = weightedAverage(sample);
  if (avg === null) return null;

  const framesRemaining = Math.max(0, input.totalFrames - input.lastFrameIndex);
  const baseEta = avg * framesRemaining + Math.max(0, input.elapsedOnCurrentFrame);

  return {
    etaSeconds: Math.max(0, baseEta * settings.safetyFactor),
    averageFrameSeconds: avg,
  };
}

/**
 * Inflate the monitor's last estimate when the frame in progress is running
 * well past the average.
 */
export function refineEtaAtQuery(
  lastEstimate: number,
  averageFrameSeconds: number,
  currentFrameElapsed: number,
  settings: EtaSettings = DEFAULT_ETA_SETTINGS
): number {
  if (currentFrameElapsed > averageFrameSeconds * settings.stallThreshold) {
    const adjustment = (currentFrameElapsed - averageFrameSeconds) * settings.stallDamping;
    return Math.max(0, lastEstimate + adjustment);
  }
  return lastEstimate;
}
