/**
 * Render job domain types
 */

import type { OrchestratorErrorCode } from '../errors/OrchestratorError.js';

export type RotationAxis = 'X' | 'Y' | 'Z';
export type QualityPreset = 'fast' | 'standard' | 'ultra';
export type VideoFormat = 'mp4' | 'webm';

export type JobState = 'running' | 'finished' | 'error' | 'cancelled';
export type TerminalState = Exclude<JobState, 'running'>;

export const RENDER_RESOLUTIONS = [720, 1080, 1440, 2160] as const;
export type RenderResolution = (typeof RENDER_RESOLUTIONS)[number];

/**
 * Normalised options for one render, after defaults and clamping
 */
export interface RenderOptions {
  axis: RotationAxis;
  offset: number; // degrees, 0-360
  autoOrientation: boolean;
  quality: QualityPreset;
  format: VideoFormat;
  resolution: RenderResolution;
  watermark: boolean;
  kelvin: number;
  autoBrightness: boolean;
  exposure: number; // ignored by the renderer when autoBrightness is set
}

/**
 * Everything the launcher needs to start the renderer
 */
export interface RenderLaunchSpec {
  inputPath: string;
  outputPath: string;
  durationSeconds: number;
  baseFps: number;
  options: RenderOptions;
}

/**
 * Most recent frame-progress observation
 */
export interface FrameObservation {
  frameIndex: number;
  timestamp: number; // epoch ms
}

/**
 * Where the finished video can be read from
 */
export interface ArtifactLocation {
  path: string;
  durable: boolean; // true once copied into durable storage
  sizeBytes?: number;
}

/**
 * Read-only snapshot of a job, taken atomically from its registry entry
 */
export interface RenderJobSnapshot {
  id: string;
  ownerId?: string;
  state: JobState;
  progress: number;
  message: string;
  totalFrames: number;
  etaSeconds: number | null;
  averageFrameSeconds: number | null;
  lastFrame: FrameObservation | null;
  frameDurations: number[];
  axis: RotationAxis;
  offset: number;
  workspace: string;
  workspaceReleased: boolean;
  recentLines: string[];
  filename: string;
  downloadName: string;
  mimeType: string;
  createdAt: Date;
  completedAt?: Date;
  artifact?: ArtifactLocation;
  failureCode?: OrchestratorErrorCode;
  consumed: boolean;
  hasProcess: boolean;
}

/**
 * Status returned to collaborators
 */
export interface JobView {
  state: JobState;
  message: string;
  progress: number;
  etaSeconds: number | null;
}

/**
 * Model file handed over by the request layer
 */
export interface ModelUpload {
  filename: string;
  data: Buffer;
}
