import type { JobState, QualityPreset, RotationAxis, VideoFormat } from './RenderJob.js';

/**
 * Durable record of an owned render
 */
export interface RenderRecord {
  jobId: string;
  ownerId: string;
  filename: string;
  downloadName: string;
  filePath: string;
  fileSize?: number;
  mimeType: string;
  quality: QualityPreset;
  videoFormat: VideoFormat;
  renderSize: number;
  axis: RotationAxis;
  offset: number;
  autoOrientation: boolean;
  state: JobState;
  progress: number;
  message?: string;
  createdAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
}
