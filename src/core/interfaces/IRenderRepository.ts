import type { RenderRecord } from '../entities/RenderRecord.js';

/**
 * Interface for durable render records
 */
export interface IRenderRepository {
  createRecord(record: RenderRecord): void;

  findByJobId(jobId: string): RenderRecord | null;

  updateProgress(jobId: string, progress: number, message: string): void;

  markFinished(jobId: string, filePath: string, fileSize: number, message: string): void;

  markFailed(jobId: string, message: string): void;

  markCancelled(jobId: string, message: string): void;

  /**
   * Marks records left running by a previous process as errored
   */
  failInterrupted(message: string): number;
}
