import Database from 'better-sqlite3';
import { IRenderRepository } from '../../../core/interfaces/IRenderRepository.js';
import { RenderRecord } from '../../../core/entities/RenderRecord.js';
import type { JobState, QualityPreset, RotationAxis, VideoFormat } from '../../../core/entities/RenderJob.js';

interface RenderRow {
  job_id: string;
  owner_id: string;
  filename: string;
  download_name: string;
  file_path: string;
  file_size: number | null;
  mimetype: string;
  quality: string;
  video_format: string;
  render_size: number;
  axis: string;
  rotation_offset: number;
  auto_orientation: number;
  state: string;
  progress: number;
  message: string | null;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
}

const JOB_STATES: readonly JobState[] = ['running', 'finished', 'error', 'cancelled'];
const QUALITIES: readonly QualityPreset[] = ['fast', 'standard', 'ultra'];
const AXES: readonly RotationAxis[] = ['X', 'Y', 'Z'];
const FORMATS: readonly VideoFormat[] = ['mp4', 'webm'];

function oneOf<T extends string>(value: string, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

function toRecord(row: RenderRow): RenderRecord {
  return {
    jobId: row.job_id,
    ownerId: row.owner_id,
    filename: row.filename,
    downloadName: row.download_name,
    filePath: row.file_path,
    fileSize: row.file_size ?? undefined,
    mimeType: row.mimetype,
    quality: oneOf(row.quality, QUALITIES, 'standard'),
    videoFormat: oneOf(row.video_format, FORMATS, 'mp4'),
    renderSize: row.render_size,
    axis: oneOf(row.axis, AXES, 'Z'),
    offset: row.rotation_offset,
    autoOrientation: row.auto_orientation === 1,
    state: oneOf(row.state, JOB_STATES, 'error'),
    progress: row.progress,
    message: row.message ?? undefined,
    createdAt: new Date(row.created_at),
    startedAt: row.started_at ? new Date(row.started_at) : undefined,
    finishedAt: row.finished_at ? new Date(row.finished_at) : undefined,
  };
}

/**
 * SQLite implementation of the durable render record store
 */
export class RenderRepository implements IRenderRepository {
  constructor(private db: Database.Database) {}

  createRecord(record: RenderRecord): void {
    const stmt = this.db.prepare(`
      INSERT INTO renders (
        job_id, owner_id, filename, download_name, file_path, file_size, mimetype,
        quality, video_format, render_size, axis, rotation_offset, auto_orientation,
        state, progress, message, created_at, started_at, finished_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      record.jobId,
      record.ownerId,
      record.filename,
      record.downloadName,
      record.filePath,
      record.fileSize ?? null,
      record.mimeType,
      record.quality,
      record.videoFormat,
      record.renderSize,
      record.axis,
      record.offset,
      record.autoOrientation ? 1 : 0,
      record.state,
      record.progress,
      record.message ?? null,
      record.createdAt.toISOString(),
      record.startedAt ? record.startedAt.toISOString() : null,
      record.finishedAt ? record.finishedAt.toISOString() : null
    );
  }

  findByJobId(jobId: string): RenderRecord | null {
    const row = this.db
      .prepare<[string], RenderRow>('SELECT * FROM renders WHERE job_id = ?')
      .get(jobId);

    return row ? toRecord(row) : null;
  }

  updateProgress(jobId: string, progress: number, message: string): void {
    this.db
      .prepare(`UPDATE renders SET progress = ?, message = ? WHERE job_id = ? AND state = 'running'`)
      .run(progress, message, jobId);
  }

  markFinished(jobId: string, filePath: string, fileSize: number, message: string): void {
    this.db
      .prepare(`
        UPDATE renders
        SET state = 'finished', progress = 100, file_path = ?, file_size = ?, message = ?, finished_at = ?
        WHERE job_id = ?
      `)
      .run(filePath, fileSize, message, new Date().toISOString(), jobId);
  }

  markFailed(jobId: string, message: string): void {
    this.finish(jobId, 'error', message);
  }

  markCancelled(jobId: string, message: string): void {
    this.finish(jobId, 'cancelled', message);
  }

  failInterrupted(message: string): number {
    const result = this.db
      .prepare(`UPDATE renders SET state = 'error', message = ?, finished_at = ? WHERE state = 'running'`)
      .run(message, new Date().toISOString());
    return result.changes;
  }

  private finish(jobId: string, state: Exclude<JobState, 'running' | 'finished'>, message: string): void {
    this.db
      .prepare(`UPDATE renders SET state = ?, message = ?, finished_at = ? WHERE job_id = ?`)
      .run(state, message, new Date().toISOString(), jobId);
  }
}
