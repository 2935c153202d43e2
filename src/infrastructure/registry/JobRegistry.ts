import { randomBytes } from 'crypto';
import type {
  ArtifactLocation,
  FrameObservation,
  JobState,
  JobView,
  RenderJobSnapshot,
  RotationAxis,
  TerminalState,
  VideoFormat,
} from '../../core/entities/RenderJob.js';
import type { RenderProcess } from '../../core/interfaces/IProcessLauncher.js';
import type { OrchestratorErrorCode } from '../../core/errors/OrchestratorError.js';
import {
  DEFAULT_ETA_SETTINGS,
  EtaSettings,
  estimateEta,
  pushDuration,
  refineEtaAtQuery,
} from '../../core/eta/EtaEstimator.js';

export const RECENT_LINE_LIMIT = 10;

/**
 * 16 random bytes, hex encoded
 */
export function generateJobId(): string {
  return randomBytes(16).toString('hex');
}

export interface NewJobEntry {
  id: string;
  ownerId?: string;
  totalFrames: number;
  workspace: string;
  primaryOutputPath: string;
  finalOutputPath: string;
  format: VideoFormat;
  filename: string;
  downloadName: string;
  mimeType: string;
  axis: RotationAxis;
  offset: number;
  message: string;
  process: RenderProcess;
  createdAt?: Date;
}

export interface TerminalPatch {
  message: string;
  failureCode?: OrchestratorErrorCode;
}

function clampProgress(value: number): number {
  return Math.min(100, Math.max(0, value));
}

/**
 * One job's mutable state.
 *
 * Every method runs to completion synchronously, so on the event loop each
 * call is an atomic update and snapshot() never sees a half-applied one.
 * While the job runs, its ProgressMonitor is the only caller of the record*
 * methods; transition() is the single compare-and-set into a terminal state.
 */
export class RenderJobEntry {
  readonly id: string;
  readonly ownerId?: string;
  readonly totalFrames: number;
  readonly workspace: string;
  readonly primaryOutputPath: string;
  readonly finalOutputPath: string;
  readonly format: VideoFormat;
  readonly filename: string;
  readonly downloadName: string;
  readonly mimeType: string;
  readonly createdAt: Date;

  private state: JobState = 'running';
  private progress = 0;
  private message: string;
  private etaSeconds: number | null = null;
  private averageFrameSeconds: number | null = null;
  private lastFrame: FrameObservation | null = null;
  private frameDurations: number[] = [];
  private recentLines: string[] = [];
  private axis: RotationAxis;
  private offset: number;
  private process: RenderProcess | null;
  private workspaceReleased = false;
  private consumed = false;
  private artifact?: ArtifactLocation;
  private failureCode?: OrchestratorErrorCode;
  private completedAt?: Date;

  constructor(init: NewJobEntry, private readonly etaSettings: EtaSettings = DEFAULT_ETA_SETTINGS) {
    this.id = init.id;
    this.ownerId = init.ownerId;
    this.totalFrames = Math.max(1, init.totalFrames);
    this.workspace = init.workspace;
    this.primaryOutputPath = init.primaryOutputPath;
    this.finalOutputPath = init.finalOutputPath;
    this.format = init.format;
    this.filename = init.filename;
    this.downloadName = init.downloadName;
    this.mimeType = init.mimeType;
    this.axis = init.axis;
    this.offset = init.offset;
    this.message = init.message;
    this.process = init.process;
    this.createdAt = init.createdAt ?? new Date();
  }

  get currentState(): JobState {
    return this.state;
  }

  get isRunning(): boolean {
    return this.state === 'running';
  }

  get currentAxis(): RotationAxis {
    return this.axis;
  }

  get lastRecentLine(): string | undefined {
    return this.recentLines[this.recentLines.length - 1];
  }

  get recentOutput(): readonly string[] {
    return this.recentLines;
  }

  get currentProgress(): number {
    return this.progress;
  }

  get currentMessage(): string {
    return this.message;
  }

  get currentArtifact(): ArtifactLocation | undefined {
    return this.artifact;
  }

  get processHandle(): RenderProcess | null {
    return this.process;
  }

  /**
   * Free-text status line: becomes the message and enters the trailing buffer
   */
  recordStatus(line: string): boolean {
    if (!this.isRunning) return false;
    this.message = line;
    this.recentLines.push(line);
    if (this.recentLines.length > RECENT_LINE_LIMIT) {
      this.recentLines.shift();
    }
    return true;
  }

  recordOrientation(line: string, axis?: RotationAxis, offset?: number): boolean {
    if (!this.isRunning) return false;
    if (axis !== undefined) this.axis = axis;
    if (offset !== undefined) this.offset = offset;
    this.message = line;
    return true;
  }

  /**
   * Apply a frame-progress observation taken at `now` (epoch ms).
   * Lower indices than the last seen one are ignored.
   */
  recordFrame(frame: number, now: number): boolean {
    if (!this.isRunning) return false;

    const previous = this.lastFrame;
    if (previous !== null && frame < previous.frameIndex) {
      return false;
    }

    this.progress = Math.max(this.progress, clampProgress((frame / this.totalFrames) * 100));
    this.message = `Rendering frame ${frame} of ${this.totalFrames} (axis ${this.axis})`;

    if (previous === null || frame > previous.frameIndex) {
      if (previous !== null) {
        const deltaSeconds = (now - previous.timestamp) / 1000;
        if (deltaSeconds > 0) {
          this.frameDurations = pushDuration(this.frameDurations, deltaSeconds, this.etaSettings.window);
        }
      }
      this.lastFrame = { frameIndex: frame, timestamp: now };
    }

    const current = this.lastFrame ?? { frameIndex: frame, timestamp: now };
    const estimate = estimateEta(
      {
        durations: this.frameDurations,
        totalFrames: this.totalFrames,
        lastFrameIndex: current.frameIndex,
        elapsedOnCurrentFrame: (now - current.timestamp) / 1000,
      },
      this.etaSettings
    );
    this.etaSeconds = estimate?.etaSeconds ?? null;
    this.averageFrameSeconds = estimate?.averageFrameSeconds ?? null;
    return true;
  }

  setMessage(message: string): boolean {
    if (!this.isRunning) return false;
    this.message = message;
    return true;
  }

  /**
   * Compare-and-set from running into a terminal state at `now` (epoch ms).
   * Only the caller that gets `true` may perform terminal side effects.
   */
  transition(to: TerminalState, patch: TerminalPatch, now: number = Date.now()): boolean {
    if (!this.isRunning) return false;

    this.state = to;
    this.message = patch.message;
    this.failureCode = patch.failureCode;
    this.completedAt = new Date(now);

    if (to === 'finished') {
      this.progress = 100;
      this.etaSeconds = 0;
    } else {
      this.etaSeconds = null;
    }
    return true;
  }

  attachArtifact(location: ArtifactLocation): void {
    this.artifact = location;
  }

  /**
   * Detach the process handle; returns it to the first caller only
   */
  releaseProcess(): RenderProcess | null {
    const handle = this.process;
    this.process = null;
    return handle;
  }

  /**
   * True exactly once: the caller owns deleting the workspace
   */
  claimWorkspaceRelease(): boolean {
    if (this.workspaceReleased) return false;
    this.workspaceReleased = true;
    return true;
  }

  /**
   * True exactly once: the caller owns the single-use download
   */
  claimDownload(): boolean {
    if (this.consumed) return false;
    this.consumed = true;
    return true;
  }

  /**
   * Status view; a running job's ETA is refined against the frame in progress
   */
  view(now: number = Date.now()): JobView {
    let etaSeconds = this.etaSeconds;
    if (
      this.isRunning &&
      etaSeconds !== null &&
      this.averageFrameSeconds !== null &&
      this.lastFrame !== null
    ) {
      const currentFrameElapsed = (now - this.lastFrame.timestamp) / 1000;
      etaSeconds = refineEtaAtQuery(etaSeconds, this.averageFrameSeconds, currentFrameElapsed, this.etaSettings);
    }

    return {
      state: this.state,
      message: this.message,
      progress: this.progress,
      etaSeconds,
    };
  }

  snapshot(): RenderJobSnapshot {
    return {
      id: this.id,
      ownerId: this.ownerId,
      state: this.state,
      progress: this.progress,
      message: this.message,
      totalFrames: this.totalFrames,
      etaSeconds: this.etaSeconds,
      averageFrameSeconds: this.averageFrameSeconds,
      lastFrame: this.lastFrame ? { ...this.lastFrame } : null,
      frameDurations: [...this.frameDurations],
      axis: this.axis,
      offset: this.offset,
      workspace: this.workspace,
      workspaceReleased: this.workspaceReleased,
      recentLines: [...this.recentLines],
      filename: this.filename,
      downloadName: this.downloadName,
      mimeType: this.mimeType,
      createdAt: this.createdAt,
      completedAt: this.completedAt,
      artifact: this.artifact ? { ...this.artifact } : undefined,
      failureCode: this.failureCode,
      consumed: this.consumed,
      hasProcess: this.process !== null,
    };
  }
}

export interface RegistryStatistics {
  total: number;
  running: number;
  finished: number;
  error: number;
  cancelled: number;
}

/**
 * In-memory map of job id to entry. Entries are independent, so work on one
 * job never waits on another.
 */
export class JobRegistry {
  private jobs: Map<string, RenderJobEntry> = new Map();

  constructor(private readonly etaSettings: EtaSettings = DEFAULT_ETA_SETTINGS) {}

  register(init: NewJobEntry): RenderJobEntry {
    if (this.jobs.has(init.id)) {
      throw new Error(`Job ${init.id} is already registered`);
    }
    const entry = new RenderJobEntry(init, this.etaSettings);
    this.jobs.set(entry.id, entry);
    return entry;
  }

  get(jobId: string): RenderJobEntry | undefined {
    return this.jobs.get(jobId);
  }

  remove(jobId: string): boolean {
    return this.jobs.delete(jobId);
  }

  /**
   * Running jobs, optionally only those of one owner
   */
  countRunning(ownerId?: string): number {
    let count = 0;
    for (const job of this.jobs.values()) {
      if (job.isRunning && (ownerId === undefined || job.ownerId === ownerId)) {
        count++;
      }
    }
    return count;
  }

  running(): RenderJobEntry[] {
    return Array.from(this.jobs.values()).filter((job) => job.isRunning);
  }

  /**
   * Terminal jobs that completed before the cutoff
   */
  completedBefore(cutoff: Date): RenderJobEntry[] {
    return Array.from(this.jobs.values()).filter((job) => {
      const completedAt = job.snapshot().completedAt;
      return !job.isRunning && completedAt !== undefined && completedAt < cutoff;
    });
  }

  getStatistics(): RegistryStatistics {
    const stats: RegistryStatistics = { total: 0, running: 0, finished: 0, error: 0, cancelled: 0 };
    for (const job of this.jobs.values()) {
      stats.total++;
      stats[job.currentState]++;
    }
    return stats;
  }
}
