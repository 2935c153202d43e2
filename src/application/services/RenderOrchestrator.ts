import path from 'path';
import type { Readable } from 'stream';
import type { Config } from '../../config.js';
import type { JobView, ModelUpload, RenderOptions } from '../../core/entities/RenderJob.js';
import type { IPostProcessor, IProcessLauncher, RenderProcess } from '../../core/interfaces/IProcessLauncher.js';
import type { IRenderRepository } from '../../core/interfaces/IRenderRepository.js';
import type { IWorkspaceStore } from '../../core/interfaces/IWorkspaceStore.js';
import { OrchestratorError, errorMessage } from '../../core/errors/OrchestratorError.js';
import { JobRegistry, RegistryStatistics, RenderJobEntry, generateJobId } from '../../infrastructure/registry/JobRegistry.js';
import { parseRenderOptions } from '../validation/RenderOptionsSchema.js';
import { ProgressMonitor } from './ProgressMonitor.js';
import { ResultMaterializer } from './ResultMaterializer.js';

export const CANCELLED_MESSAGE = 'Render cancelled by user.';

const MIME_TYPES = {
  mp4: 'video/mp4',
  webm: 'video/webm',
} as const;

export interface OrchestratorSettings {
  render: Config['render'];
  limits: Pick<Config['limits'], 'maxModelBytes' | 'allowedExtensions' | 'maxConcurrentPerOwner' | 'cancelGraceMs'>;
  storageRoot: string;
  retentionMinutes: number;
  debug?: boolean;
}

export interface OrchestratorDependencies {
  registry: JobRegistry;
  launcher: IProcessLauncher;
  postProcessor: IPostProcessor;
  store: IWorkspaceStore;
  repository: IRenderRepository;
  now?: () => number;
}

export interface ArtifactDownload {
  stream: Readable;
  mimeType: string;
  downloadName: string;
  size: number;
}

export interface JobUpdate extends JobView {
  jobId: string;
  ownerId?: string;
}

interface ActiveMonitor {
  monitor: ProgressMonitor;
  done: Promise<void>;
}

export function totalFramesFor(seconds: number, baseFps: number): number {
  return Math.max(1, Math.round(seconds * baseFps));
}

export function downloadNameFor(filename: string, format: RenderOptions['format']): string {
  const stem = path.parse(path.basename(filename)).name || 'model';
  return `${stem}_turntable.${format}`;
}

export function launchMessageFor(options: RenderOptions): string {
  const quality = options.quality.charAt(0).toUpperCase() + options.quality.slice(1);
  if (options.autoOrientation) {
    return `Launching renderer (${quality}, auto orientation)…`;
  }
  return `Launching renderer (${quality}, axis ${options.axis}, start ${options.offset.toFixed(1)}°)…`;
}

function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(candidate));
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Service owning the render job lifecycle: submission, status, cancellation,
 * artifact hand-out and retention.
 */
export class RenderOrchestrator {
  private readonly registry: JobRegistry;
  private readonly materializer: ResultMaterializer;
  private readonly monitors: Map<string, ActiveMonitor> = new Map();
  private readonly reservations: Map<string, number> = new Map();
  /** Downloaded single-use job ids and when they were consumed (epoch ms) */
  private readonly consumed: Map<string, number> = new Map();
  private readonly listeners: Array<(update: JobUpdate) => void> = [];
  private readonly now: () => number;

  constructor(
    private readonly settings: OrchestratorSettings,
    private readonly deps: OrchestratorDependencies
  ) {
    this.registry = deps.registry;
    this.now = deps.now ?? Date.now;
    this.materializer = new ResultMaterializer(deps.store, deps.repository, settings.storageRoot);
  }

  /**
   * Validate the upload, start the renderer and return the new job id
   */
  async submit(upload: ModelUpload, rawOptions: Record<string, unknown>, ownerId?: string): Promise<string> {
    const extension = this.validateUpload(upload);
    const options = parseRenderOptions(rawOptions, {
      axis: this.settings.render.axis,
      quality: this.settings.render.quality,
      format: this.settings.render.format,
      size: this.settings.render.size,
    });

    this.reserveSlot(ownerId);
    try {
      this.deps.launcher.resolveExecutable();
      return await this.start(upload, extension, options, ownerId);
    } finally {
      this.releaseSlot(ownerId);
    }
  }

  /**
   * Live state first, then the durable record
   */
  query(jobId: string): JobView {
    const entry = this.registry.get(jobId);
    if (entry) {
      return entry.view(this.now());
    }

    const record = this.deps.repository.findByJobId(jobId);
    if (record) {
      return {
        state: record.state,
        message: record.message ?? '',
        progress: record.progress,
        etaSeconds: null,
      };
    }

    throw OrchestratorError.notFound(jobId);
  }

  async cancel(jobId: string): Promise<JobView> {
    const entry = this.registry.get(jobId);
    if (!entry) {
      if (this.deps.repository.findByJobId(jobId)) {
        throw OrchestratorError.invalidState(jobId);
      }
      throw OrchestratorError.notFound(jobId);
    }

    if (!entry.transition('cancelled', { message: CANCELLED_MESSAGE }, this.now())) {
      throw OrchestratorError.invalidState(jobId);
    }
    console.log(`[RenderOrchestrator] Cancelling job ${jobId}`);

    this.monitors.get(jobId)?.monitor.abortPostProcessing();
    const renderProcess = entry.releaseProcess();
    if (renderProcess) {
      await this.stopProcess(renderProcess);
    }

    if (entry.ownerId !== undefined) {
      try {
        this.deps.repository.markCancelled(jobId, CANCELLED_MESSAGE);
      } catch (error) {
        console.error(`[RenderOrchestrator] ✗ Failed to persist cancellation for ${jobId}: ${errorMessage(error)}`);
      }
    }

    await this.releaseWorkspace(entry);
    this.notify(entry);
    return entry.view(this.now());
  }

  /**
   * Open the finished video. Anonymous renders can be downloaded once; the
   * workspace goes away when that stream closes.
   */
  async fetchArtifact(jobId: string): Promise<ArtifactDownload> {
    const entry = this.registry.get(jobId);
    if (!entry) {
      if (this.consumed.has(jobId)) {
        throw OrchestratorError.alreadyConsumed(jobId);
      }
      return this.fetchFromRecord(jobId);
    }

    const artifact = entry.currentArtifact;
    if (entry.currentState !== 'finished' || !artifact) {
      throw OrchestratorError.notReady(jobId);
    }

    if (artifact.durable) {
      return this.openDurable(jobId, artifact.path, entry.mimeType, entry.downloadName);
    }

    if (entry.snapshot().consumed) {
      throw OrchestratorError.alreadyConsumed(jobId);
    }
    const size = artifact.sizeBytes ?? (await this.deps.store.size(artifact.path));
    if (!entry.claimDownload()) {
      throw OrchestratorError.alreadyConsumed(jobId);
    }

    const stream = this.deps.store.openRead(artifact.path);
    stream.once('close', () => {
      this.discardDownloaded(entry).catch((error) => {
        console.error(`[RenderOrchestrator] Cleanup after download failed for ${jobId}: ${errorMessage(error)}`);
      });
    });

    return { stream, mimeType: entry.mimeType, downloadName: entry.downloadName, size };
  }

  /**
   * Drop a terminal job from the live registry
   */
  async remove(jobId: string): Promise<void> {
    const entry = this.registry.get(jobId);
    if (!entry) {
      throw OrchestratorError.notFound(jobId);
    }
    if (entry.isRunning) {
      throw OrchestratorError.invalidState(jobId, 'Job is still running.');
    }
    await this.releaseWorkspace(entry);
    this.registry.remove(jobId);
  }

  /**
   * Remove terminal jobs older than the retention window, deleting any
   * workspace still held (unfetched anonymous renders, failed durable copies).
   * Consumed download ids expire on the same window.
   */
  async sweep(maxAgeMs: number = this.settings.retentionMinutes * 60 * 1000): Promise<number> {
    const cutoff = new Date(this.now() - maxAgeMs);
    const expired = this.registry.completedBefore(cutoff);

    for (const [jobId, consumedAt] of this.consumed) {
      if (consumedAt < cutoff.getTime()) {
        this.consumed.delete(jobId);
      }
    }

    for (const entry of expired) {
      await this.releaseWorkspace(entry);
      this.registry.remove(entry.id);
    }

    if (expired.length > 0) {
      console.log(`[RenderOrchestrator] 🗑️ Cleared ${expired.length} old jobs`);
    }
    return expired.length;
  }

  waitForMonitor(jobId: string): Promise<void> {
    return this.monitors.get(jobId)?.done ?? Promise.resolve();
  }

  getStatistics(): RegistryStatistics {
    return this.registry.getStatistics();
  }

  countRunning(ownerId?: string): number {
    return this.registry.countRunning(ownerId);
  }

  /**
   * Attach a callback for every observable job change
   */
  onJobUpdated(callback: (update: JobUpdate) => void): void {
    this.listeners.push(callback);
  }

  /**
   * Cancel everything still running and wait for the monitors to settle
   */
  async shutdown(): Promise<void> {
    const running = this.registry.running();
    if (running.length > 0) {
      console.log(`[RenderOrchestrator] Cancelling ${running.length} running job(s)...`);
    }

    for (const entry of running) {
      try {
        await this.cancel(entry.id);
      } catch (error) {
        console.error(`[RenderOrchestrator] Could not cancel ${entry.id}: ${errorMessage(error)}`);
      }
    }

    await Promise.all(Array.from(this.monitors.values(), (active) => active.done));
  }

  private validateUpload(upload: ModelUpload): string {
    const { allowedExtensions, maxModelBytes } = this.settings.limits;

    if (!upload.filename) {
      throw OrchestratorError.badInput('No model file provided.');
    }

    const extension = path.extname(upload.filename).toLowerCase();
    if (!allowedExtensions.includes(extension)) {
      throw OrchestratorError.badInput(`Only ${allowedExtensions.join(', ')} files are supported.`, {
        filename: upload.filename,
      });
    }

    if (upload.data.length === 0) {
      throw OrchestratorError.badInput('Uploaded file is empty.');
    }

    if (upload.data.length > maxModelBytes) {
      const limitMb = Math.round(maxModelBytes / (1024 * 1024));
      throw OrchestratorError.badInput(`Model file exceeds the ${limitMb} MB limit.`, {
        size: upload.data.length,
      });
    }

    return extension;
  }

  /**
   * Count the slot synchronously so concurrent submissions cannot both pass
   */
  private reserveSlot(ownerId?: string): void {
    if (ownerId === undefined) return;

    const limit = this.settings.limits.maxConcurrentPerOwner;
    const reserved = this.reservations.get(ownerId) ?? 0;
    if (this.registry.countRunning(ownerId) + reserved >= limit) {
      throw OrchestratorError.capacityExceeded(limit);
    }
    this.reservations.set(ownerId, reserved + 1);
  }

  private releaseSlot(ownerId?: string): void {
    if (ownerId === undefined) return;

    const reserved = (this.reservations.get(ownerId) ?? 1) - 1;
    if (reserved <= 0) {
      this.reservations.delete(ownerId);
    } else {
      this.reservations.set(ownerId, reserved);
    }
  }

  private async start(
    upload: ModelUpload,
    extension: string,
    options: RenderOptions,
    ownerId?: string
  ): Promise<string> {
    const { render } = this.settings;
    const workspace = await this.deps.store.createWorkspace();
    const inputPath = path.join(workspace, `model${extension}`);
    const primaryOutputPath = path.join(workspace, `turntable_base.${options.format}`);
    const finalOutputPath = path.join(workspace, `turntable.${options.format}`);

    let renderProcess: RenderProcess;
    try {
      await this.deps.store.writeFile(inputPath, upload.data);
      renderProcess = this.deps.launcher.launch({
        inputPath,
        outputPath: primaryOutputPath,
        durationSeconds: render.seconds,
        baseFps: render.baseFps,
        options,
      });
    } catch (error) {
      try {
        await this.deps.store.remove(workspace);
      } catch (cleanupError) {
        console.error(`[RenderOrchestrator] Could not delete workspace ${workspace}: ${errorMessage(cleanupError)}`);
      }
      throw error;
    }

    const message = launchMessageFor(options);
    const entry = this.registry.register({
      id: generateJobId(),
      ownerId,
      totalFrames: totalFramesFor(render.seconds, render.baseFps),
      workspace,
      primaryOutputPath,
      finalOutputPath,
      format: options.format,
      filename: upload.filename,
      downloadName: downloadNameFor(upload.filename, options.format),
      mimeType: MIME_TYPES[options.format],
      axis: options.axis,
      offset: options.offset,
      message,
      process: renderProcess,
      createdAt: new Date(this.now()),
    });

    if (ownerId !== undefined) {
      this.createRecord(entry, ownerId, options);
    }

    console.log(
      `[RenderOrchestrator] Job ${entry.id} started (pid ${renderProcess.pid ?? 'unknown'}, ${entry.totalFrames} frames)`
    );
    if (this.settings.debug) {
      console.log(`[RenderOrchestrator] Options for ${entry.id}: ${JSON.stringify(options)}`);
    }

    this.startMonitor(entry);
    this.notify(entry);
    return entry.id;
  }

  private createRecord(entry: RenderJobEntry, ownerId: string, options: RenderOptions): void {
    const createdAt = new Date(this.now());
    try {
      this.deps.repository.createRecord({
        jobId: entry.id,
        ownerId,
        filename: entry.filename,
        downloadName: entry.downloadName,
        filePath: '',
        mimeType: entry.mimeType,
        quality: options.quality,
        videoFormat: options.format,
        renderSize: options.resolution,
        axis: options.axis,
        offset: options.offset,
        autoOrientation: options.autoOrientation,
        state: 'running',
        progress: 0,
        message: entry.currentMessage,
        createdAt,
        startedAt: createdAt,
      });
      console.log(`[RenderOrchestrator] ✓ Record created for ${entry.id}`);
    } catch (error) {
      console.error(`[RenderOrchestrator] ✗ Failed to create record for ${entry.id}: ${errorMessage(error)}`);
    }
  }

  private startMonitor(entry: RenderJobEntry): void {
    const monitor = new ProgressMonitor(entry, {
      store: this.deps.store,
      repository: this.deps.repository,
      postProcessor: this.deps.postProcessor,
      materializer: this.materializer,
      baseFps: this.settings.render.baseFps,
      finalFps: this.settings.render.finalFps,
      cancelGraceMs: this.settings.limits.cancelGraceMs,
      onUpdate: (updated) => this.notify(updated),
      now: this.now,
    });

    const done = monitor
      .run()
      .catch((error) => {
        console.error(`[RenderOrchestrator] Monitor for ${entry.id} crashed: ${errorMessage(error)}`);
        return this.abandon(entry, error);
      })
      .finally(() => {
        this.monitors.delete(entry.id);
      });

    this.monitors.set(entry.id, { monitor, done });
  }

  /**
   * Last resort when a monitor throws: fail the job and reclaim its resources
   */
  private async abandon(entry: RenderJobEntry, error: unknown): Promise<void> {
    const message = `Render failed: ${errorMessage(error)}`;
    if (!entry.transition('error', { message, failureCode: 'RENDER_FAILURE' }, this.now())) {
      return;
    }
    const renderProcess = entry.releaseProcess();
    if (renderProcess) {
      await this.stopProcess(renderProcess);
    }
    await this.releaseWorkspace(entry);
    this.notify(entry);
  }

  /**
   * SIGTERM, then SIGKILL if the renderer is still alive after the grace period
   */
  private async stopProcess(renderProcess: RenderProcess): Promise<void> {
    renderProcess.terminate();

    let timer: NodeJS.Timeout | undefined;
    const graceElapsed = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, this.settings.limits.cancelGraceMs);
    });
    await Promise.race([renderProcess.waitForExit(), graceElapsed]);
    clearTimeout(timer);

    if (renderProcess.isAlive()) {
      console.warn(`[RenderOrchestrator] Renderer ${renderProcess.pid ?? ''} ignored SIGTERM, killing`);
      renderProcess.kill();
    }
  }

  private async releaseWorkspace(entry: RenderJobEntry): Promise<void> {
    if (!entry.claimWorkspaceRelease()) return;
    try {
      await this.deps.store.remove(entry.workspace);
    } catch (error) {
      console.error(`[RenderOrchestrator] Could not delete workspace ${entry.workspace}: ${errorMessage(error)}`);
    }
  }

  private async discardDownloaded(entry: RenderJobEntry): Promise<void> {
    this.consumed.set(entry.id, this.now());
    this.registry.remove(entry.id);
    await this.releaseWorkspace(entry);
  }

  private async fetchFromRecord(jobId: string): Promise<ArtifactDownload> {
    const record = this.deps.repository.findByJobId(jobId);
    if (!record) {
      throw OrchestratorError.notFound(jobId);
    }
    if (record.state !== 'finished') {
      throw OrchestratorError.notReady(jobId);
    }
    return this.openDurable(jobId, record.filePath, record.mimeType, record.downloadName);
  }

  private async openDurable(
    jobId: string,
    filePath: string,
    mimeType: string,
    downloadName: string
  ): Promise<ArtifactDownload> {
    if (!filePath || !isWithin(this.settings.storageRoot, filePath)) {
      throw OrchestratorError.notFound(jobId);
    }
    if (!(await this.deps.store.exists(filePath))) {
      throw OrchestratorError.notFound(jobId);
    }

    const size = await this.deps.store.size(filePath);
    return { stream: this.deps.store.openRead(filePath), mimeType, downloadName, size };
  }

  private notify(entry: RenderJobEntry): void {
    const update: JobUpdate = { jobId: entry.id, ownerId: entry.ownerId, ...entry.view(this.now()) };
    for (const listener of this.listeners) {
      try {
        listener(update);
      } catch (error) {
        console.error(`[RenderOrchestrator] Job update listener failed: ${errorMessage(error)}`);
      }
    }
  }
}
