import type { Readable } from 'stream';
import type { RenderProcess, IPostProcessor } from '../../core/interfaces/IProcessLauncher.js';
import type { IRenderRepository } from '../../core/interfaces/IRenderRepository.js';
import type { IWorkspaceStore } from '../../core/interfaces/IWorkspaceStore.js';
import type { RenderJobEntry } from '../../infrastructure/registry/JobRegistry.js';
import type { ResultMaterializer } from './ResultMaterializer.js';
import { classifyLine } from '../../core/protocol/RendererLine.js';
import { errorMessage, isOrchestratorError } from '../../core/errors/OrchestratorError.js';

export const NO_RENDERER_OUTPUT = 'No additional output from renderer.';
export const POST_PROCESSING_MESSAGE = 'Post-processing frames for smoother motion…';
const LOGGED_TAIL_LINES = 5;

export interface MonitorDependencies {
  store: IWorkspaceStore;
  repository: IRenderRepository;
  postProcessor: IPostProcessor;
  materializer: ResultMaterializer;
  baseFps: number;
  finalFps: number;
  cancelGraceMs: number;
  onUpdate?: (entry: RenderJobEntry) => void;
  now?: () => number;
}

/**
 * Follows one renderer process from launch to its terminal state.
 *
 * The monitor is the only writer of progress fields while the job runs. Every
 * terminal side effect is gated on winning entry.transition(), so a cancel
 * that lands first leaves the monitor with nothing to do.
 */
export class ProgressMonitor {
  private postProcessAbort: AbortController | null = null;
  private readonly now: () => number;

  constructor(
    private readonly entry: RenderJobEntry,
    private readonly deps: MonitorDependencies
  ) {
    this.now = deps.now ?? Date.now;
  }

  async run(): Promise<void> {
    const renderProcess = this.entry.processHandle;
    if (!renderProcess) return;

    const streamError = await this.consume(renderProcess.output);
    if (streamError) {
      await this.failOnStream(renderProcess, streamError);
      return;
    }

    const exitCode = await renderProcess.waitForExit();
    await this.settle(exitCode);
  }

  /**
   * Abort a frame-rate conversion in flight, if any
   */
  abortPostProcessing(): void {
    this.postProcessAbort?.abort();
  }

  private consume(output: Readable): Promise<Error | null> {
    return new Promise((resolve) => {
      let pending = '';
      let settled = false;

      const finish = (error: Error | null) => {
        if (settled) return;
        settled = true;
        resolve(error);
      };

      output.on('data', (chunk: string | Buffer) => {
        pending += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
        const lines = pending.split(/\r\n|\r|\n/);
        pending = lines.pop() ?? '';
        for (const line of lines) {
          this.handleLine(line);
        }
      });

      output.once('end', () => {
        if (pending) this.handleLine(pending);
        pending = '';
        finish(null);
      });
      output.on('error', (error: Error) => finish(error));
      output.once('close', () => finish(null));
    });
  }

  private handleLine(raw: string): void {
    const event = classifyLine(raw);
    if (!event) return;

    let applied = false;
    switch (event.kind) {
      case 'auto-orientation':
        applied = this.entry.recordOrientation(event.line, event.axis, event.offset);
        break;
      case 'frame-progress':
        applied = this.entry.recordFrame(event.frame, this.now());
        break;
      case 'status-text':
        applied = this.entry.recordStatus(event.line);
        break;
    }

    if (applied) {
      this.mirrorProgress();
      this.deps.onUpdate?.(this.entry);
    }
  }

  private mirrorProgress(): void {
    if (this.entry.ownerId === undefined) return;
    try {
      this.deps.repository.updateProgress(this.entry.id, this.entry.currentProgress, this.entry.currentMessage);
    } catch (error) {
      console.error(`[ProgressMonitor] ✗ Failed to persist progress for ${this.entry.id}: ${errorMessage(error)}`);
    }
  }

  private async failOnStream(renderProcess: RenderProcess, error: Error): Promise<void> {
    const message = `Renderer output error: ${error.message}`;
    if (!this.entry.transition('error', { message, failureCode: 'STREAM_READ_FAILURE' }, this.now())) {
      return;
    }

    console.error(`[ProgressMonitor] Job ${this.entry.id}: ${message}`);
    this.entry.releaseProcess();
    renderProcess.terminate();
    const exitCode = await this.waitWithGrace(renderProcess);
    console.error(`[ProgressMonitor] Job ${this.entry.id}: renderer exited with code ${exitCode}`);

    this.recordFailure(message);
    await this.releaseWorkspace();
    this.deps.onUpdate?.(this.entry);
  }

  private async waitWithGrace(renderProcess: RenderProcess): Promise<number> {
    let timer: NodeJS.Timeout | undefined;
    const graceElapsed = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, this.deps.cancelGraceMs);
    });

    await Promise.race([renderProcess.waitForExit(), graceElapsed]);
    clearTimeout(timer);

    if (renderProcess.isAlive()) {
      renderProcess.kill();
    }
    return renderProcess.waitForExit();
  }

  private async settle(exitCode: number): Promise<void> {
    if (!this.entry.isRunning) return;

    const produced = exitCode === 0 && (await this.deps.store.exists(this.entry.primaryOutputPath));
    if (!this.entry.isRunning) return;

    if (!produced) {
      this.failRender(exitCode);
      await this.releaseWorkspace();
      this.deps.onUpdate?.(this.entry);
      return;
    }

    try {
      await this.finalizeArtifact();
    } catch (error) {
      if (!this.entry.isRunning) return;
      this.failPostProcessing(error);
      await this.releaseWorkspace();
      this.deps.onUpdate?.(this.entry);
      return;
    } finally {
      this.postProcessAbort = null;
    }

    if (!this.entry.isRunning) return;

    const { materializer } = this.deps;
    const artifact = await materializer.prepare(this.entry);
    if (!this.entry.isRunning) {
      await materializer.discard(artifact);
      return;
    }

    // Record, artifact and state change together; no await until the job is finished
    const message = `Render complete (axis ${this.entry.currentAxis}).`;
    materializer.recordFinished(this.entry, artifact, message);
    this.entry.attachArtifact(artifact);
    this.entry.transition('finished', { message }, this.now());
    this.entry.releaseProcess();
    console.log(`[ProgressMonitor] Job ${this.entry.id} finished`);
    this.deps.onUpdate?.(this.entry);

    if (artifact.durable) {
      await this.releaseWorkspace();
    }
  }

  private async finalizeArtifact(): Promise<void> {
    const { baseFps, finalFps } = this.deps;

    if (baseFps === finalFps) {
      await this.deps.store.move(this.entry.primaryOutputPath, this.entry.finalOutputPath);
      return;
    }

    if (this.entry.setMessage(POST_PROCESSING_MESSAGE)) {
      this.mirrorProgress();
      this.deps.onUpdate?.(this.entry);
    }

    this.postProcessAbort = new AbortController();
    await this.deps.postProcessor.convert({
      inputPath: this.entry.primaryOutputPath,
      outputPath: this.entry.finalOutputPath,
      fps: finalFps,
      format: this.entry.format,
      signal: this.postProcessAbort.signal,
    });
  }

  private failRender(exitCode: number): void {
    const lastLine = this.entry.lastRecentLine ?? NO_RENDERER_OUTPUT;
    const message = `Renderer failed (code ${exitCode}). Last line: ${lastLine}`;
    if (!this.entry.transition('error', { message, failureCode: 'RENDER_FAILURE' }, this.now())) return;

    this.entry.releaseProcess();
    console.error(`[ProgressMonitor] Job ${this.entry.id}: ${message}`);
    const tail = this.entry.recentOutput.slice(-LOGGED_TAIL_LINES);
    if (tail.length > 0) {
      console.error(`[ProgressMonitor] Last renderer output:\n  ${tail.join('\n  ')}`);
    }
    this.recordFailure(message);
  }

  private failPostProcessing(error: unknown): void {
    const message = `Post-processing failed: ${errorMessage(error)}`;
    if (!this.entry.transition('error', { message, failureCode: 'POST_PROCESS_FAILURE' }, this.now())) return;

    this.entry.releaseProcess();
    console.error(`[ProgressMonitor] Job ${this.entry.id}: ${message} (the render itself succeeded)`);
    const output = isOrchestratorError(error) ? error.details?.output : undefined;
    if (typeof output === 'string' && output.trim()) {
      console.error(`[ProgressMonitor] Encoder output:\n${output.trim()}`);
    }
    this.recordFailure(message);
  }

  private recordFailure(message: string): void {
    if (this.entry.ownerId === undefined) return;
    try {
      this.deps.repository.markFailed(this.entry.id, message);
    } catch (error) {
      console.error(`[ProgressMonitor] ✗ Failed to persist failure for ${this.entry.id}: ${errorMessage(error)}`);
    }
  }

  private async releaseWorkspace(): Promise<void> {
    if (!this.entry.claimWorkspaceRelease()) return;
    try {
      await this.deps.store.remove(this.entry.workspace);
    } catch (error) {
      console.error(`[ProgressMonitor] Could not delete workspace ${this.entry.workspace}: ${errorMessage(error)}`);
    }
  }
}
