import path from 'path';
import type { ArtifactLocation } from '../../core/entities/RenderJob.js';
import type { IRenderRepository } from '../../core/interfaces/IRenderRepository.js';
import type { IWorkspaceStore } from '../../core/interfaces/IWorkspaceStore.js';
import type { RenderJobEntry } from '../../infrastructure/registry/JobRegistry.js';
import { errorMessage } from '../../core/errors/OrchestratorError.js';

export const DURABLE_RENDER_DIR = 'renders';

/**
 * Hands a finished render over to its final location.
 *
 * Owned jobs are copied to `<storage>/renders/<jobId><ext>` before the job is
 * reported finished. Anonymous jobs keep the artifact in the workspace until it
 * has been downloaded once.
 */
export class ResultMaterializer {
  constructor(
    private readonly store: IWorkspaceStore,
    private readonly repository: IRenderRepository,
    private readonly storageRoot: string
  ) {}

  durablePathFor(jobId: string, ext: string): string {
    return path.join(this.storageRoot, DURABLE_RENDER_DIR, `${jobId}${ext}`);
  }

  /**
   * Put the final video where it will be served from. Runs while the job is
   * still `running`; a failed durable copy falls back to the workspace file.
   */
  async prepare(entry: RenderJobEntry): Promise<ArtifactLocation> {
    const source = entry.finalOutputPath;

    if (entry.ownerId === undefined) {
      return { path: source, durable: false };
    }

    const destination = this.durablePathFor(entry.id, path.extname(source));
    try {
      await this.store.copy(source, destination);
      const sizeBytes = await this.store.size(destination);
      console.log(`[ResultMaterializer] ✓ Render ${entry.id} saved to ${destination} (${sizeBytes} bytes)`);
      return { path: destination, durable: true, sizeBytes };
    } catch (error) {
      console.error(`[ResultMaterializer] ✗ Failed to save render ${entry.id}: ${errorMessage(error)}`);
    }

    try {
      return { path: source, durable: false, sizeBytes: await this.store.size(source) };
    } catch (error) {
      console.error(`[ResultMaterializer] Could not measure ${source}: ${errorMessage(error)}`);
      return { path: source, durable: false };
    }
  }

  /**
   * Mark the durable record finished. Synchronous, so the caller can apply it
   * and the live transition without anything running in between.
   *
   * A record whose durable copy failed still reaches `finished`; it points at
   * the workspace file, which is never served once the live entry is gone.
   */
  recordFinished(entry: RenderJobEntry, artifact: ArtifactLocation, message: string): void {
    if (entry.ownerId === undefined) return;
    try {
      this.repository.markFinished(entry.id, artifact.path, artifact.sizeBytes ?? 0, message);
    } catch (error) {
      console.error(`[ResultMaterializer] ✗ Failed to update record for ${entry.id}: ${errorMessage(error)}`);
    }
  }

  /**
   * Drop a durable copy made for a job that was cancelled meanwhile
   */
  async discard(artifact: ArtifactLocation): Promise<void> {
    if (!artifact.durable) return;
    try {
      await this.store.remove(artifact.path);
    } catch (error) {
      console.error(`[ResultMaterializer] Could not delete ${artifact.path}: ${errorMessage(error)}`);
    }
  }
}
