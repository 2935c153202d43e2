import type { Readable } from 'stream';
import type { RenderLaunchSpec, VideoFormat } from '../entities/RenderJob.js';

/**
 * Handle to a running renderer subprocess
 */
export interface RenderProcess {
  readonly pid?: number;

  /** stdout and stderr merged, UTF-8 */
  readonly output: Readable;

  /** Resolves with the exit code; signal deaths resolve with a non-zero code */
  waitForExit(): Promise<number>;

  isAlive(): boolean;

  terminate(): void;

  kill(): void;
}

export interface IProcessLauncher {
  /** Throws EXECUTABLE_NOT_FOUND when no renderer can be located */
  resolveExecutable(): string;

  launch(spec: RenderLaunchSpec): RenderProcess;
}

export interface FrameRateConversion {
  inputPath: string;
  outputPath: string;
  fps: number;
  format: VideoFormat;
  signal?: AbortSignal;
}

/**
 * Secondary encoder run after a successful render
 */
export interface IPostProcessor {
  convert(conversion: FrameRateConversion): Promise<void>;
}
