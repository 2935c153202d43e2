import { spawn } from 'child_process';
import { unlink } from 'fs/promises';
import type { VideoFormat } from '../../core/entities/RenderJob.js';
import type { FrameRateConversion, IPostProcessor } from '../../core/interfaces/IProcessLauncher.js';
import { OrchestratorError, errorMessage } from '../../core/errors/OrchestratorError.js';

const MAX_CAPTURED_OUTPUT = 64 * 1024;

/**
 * Encoder arguments for motion-interpolated frame-rate conversion
 */
export function buildConversionArgs(
  inputPath: string,
  outputPath: string,
  fps: number,
  format: VideoFormat
): string[] {
  const args = [
    '-y',
    '-i', inputPath,
    '-vf', `minterpolate=fps=${fps}:mi_mode=mci:mc_mode=aobmc:me_mode=bidir:vsbmc=1`,
    '-an',
  ];

  if (format === 'mp4') {
    args.push('-c:v', 'libx264', '-preset', 'medium', '-crf', '18', '-pix_fmt', 'yuv420p');
  } else {
    args.push('-c:v', 'libvpx-vp9', '-pix_fmt', 'yuva420p', '-b:v', '0', '-crf', '12');
  }

  args.push(outputPath);
  return args;
}

/**
 * Runs the external encoder to bring the base render up to the playback frame rate
 */
export class FrameRateConverter implements IPostProcessor {
  constructor(private readonly encoderBinary: string = 'ffmpeg') {}

  async convert(conversion: FrameRateConversion): Promise<void> {
    const args = buildConversionArgs(conversion.inputPath, conversion.outputPath, conversion.fps, conversion.format);
    const { code, output } = await this.run(args, conversion.signal);

    if (code !== 0) {
      throw OrchestratorError.postProcessFailure(
        `Frame-rate conversion failed (${code}). Command: ${this.encoderBinary} ${args.join(' ')}`,
        output
      );
    }

    try {
      await unlink(conversion.inputPath);
    } catch (error) {
      console.error(`[FrameRateConverter] Could not delete base render ${conversion.inputPath}: ${errorMessage(error)}`);
    }
  }

  private run(args: string[], signal?: AbortSignal): Promise<{ code: number; output: string }> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.encoderBinary, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        signal,
      });

      let output = '';
      const capture = (chunk: Buffer) => {
        output += chunk.toString();
        if (output.length > MAX_CAPTURED_OUTPUT) {
          output = output.slice(-MAX_CAPTURED_OUTPUT);
        }
      };
      proc.stdout?.on('data', capture);
      proc.stderr?.on('data', capture);

      proc.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          reject(OrchestratorError.postProcessFailure(
            `Encoder binary not found: ${this.encoderBinary}. Install ffmpeg or set FFMPEG_BIN.`,
            output,
            error
          ));
          return;
        }
        reject(OrchestratorError.postProcessFailure(`Encoder failed to run: ${error.message}`, output, error));
      });

      proc.on('close', (code) => {
        resolve({ code: code ?? -1, output });
      });
    });
  }
}
