import { spawn, ChildProcess } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import readline from 'readline';
import { PassThrough, Readable } from 'stream';
import type { RenderLaunchSpec } from '../../core/entities/RenderJob.js';
import type { IProcessLauncher, RenderProcess } from '../../core/interfaces/IProcessLauncher.js';
import { OrchestratorError } from '../../core/errors/OrchestratorError.js';

export const UNKNOWN_EXIT_CODE = -1;

export interface RendererLocation {
  binary?: string;
  wellKnownPath: string;
  searchName: string;
}

export interface RendererLauncherOptions extends RendererLocation {
  script?: string;
  helperPaths: string[];
  helperPathEnv: string;
  debug?: boolean;
}

export type FileProbe = (candidate: string) => boolean;

const isExistingFile: FileProbe = (candidate) => {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
};

function expandHome(candidate: string): string {
  return candidate.startsWith('~') ? path.join(os.homedir(), candidate.slice(1)) : candidate;
}

/**
 * Find the renderer: configured path, then the well-known install path, then $PATH
 */
export function resolveRendererExecutable(
  location: RendererLocation,
  pathEnv: string = process.env.PATH ?? '',
  probe: FileProbe = isExistingFile
): string {
  if (location.binary) {
    const configured = expandHome(location.binary);
    if (probe(configured)) return configured;
  }

  if (probe(location.wellKnownPath)) {
    return location.wellKnownPath;
  }

  const names = process.platform === 'win32'
    ? [location.searchName, `${location.searchName}.exe`]
    : [location.searchName];

  for (const dir of pathEnv.split(path.delimiter).filter(Boolean)) {
    for (const name of names) {
      const candidate = path.join(dir, name);
      if (probe(candidate)) return candidate;
    }
  }

  throw OrchestratorError.executableNotFound(
    'Renderer executable not found. Set RENDERER_BIN or install the renderer on PATH.'
  );
}

/**
 * Command-line contract of the turntable renderer
 */
export function buildRendererArgs(spec: RenderLaunchSpec, script?: string): string[] {
  const { options } = spec;
  const args: string[] = script ? ['-b', '-P', script, '--'] : [];

  args.push(
    '--input', spec.inputPath,
    '--out', spec.outputPath,
    '--seconds', String(spec.durationSeconds),
    '--fps', String(spec.baseFps),
    '--size', String(options.resolution),
    '--axis', options.axis,
    '--format', options.format,
    '--offset', String(options.offset),
  );

  if (options.autoOrientation) {
    args.push('--auto');
  }
  args.push('--quality', options.quality);
  if (options.watermark) {
    args.push('--watermark');
  }
  args.push('--kelvin', String(options.kelvin));

  // Auto brightness and an explicit exposure are mutually exclusive
  if (options.autoBrightness) {
    args.push('--auto_brightness');
  } else {
    args.push('--exposure', String(options.exposure));
  }

  return args;
}

/**
 * Inherited environment with helper directories prepended to the renderer's script path
 */
export function buildRendererEnv(
  base: NodeJS.ProcessEnv,
  helperPaths: string[],
  helperPathEnv: string
): NodeJS.ProcessEnv {
  const env = { ...base };
  if (helperPaths.length === 0) return env;

  const existing = env[helperPathEnv];
  env[helperPathEnv] = [...helperPaths, ...(existing ? [existing] : [])].join(path.delimiter);
  return env;
}

function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) {
    const match = Object.entries(os.constants.signals).find(([name]) => name === signal);
    return match ? 128 + match[1] : UNKNOWN_EXIT_CODE;
  }
  return UNKNOWN_EXIT_CODE;
}

/**
 * Interleave several output pipes line by line. Each source is split on its
 * own, so a partial line on one pipe is never joined with text from another.
 */
export function mergeLines(sources: Readable[]): PassThrough {
  const output = new PassThrough();
  let openSources = sources.length;
  if (openSources === 0) {
    output.end();
    return output;
  }

  for (const source of sources) {
    const lines = readline.createInterface({ input: source, crlfDelay: Infinity });
    lines.on('line', (line: string) => {
      if (!output.destroyed) output.write(`${line}\n`);
    });
    lines.once('close', () => {
      openSources--;
      if (openSources === 0 && !output.destroyed) output.end();
    });
    source.once('error', (error: Error) => output.destroy(error));
  }
  return output;
}

/**
 * RenderProcess backed by a ChildProcess, stdout and stderr merged into one stream
 */
export class ChildRenderProcess implements RenderProcess {
  readonly output: PassThrough;
  private readonly exit: Promise<number>;

  constructor(private readonly child: ChildProcess) {
    const sources = [child.stdout, child.stderr].filter((s): s is Readable => s !== null);
    this.output = mergeLines(sources);

    this.exit = new Promise<number>((resolve) => {
      child.once('close', (code, signal) => resolve(exitCodeOf(code, signal)));
      child.once('error', (error) => {
        console.error(`[RendererLauncher] Renderer process error: ${error.message}`);
        resolve(UNKNOWN_EXIT_CODE);
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  waitForExit(): Promise<number> {
    return this.exit;
  }

  isAlive(): boolean {
    return this.child.exitCode === null && this.child.signalCode === null;
  }

  terminate(): void {
    if (this.isAlive()) this.child.kill('SIGTERM');
  }

  kill(): void {
    if (this.isAlive()) this.child.kill('SIGKILL');
  }
}

/**
 * Starts one renderer subprocess per job
 */
export class RendererLauncher implements IProcessLauncher {
  constructor(private readonly options: RendererLauncherOptions) {}

  /**
   * Fails with EXECUTABLE_NOT_FOUND before anything is started
   */
  resolveExecutable(): string {
    return resolveRendererExecutable(this.options);
  }

  launch(spec: RenderLaunchSpec): RenderProcess {
    const executable = this.resolveExecutable();
    const args = buildRendererArgs(spec, this.options.script);

    if (this.options.debug) {
      console.error(`[RendererLauncher] Launching renderer: ${executable} ${args.join(' ')}`);
    }

    const child = spawn(executable, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: buildRendererEnv(process.env, this.options.helperPaths, this.options.helperPathEnv),
    });

    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    return new ChildRenderProcess(child);
  }
}
