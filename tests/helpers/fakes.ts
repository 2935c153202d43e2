import path from "path";
import { PassThrough, Readable } from "stream";
import type { RenderLaunchSpec } from "../../src/core/entities/RenderJob.js";
import type {
  FrameRateConversion,
  IPostProcessor,
  IProcessLauncher,
  RenderProcess,
} from "../../src/core/interfaces/IProcessLauncher.js";
import type { IWorkspaceStore } from "../../src/core/interfaces/IWorkspaceStore.js";
import { OrchestratorError } from "../../src/core/errors/OrchestratorError.js";

/**
 * Let stream events and pending promise callbacks run
 */
export async function flush(rounds = 3): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/**
 * Scripted stand-in for a renderer subprocess
 */
export class FakeRenderProcess implements RenderProcess {
  readonly pid = 4242;
  readonly output = new PassThrough();
  readonly signals: string[] = [];
  ignoreTerminate = false;

  private exitCode: number | null = null;
  private waiters: Array<(code: number) => void> = [];

  writeLines(...lines: string[]): void {
    for (const line of lines) {
      this.output.write(`${line}\n`);
    }
  }

  /**
   * Close the output and exit with the given code
   */
  finish(code: number): void {
    if (!this.output.writableEnded && !this.output.destroyed) this.output.end();
    this.exit(code);
  }

  exit(code: number): void {
    if (this.exitCode !== null) return;
    this.exitCode = code;
    for (const resolve of this.waiters) resolve(code);
    this.waiters = [];
  }

  waitForExit(): Promise<number> {
    if (this.exitCode !== null) return Promise.resolve(this.exitCode);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  isAlive(): boolean {
    return this.exitCode === null;
  }

  terminate(): void {
    this.signals.push("SIGTERM");
    if (!this.ignoreTerminate) this.finish(143);
  }

  kill(): void {
    this.signals.push("SIGKILL");
    this.finish(137);
  }
}

export class FakeLauncher implements IProcessLauncher {
  readonly launches: Array<{ spec: RenderLaunchSpec; process: FakeRenderProcess }> = [];
  missing = false;

  resolveExecutable(): string {
    if (this.missing) {
      throw OrchestratorError.executableNotFound("Renderer executable not found.");
    }
    return "/opt/renderer/bin/renderer";
  }

  launch(spec: RenderLaunchSpec): RenderProcess {
    this.resolveExecutable();
    const renderProcess = new FakeRenderProcess();
    this.launches.push({ spec, process: renderProcess });
    return renderProcess;
  }

  last(): { spec: RenderLaunchSpec; process: FakeRenderProcess } {
    const launch = this.launches[this.launches.length - 1];
    if (!launch) throw new Error("No renderer launched");
    return launch;
  }
}

/**
 * In-memory file tree that records every operation and flags any touch of a
 * workspace after it was removed
 */
export class MemoryWorkspaceStore implements IWorkspaceStore {
  readonly files: Map<string, Buffer> = new Map();
  readonly operations: string[] = [];
  readonly removedWorkspaces: string[] = [];
  readonly violations: string[] = [];
  failCopy = false;
  /** While set, copies wait on it after reading their source */
  copyGate: Promise<void> | null = null;
  private counter = 0;

  async createWorkspace(): Promise<string> {
    this.counter++;
    const workspace = path.join("/work", `ws-${this.counter}`);
    this.operations.push(`create ${workspace}`);
    return workspace;
  }

  async writeFile(filePath: string, data: Buffer): Promise<void> {
    this.touch("write", filePath);
    this.files.set(filePath, data);
  }

  async exists(filePath: string): Promise<boolean> {
    this.touch("exists", filePath);
    return this.files.has(filePath);
  }

  async size(filePath: string): Promise<number> {
    this.touch("size", filePath);
    return this.read(filePath).length;
  }

  async move(from: string, to: string): Promise<void> {
    this.touch("move", from);
    const data = this.read(from);
    this.files.delete(from);
    this.files.set(to, data);
  }

  async copy(from: string, to: string): Promise<void> {
    this.touch("copy", from);
    if (this.failCopy) {
      throw new Error("ENOSPC: no space left on device");
    }
    const data = this.read(from);
    if (this.copyGate) await this.copyGate;
    this.files.set(to, data);
  }

  async remove(dirPath: string): Promise<void> {
    this.operations.push(`remove ${dirPath}`);
    this.removedWorkspaces.push(dirPath);
    this.files.delete(dirPath);
    for (const filePath of Array.from(this.files.keys())) {
      if (filePath.startsWith(`${dirPath}${path.sep}`)) {
        this.files.delete(filePath);
      }
    }
  }

  openRead(filePath: string): Readable {
    this.touch("read", filePath);
    return Readable.from([this.read(filePath)]);
  }

  put(filePath: string, contents: string): void {
    this.files.set(filePath, Buffer.from(contents));
  }

  private read(filePath: string): Buffer {
    const data = this.files.get(filePath);
    if (!data) {
      throw new Error(`ENOENT: no such file, ${filePath}`);
    }
    return data;
  }

  private touch(operation: string, filePath: string): void {
    this.operations.push(`${operation} ${filePath}`);
    const removed = this.removedWorkspaces.find((dir) => filePath.startsWith(`${dir}${path.sep}`));
    if (removed) {
      this.violations.push(`${operation} ${filePath}`);
    }
  }
}

type ConversionMode = "succeed" | "fail" | "hang";

export class FakePostProcessor implements IPostProcessor {
  readonly conversions: FrameRateConversion[] = [];
  mode: ConversionMode = "succeed";

  constructor(private readonly store: MemoryWorkspaceStore) {}

  async convert(conversion: FrameRateConversion): Promise<void> {
    this.conversions.push(conversion);

    if (this.mode === "fail") {
      throw OrchestratorError.postProcessFailure("Frame-rate conversion failed (1).", "Invalid data found");
    }

    if (this.mode === "hang") {
      await new Promise<void>((_resolve, reject) => {
        conversion.signal?.addEventListener("abort", () => reject(new Error("The operation was aborted")));
      });
      return;
    }

    const data = this.store.files.get(conversion.inputPath) ?? Buffer.from("");
    this.store.files.delete(conversion.inputPath);
    this.store.files.set(conversion.outputPath, Buffer.concat([data, Buffer.from("+smooth")]));
  }
}
