import type { Readable } from 'stream';

/**
 * File operations on job workspaces and the durable storage root.
 * Every path the orchestrator touches goes through this seam.
 */
export interface IWorkspaceStore {
  createWorkspace(): Promise<string>;

  writeFile(filePath: string, data: Buffer): Promise<void>;

  exists(filePath: string): Promise<boolean>;

  size(filePath: string): Promise<number>;

  move(from: string, to: string): Promise<void>;

  copy(from: string, to: string): Promise<void>;

  /** Recursive; also takes a single file */
  remove(target: string): Promise<void>;

  openRead(filePath: string): Readable;
}
