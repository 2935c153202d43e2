import fs from 'fs';
import { mkdtemp, rm, writeFile, stat, rename, copyFile, access, unlink } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Readable } from 'stream';
import type { IWorkspaceStore } from '../../core/interfaces/IWorkspaceStore.js';

/**
 * Local filesystem implementation of workspace operations
 */
export class FileWorkspaceStore implements IWorkspaceStore {
  constructor(
    private readonly tempRoot: string = os.tmpdir(),
    private readonly prefix: string = 'turntable_'
  ) {}

  async createWorkspace(): Promise<string> {
    return mkdtemp(path.join(this.tempRoot, this.prefix));
  }

  async writeFile(filePath: string, data: Buffer): Promise<void> {
    await writeFile(filePath, data);
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await access(filePath, fs.constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  async size(filePath: string): Promise<number> {
    const stats = await stat(filePath);
    return stats.size;
  }

  async move(from: string, to: string): Promise<void> {
    try {
      await rename(from, to);
    } catch (error) {
      // rename cannot cross devices
      if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
        await copyFile(from, to);
        await unlink(from);
        return;
      }
      throw error;
    }
  }

  async copy(from: string, to: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(to), { recursive: true });
    await copyFile(from, to);
  }

  async remove(dirPath: string): Promise<void> {
    await rm(dirPath, { recursive: true, force: true });
  }

  openRead(filePath: string): Readable {
    return fs.createReadStream(filePath);
  }
}
