import { accessSync, constants, mkdirSync, statSync } from 'node:fs';
import type { IFixtureFilesystem, PathInfo } from '@domain/ports/fixture-filesystem.js';

export class NodeFixtureFilesystem implements IFixtureFilesystem {
  inspect(path: string): PathInfo | undefined {
    const stats = statSync(path, { throwIfNoEntry: false });
    if (stats === undefined) return undefined;
    const kind = stats.isFile() ? 'file' : stats.isDirectory() ? 'directory' : 'other';
    return { kind, size: stats.size };
  }

  createDirectory(path: string): void {
    mkdirSync(path, { recursive: true });
  }

  isWritable(path: string): boolean {
    try {
      accessSync(path, constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }
}
