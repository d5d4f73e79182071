import { dirname } from 'node:path';
import type { IFixtureFilesystem, PathInfo } from '@domain/ports/fixture-filesystem.js';

/**
 * In-memory implementation of IFixtureFilesystem for use in unit tests.
 *
 * Paths are plain strings; creating a directory also creates its parents.
 * Permission failures are declared up front:
 *
 * ```ts
 * const fs = new MemoryFixtureFilesystem()
 *   .addDirectory('/work/programs', { writable: false })
 *   .failCreateFor('/work/accounts');
 * ```
 */
export class MemoryFixtureFilesystem implements IFixtureFilesystem {
  private readonly entries = new Map<string, PathInfo>();
  private readonly readOnly = new Set<string>();
  private readonly uncreatable = new Set<string>();
  private readonly uninspectable = new Set<string>();

  addDirectory(path: string, options: { writable?: boolean } = {}): this {
    this.createParents(path);
    if (options.writable === false) this.readOnly.add(path);
    return this;
  }

  addFile(path: string, size = 1): this {
    this.createParents(dirname(path));
    this.entries.set(path, { kind: 'file', size });
    return this;
  }

  /** Make createDirectory(path) throw as a permission failure would. */
  failCreateFor(path: string): this {
    this.uncreatable.add(path);
    return this;
  }

  /** Make inspect(path) throw, as stat does below a regular file or an unsearchable parent. */
  failInspectFor(path: string): this {
    this.uninspectable.add(path);
    return this;
  }

  inspect(path: string): PathInfo | undefined {
    if (this.uninspectable.has(path)) {
      throw new Error(`ENOTDIR: not a directory, stat '${path}'`);
    }
    return this.entries.get(path);
  }

  createDirectory(path: string): void {
    if (this.uncreatable.has(path)) {
      throw new Error(`EACCES: permission denied, mkdir '${path}'`);
    }
    this.createParents(path);
  }

  isWritable(path: string): boolean {
    return this.entries.has(path) && !this.readOnly.has(path);
  }

  /** Every path currently present, sorted. */
  paths(): string[] {
    return [...this.entries.keys()].sort();
  }

  private createParents(path: string): void {
    let current = path;
    while (!this.entries.has(current)) {
      this.entries.set(current, { kind: 'directory', size: 0 });
      const parent = dirname(current);
      if (parent === current) break;
      current = parent;
    }
  }
}
