import { join } from 'node:path';
import type { ArtifactSpec, FetchMethod, FixtureEntry } from '@domain/types/fixture.js';

export interface FixtureDirectories {
  programsDir: string;
  accountsDir: string;
}

export function targetDirFor(method: FetchMethod, dirs: FixtureDirectories): string {
  return method === 'program-dump' ? dirs.programsDir : dirs.accountsDir;
}

/**
 * Resolve fixture table rows into ArtifactSpecs, keeping declaration order.
 */
export function resolveArtifactSpecs(
  fixtures: readonly FixtureEntry[],
  dirs: FixtureDirectories,
): ArtifactSpec[] {
  return fixtures.map((entry) => {
    const targetDir = targetDirFor(entry.method, dirs);
    return Object.freeze({
      identity: entry.identity,
      label: entry.label ?? entry.identity,
      method: entry.method,
      targetDir,
      targetPath: join(targetDir, entry.fileName),
    });
  });
}

/** Distinct target directories in order of first appearance. */
export function distinctTargetDirs(specs: readonly ArtifactSpec[]): string[] {
  return [...new Set(specs.map((s) => s.targetDir))];
}
