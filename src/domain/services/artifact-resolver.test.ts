import type { FixtureEntry } from '@domain/types/fixture.js';
import { distinctTargetDirs, resolveArtifactSpecs, targetDirFor } from './artifact-resolver.js';

const DIRS = { programsDir: '/work/programs', accountsDir: '/work/accounts' };

const TABLE: FixtureEntry[] = [
  { identity: 'ProgA', fileName: 'a.so', method: 'program-dump', label: 'Program A' },
  { identity: 'AcctB', fileName: 'b.json', method: 'account-snapshot' },
  { identity: 'ProgC', fileName: 'c.so', method: 'program-dump' },
];

describe('resolveArtifactSpecs', () => {
  it('places programs and accounts in their configured directories', () => {
    const specs = resolveArtifactSpecs(TABLE, DIRS);
    expect(specs.map((s) => s.targetPath)).toEqual([
      '/work/programs/a.so',
      '/work/accounts/b.json',
      '/work/programs/c.so',
    ]);
  });

  it('falls back to the identity when no label is declared', () => {
    const specs = resolveArtifactSpecs(TABLE, DIRS);
    expect(specs.map((s) => s.label)).toEqual(['Program A', 'AcctB', 'ProgC']);
  });

  it('returns immutable specs', () => {
    const [spec] = resolveArtifactSpecs(TABLE, DIRS);
    expect(Object.isFrozen(spec)).toBe(true);
  });
});

describe('distinctTargetDirs', () => {
  it('lists each directory once in order of first appearance', () => {
    expect(distinctTargetDirs(resolveArtifactSpecs(TABLE, DIRS))).toEqual(['/work/programs', '/work/accounts']);
  });

  it('collapses to one directory when both kinds share it', () => {
    const shared = { programsDir: '/work/fixtures', accountsDir: '/work/fixtures' };
    expect(distinctTargetDirs(resolveArtifactSpecs(TABLE, shared))).toEqual(['/work/fixtures']);
  });
});

describe('targetDirFor', () => {
  it('maps fetch methods to directories', () => {
    expect(targetDirFor('program-dump', DIRS)).toBe('/work/programs');
    expect(targetDirFor('account-snapshot', DIRS)).toBe('/work/accounts');
  });
});
