import type { ArtifactSpec, ProvisionResult } from '@domain/types/fixture.js';
import type { IFixtureFilesystem, PathInfo } from '@domain/ports/fixture-filesystem.js';
import type { IArtifactFetcher } from '@domain/ports/artifact-fetcher.js';
import type { IProgressReporter } from '@domain/ports/progress-reporter.js';
import { DirectoryError, FetchError, describeError } from '@shared/lib/errors.js';
import { ok, err, type Result } from '@shared/lib/result.js';
import { logger } from '@shared/lib/logger.js';
import { distinctTargetDirs } from './artifact-resolver.js';

export interface ProvisionerDeps {
  filesystem: IFixtureFilesystem;
  fetcher: IArtifactFetcher;
  reporter: IProgressReporter;
}

export type DirectoryOutcome = 'created' | 'exists';

/**
 * inspect() only reports absence for a missing path; anything else stat refuses
 * (ENOTDIR, EACCES on a parent) comes back as an error value.
 */
function inspectPath(path: string, filesystem: IFixtureFilesystem): Result<PathInfo | undefined, unknown> {
  try {
    return ok(filesystem.inspect(path));
  } catch (error) {
    return err(error);
  }
}

function isNonEmptyFile(info: PathInfo | undefined): boolean {
  return info?.kind === 'file' && info.size > 0;
}

/**
 * Make sure `dir` exists and is writable, creating it (with parents) when absent.
 * An existing directory that is not writable is reported without any attempt to fix it.
 */
export function prepareDirectory(
  dir: string,
  deps: Pick<ProvisionerDeps, 'filesystem' | 'reporter'>,
): Result<DirectoryOutcome, DirectoryError> {
  const { filesystem, reporter } = deps;
  const inspected = inspectPath(dir, filesystem);
  if (!inspected.ok) {
    return err(new DirectoryError(dir, 'inaccessible', inspected.error));
  }
  const info = inspected.value;

  if (info === undefined) {
    try {
      filesystem.createDirectory(dir);
    } catch (error) {
      return err(new DirectoryError(dir, 'create', error));
    }
    if (!filesystem.isWritable(dir)) {
      return err(new DirectoryError(dir, 'not-writable'));
    }
    reporter.directoryCreated(dir);
    return ok('created');
  }

  if (info.kind !== 'directory') {
    return err(new DirectoryError(dir, 'not-directory'));
  }
  if (!filesystem.isWritable(dir)) {
    return err(new DirectoryError(dir, 'not-writable'));
  }
  return ok('exists');
}

/**
 * A target counts as present when it is a non-empty regular file.
 * Empty files are what an interrupted fetch usually leaves behind, so they are fetched again.
 */
export function isArtifactPresent(path: string, filesystem: IFixtureFilesystem): boolean {
  const inspected = inspectPath(path, filesystem);
  return inspected.ok && isNonEmptyFile(inspected.value);
}

function uninspectable(spec: ArtifactSpec, cause: unknown): FetchError {
  return new FetchError(spec.identity, spec.targetPath, `cannot inspect target path: ${describeError(cause)}`, cause);
}

async function provisionOne(
  spec: ArtifactSpec,
  deps: ProvisionerDeps,
): Promise<Result<ProvisionResult, FetchError>> {
  const { filesystem, fetcher, reporter } = deps;

  const before = inspectPath(spec.targetPath, filesystem);
  if (!before.ok) {
    return err(uninspectable(spec, before.error));
  }
  const existing = before.value;
  if (isNonEmptyFile(existing)) {
    const result: ProvisionResult = { spec, path: spec.targetPath, status: 'cached' };
    reporter.cacheHit(result);
    return ok(result);
  }
  if (existing !== undefined && existing.kind !== 'file') {
    return err(new FetchError(spec.identity, spec.targetPath, 'target path exists and is not a regular file'));
  }

  reporter.fetchStarted(spec);
  try {
    await fetcher.fetch(spec);
  } catch (error) {
    logger.debug('fetch failed', { identity: spec.identity, path: spec.targetPath, error: describeError(error) });
    return err(new FetchError(spec.identity, spec.targetPath, describeError(error), error));
  }

  const after = inspectPath(spec.targetPath, filesystem);
  if (!after.ok) {
    return err(uninspectable(spec, after.error));
  }
  const written = after.value;
  if (written === undefined || written.kind !== 'file') {
    return err(new FetchError(spec.identity, spec.targetPath, 'fetch reported success but produced no file'));
  }
  if (written.size === 0) {
    return err(new FetchError(spec.identity, spec.targetPath, 'fetch produced an empty file'));
  }

  const result: ProvisionResult = { spec, path: spec.targetPath, status: 'fetched' };
  reporter.fetchCompleted(result);
  return ok(result);
}

/**
 * Ensure every artifact exists on disk, fetching the missing ones exactly once.
 *
 * All target directories are prepared before the first fetch. Specs are then
 * handled one at a time in declaration order and the first failure ends the run.
 */
export async function provisionFixtures(
  specs: readonly ArtifactSpec[],
  deps: ProvisionerDeps,
): Promise<Result<ProvisionResult[], DirectoryError | FetchError>> {
  for (const dir of distinctTargetDirs(specs)) {
    const prepared = prepareDirectory(dir, deps);
    if (!prepared.ok) return prepared;
    logger.debug('fixture directory ready', { dir, outcome: prepared.value });
  }

  const results: ProvisionResult[] = [];
  for (const spec of specs) {
    const outcome = await provisionOne(spec, deps);
    if (!outcome.ok) return outcome;
    results.push(outcome.value);
  }
  return ok(results);
}
