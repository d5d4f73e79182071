import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { LOCALNET_FILES } from '@shared/constants/paths.js';
import { MissingDependencyError, WrongDirectoryError } from '@shared/lib/errors.js';
import { ok, err, type Result } from '@shared/lib/result.js';

/**
 * Confirm `cwd` holds the localnet marker file. Only reads the filesystem.
 */
export function verifyWorkingDirectory(
  cwd: string,
  exists: (path: string) => boolean = existsSync,
): Result<string, WrongDirectoryError> {
  if (!exists(join(cwd, LOCALNET_FILES.config))) {
    return err(new WrongDirectoryError(cwd, LOCALNET_FILES.config));
  }
  return ok(cwd);
}

/**
 * Check each binary in order and report every one that is missing.
 */
export async function checkDependencies(
  binaries: readonly string[],
  checkBinary: (binary: string) => Promise<boolean>,
): Promise<Result<void, MissingDependencyError>> {
  const missing: string[] = [];
  for (const binary of binaries) {
    if (!(await checkBinary(binary))) missing.push(binary);
  }
  return missing.length > 0 ? err(new MissingDependencyError(missing)) : ok(undefined);
}
