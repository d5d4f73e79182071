export class LocalnetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LocalnetError';
  }
}

export class WrongDirectoryError extends LocalnetError {
  constructor(
    public readonly cwd: string,
    public readonly marker: string,
  ) {
    super(
      `No ${marker} found in ${cwd}. Run localnet from the directory that holds ${marker}, or run "localnet init" there first.`,
    );
    this.name = 'WrongDirectoryError';
  }
}

export class MissingDependencyError extends LocalnetError {
  constructor(public readonly binaries: readonly string[]) {
    super(
      `Required CLI tools not found on PATH: ${binaries.join(', ')}. Install the Solana CLI tool suite and make sure it is on your PATH.`,
    );
    this.name = 'MissingDependencyError';
  }
}

export type DirectoryFailure = 'create' | 'inaccessible' | 'not-writable' | 'not-directory';

const DIRECTORY_MESSAGES: Record<DirectoryFailure, (path: string) => string> = {
  create: (path) => `Failed to create directory '${path}'. Check permissions.`,
  inaccessible: (path) =>
    `Cannot access '${path}'. Check that every parent of it is a directory you are allowed to search.`,
  'not-writable': (path) => `Directory '${path}' exists but is not writable. Check permissions.`,
  'not-directory': (path) => `Path '${path}' exists but is not a directory.`,
};

export class DirectoryError extends LocalnetError {
  constructor(
    public readonly path: string,
    public readonly reason: DirectoryFailure,
    cause?: unknown,
  ) {
    super(DIRECTORY_MESSAGES[reason](path), { cause });
    this.name = 'DirectoryError';
  }
}

export class FetchError extends LocalnetError {
  constructor(
    public readonly identity: string,
    public readonly path: string,
    detail?: string,
    cause?: unknown,
  ) {
    super(
      `Failed to fetch ${identity} into ${path}${detail ? `: ${detail}` : ''}. ` +
        `If a partial file was left at ${path}, remove it before retrying.`,
      { cause },
    );
    this.name = 'FetchError';
  }
}

export class LaunchError extends LocalnetError {
  constructor(
    public readonly command: string,
    detail?: string,
    cause?: unknown,
  ) {
    super(`Failed to start ${command}${detail ? `: ${detail}` : ''}`, { cause });
    this.name = 'LaunchError';
  }
}

export class ConfigError extends LocalnetError {
  constructor(
    public readonly path: string,
    message: string,
    public readonly issues: unknown[] = [],
  ) {
    super(`Invalid configuration in ${path}: ${message}`);
    this.name = 'ConfigError';
  }
}

/** Message of an unknown thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
