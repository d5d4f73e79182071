import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { ArtifactSpec } from '@domain/types/fixture.js';
import type { IArtifactFetcher } from '@domain/ports/artifact-fetcher.js';
import { logger } from '@shared/lib/logger.js';

const execFileAsync = promisify(execFile);

export type ExecFileFn = (
  file: string,
  args: readonly string[],
) => Promise<{ stdout: string; stderr: string }>;

export interface SolanaCliFetcherOptions {
  /** Path to the solana binary. Defaults to 'solana'. */
  binaryPath?: string;
  /** Cluster moniker or RPC URL for `-u`. Defaults to 'm' (mainnet-beta). */
  cluster?: string;
}

/**
 * Arguments for the solana CLI call that writes `spec` to its target path.
 */
export function buildFetchArgs(spec: ArtifactSpec, cluster: string): string[] {
  switch (spec.method) {
    case 'program-dump':
      return ['program', 'dump', '-u', cluster, spec.identity, spec.targetPath];
    case 'account-snapshot':
      return ['account', '-u', cluster, '--output', 'json', '--output-file', spec.targetPath, spec.identity];
  }
}

/**
 * Fetcher that shells out to the solana CLI: `program dump` for program
 * binaries and `account --output json` for account snapshots.
 */
export class SolanaCliFetcher implements IArtifactFetcher {
  readonly binaryPath: string;
  readonly cluster: string;

  private _execFile: ExecFileFn;

  constructor(options: SolanaCliFetcherOptions = {}) {
    this.binaryPath = options.binaryPath ?? 'solana';
    this.cluster = options.cluster ?? 'm';
    this._execFile = (file, args) =>
      execFileAsync(file, args, { encoding: 'utf-8', maxBuffer: 10 * 1024 * 1024 });
  }

  /** Replace the exec function (for testing). */
  setExecFunction(execFn: ExecFileFn): void {
    this._execFile = execFn;
  }

  async fetch(spec: ArtifactSpec): Promise<void> {
    const args = buildFetchArgs(spec, this.cluster);
    logger.debug('running solana CLI', { binary: this.binaryPath, args });

    try {
      const { stdout } = await this._execFile(this.binaryPath, args);
      if (stdout.trim()) logger.debug(stdout.trim(), { identity: spec.identity });
    } catch (err) {
      throw new Error(`${this.binaryPath} ${args[0]} exited with an error: ${stderrOf(err)}`, { cause: err });
    }
  }
}

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const { stderr } = err;
    if (typeof stderr === 'string' && stderr.trim()) return stderr.trim();
  }
  return err instanceof Error ? err.message : String(err);
}
