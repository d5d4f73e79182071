import type { IProgressReporter } from '@domain/ports/progress-reporter.js';
import { silentReporter } from '@domain/ports/progress-reporter.js';
import type { ResolvedConfig } from '@infra/config/config-loader.js';
import { NodeFixtureFilesystem } from '@infra/filesystem/node-fixture-filesystem.js';
import { SolanaCliFetcher } from '@infra/solana/solana-cli-fetcher.js';
import { checkBinaryExists } from '@infra/solana/binary-check.js';
import { ValidatorLauncher } from '@infra/process/validator-launcher.js';
import { BootstrapRunner, type BootstrapDeps } from './bootstrap-runner.js';
import { ConsoleReporter } from './console-reporter.js';

export interface RunnerFactoryOptions {
  /** Suppress stdout narration so JSON output stays parseable */
  quiet?: boolean;
  /** Replace individual dependencies, e.g. with in-process stubs */
  overrides?: Partial<BootstrapDeps>;
}

export function createDefaultDeps(config: ResolvedConfig, quiet = false): BootstrapDeps {
  const reporter: IProgressReporter = quiet
    ? silentReporter
    : new ConsoleReporter({ baseDir: config.workspaceDir });

  return {
    filesystem: new NodeFixtureFilesystem(),
    fetcher: new SolanaCliFetcher({ binaryPath: config.solanaBinary, cluster: config.cluster }),
    launcher: new ValidatorLauncher(),
    reporter,
    checkBinary: checkBinaryExists,
  };
}

export function createBootstrapRunner(config: ResolvedConfig, options: RunnerFactoryOptions = {}): BootstrapRunner {
  return new BootstrapRunner(config, {
    ...createDefaultDeps(config, options.quiet),
    ...options.overrides,
  });
}
