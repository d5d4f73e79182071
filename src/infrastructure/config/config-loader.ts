import { isAbsolute, join, resolve } from 'node:path';
import { LocalnetConfigSchema, type LocalnetConfig } from '@domain/types/config.js';
import type { FixtureEntry } from '@domain/types/fixture.js';
import { LOCALNET_ENV, LOCALNET_FILES } from '@shared/constants/paths.js';
import { ConfigError } from '@shared/lib/errors.js';
import { JsonStore, JsonStoreError } from '@infra/persistence/json-store.js';
import { DEFAULT_FIXTURES } from '@infra/fixtures/default-fixtures.js';

export interface ConfigOverrides {
  programsDir?: string;
  accountsDir?: string;
}

export interface LoadConfigOptions {
  /** Environment to read directory overrides from. Callers pass process.env explicitly. */
  env?: Record<string, string | undefined>;
  /** Values from CLI flags; highest precedence */
  overrides?: ConfigOverrides;
}

/** Config with absolute directories and the effective fixture table. */
export interface ResolvedConfig extends LocalnetConfig {
  workspaceDir: string;
  fixtureTable: readonly FixtureEntry[];
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

function resolveDir(workspaceDir: string, dir: string): string {
  return isAbsolute(dir) ? dir : resolve(workspaceDir, dir);
}

/**
 * Read localnet.config.json from the workspace and layer overrides on top.
 *
 * Precedence (lowest first): schema defaults, config file, PROGRAMS_DIR /
 * ACCOUNTS_DIR, CLI flags. Empty environment values count as unset.
 */
export function loadLocalnetConfig(workspaceDir: string, options: LoadConfigOptions = {}): ResolvedConfig {
  const env = options.env ?? {};
  const overrides = options.overrides ?? {};
  const configPath = join(workspaceDir, LOCALNET_FILES.config);

  let fileConfig: LocalnetConfig;
  try {
    fileConfig = JsonStore.read(configPath, LocalnetConfigSchema);
  } catch (error) {
    if (error instanceof JsonStoreError) {
      throw new ConfigError(configPath, error.message, error.issues);
    }
    throw error;
  }

  const programsDir =
    nonEmpty(overrides.programsDir) ?? nonEmpty(env[LOCALNET_ENV.programsDir]) ?? fileConfig.programsDir;
  const accountsDir =
    nonEmpty(overrides.accountsDir) ?? nonEmpty(env[LOCALNET_ENV.accountsDir]) ?? fileConfig.accountsDir;

  return {
    ...fileConfig,
    programsDir: resolveDir(workspaceDir, programsDir),
    accountsDir: resolveDir(workspaceDir, accountsDir),
    workspaceDir,
    fixtureTable: fileConfig.fixtures ?? DEFAULT_FIXTURES,
  };
}

/** Write a default config file into `workspaceDir`. Returns the path written. */
export function writeDefaultConfig(workspaceDir: string): string {
  const configPath = join(workspaceDir, LOCALNET_FILES.config);
  JsonStore.write(configPath, LocalnetConfigSchema.parse({}), LocalnetConfigSchema);
  return configPath;
}
