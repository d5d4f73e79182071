import { z } from 'zod/v4';
import { LOCALNET_FILES } from '@shared/constants/paths.js';
import { FixtureTableSchema } from './fixture.js';

export const LocalnetConfigSchema = z.object({
  /** Directory for dumped program binaries, relative to the working directory */
  programsDir: z.string().min(1).default(LOCALNET_FILES.programsDir),
  /** Directory for account snapshots, relative to the working directory */
  accountsDir: z.string().min(1).default(LOCALNET_FILES.accountsDir),
  /**
   * Cluster passed to `solana -u`. Accepts a moniker (m, d, t, l) or an RPC URL.
   * Defaults to mainnet-beta, where the default fixtures live.
   */
  cluster: z.string().min(1).default('m'),
  /** Start the validator from a fresh ledger (`--reset`) */
  reset: z.boolean().default(true),
  solanaBinary: z.string().min(1).default('solana'),
  validatorBinary: z.string().min(1).default('solana-test-validator'),
  /** Replaces the built-in fixture table when present */
  fixtures: FixtureTableSchema.optional(),
});

export type LocalnetConfig = z.infer<typeof LocalnetConfigSchema>;
