import { z } from 'zod/v4';

/** How an artifact is materialized from the remote cluster. */
export const FetchMethodSchema = z.enum(['program-dump', 'account-snapshot']);

export type FetchMethod = z.infer<typeof FetchMethodSchema>;

const BASE58_ADDRESS = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;

export const FixtureEntrySchema = z.object({
  /** On-chain address the artifact is fetched from and bound to at launch */
  identity: z.string().regex(BASE58_ADDRESS, 'must be a base58 address'),
  /** File name inside the programs or accounts directory */
  fileName: z
    .string()
    .min(1)
    .refine((name) => !/[\\/]/.test(name) && name !== '.' && name !== '..', {
      message: 'must be a plain file name without path separators',
    }),
  method: FetchMethodSchema,
  /** Used in progress output; falls back to the identity */
  label: z.string().min(1).optional(),
});

export type FixtureEntry = z.infer<typeof FixtureEntrySchema>;

export const FixtureTableSchema = z
  .array(FixtureEntrySchema)
  .min(1)
  .refine(
    (entries) => new Set(entries.map((e) => `${e.method}:${e.fileName}`)).size === entries.length,
    { message: 'two fixtures of the same kind share a file name' },
  );

export type FixtureTable = z.infer<typeof FixtureTableSchema>;

/** A fixture resolved against the configured directories. */
export interface ArtifactSpec {
  readonly identity: string;
  readonly label: string;
  readonly method: FetchMethod;
  readonly targetDir: string;
  readonly targetPath: string;
}

export type ProvisionStatus = 'fetched' | 'cached';

/** Produced only once the target file is on disk inside a writable directory. */
export interface ProvisionResult {
  readonly spec: ArtifactSpec;
  readonly path: string;
  readonly status: ProvisionStatus;
}
