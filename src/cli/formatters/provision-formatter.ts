import type { ArtifactSpec, ProvisionResult } from '@domain/types/fixture.js';

export interface FixtureStatusRow {
  spec: ArtifactSpec;
  present: boolean;
}

const METHOD_LABELS: Record<ArtifactSpec['method'], string> = {
  'program-dump': 'program',
  'account-snapshot': 'account',
};

/**
 * Format provisioning results as a short human-readable summary.
 */
export function formatProvisionSummary(results: readonly ProvisionResult[]): string {
  const fetched = results.filter((r) => r.status === 'fetched').length;
  const cached = results.length - fetched;
  const lines = [`Provisioned ${results.length} fixture(s): ${fetched} fetched, ${cached} cached`];

  for (const result of results) {
    lines.push(`  ${result.status.padEnd(8)}${result.spec.label}`);
    lines.push(`          ${result.path}`);
  }
  return lines.join('\n');
}

export function formatProvisionJson(results: readonly ProvisionResult[]): string {
  return JSON.stringify(
    results.map((r) => ({
      identity: r.spec.identity,
      method: r.spec.method,
      path: r.path,
      status: r.status,
    })),
    null,
    2,
  );
}

/**
 * Format the effective fixture table with on-disk status.
 */
export function formatFixtureTable(rows: readonly FixtureStatusRow[]): string {
  if (rows.length === 0) return 'No fixtures declared.';

  const lines: string[] = [];
  for (const { spec, present } of rows) {
    const icon = present ? '+' : '-';
    lines.push(`  ${icon} [${METHOD_LABELS[spec.method]}] ${spec.label}`);
    lines.push(`    ${spec.identity} -> ${spec.targetPath}`);
  }
  const missing = rows.filter((r) => !r.present).length;
  lines.push('');
  lines.push(missing === 0 ? 'All fixtures present.' : `${missing} fixture(s) missing; run "localnet provision" to fetch them.`);
  return lines.join('\n');
}

export function formatFixturesJson(rows: readonly FixtureStatusRow[]): string {
  return JSON.stringify(
    rows.map(({ spec, present }) => ({
      identity: spec.identity,
      label: spec.label,
      method: spec.method,
      path: spec.targetPath,
      present,
    })),
    null,
    2,
  );
}
