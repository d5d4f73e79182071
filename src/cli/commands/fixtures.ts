import type { Command } from 'commander';
import { resolveArtifactSpecs } from '@domain/services/artifact-resolver.js';
import { isArtifactPresent } from '@domain/services/fixture-provisioner.js';
import { NodeFixtureFilesystem } from '@infra/filesystem/node-fixture-filesystem.js';
import { formatFixtureTable, formatFixturesJson } from '@cli/formatters/provision-formatter.js';
import { addDirectoryOptions, loadCommandConfig, withCommandContext } from '@cli/utils.js';

/**
 * Register `localnet fixtures`, which lists the effective fixture table and what is on disk.
 */
export function registerFixturesCommand(program: Command): void {
  addDirectoryOptions(
    program
      .command('fixtures')
      .alias('ls')
      .description('List declared fixtures and whether each is already on disk (alias: ls)'),
  ).action(withCommandContext((ctx) => {
    const config = loadCommandConfig(ctx);
    const filesystem = new NodeFixtureFilesystem();
    const rows = resolveArtifactSpecs(config.fixtureTable, config).map((spec) => ({
      spec,
      present: isArtifactPresent(spec.targetPath, filesystem),
    }));

    console.log(ctx.globalOpts.json ? formatFixturesJson(rows) : formatFixtureTable(rows));
  }));
}
