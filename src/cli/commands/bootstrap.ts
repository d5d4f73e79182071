import type { Command } from 'commander';
import { createBootstrapRunner } from '@features/bootstrap/runner-factory.js';
import type { BootstrapDeps } from '@features/bootstrap/bootstrap-runner.js';
import { formatProvisionJson, formatProvisionSummary } from '@cli/formatters/provision-formatter.js';
import { formatPlanCommand, formatPlanJson } from '@cli/formatters/plan-formatter.js';
import { addDirectoryOptions, loadCommandConfig, readPassthroughArgs, withCommandContext } from '@cli/utils.js';
import { LocalnetError } from '@shared/lib/errors.js';
import { unwrap } from '@shared/lib/result.js';

/**
 * Register `localnet start` (the default command), `provision` and `plan`.
 *
 * `overrides` swaps runner dependencies, which lets tests drive the full
 * command with in-process stubs instead of the solana CLI.
 */
export function registerBootstrapCommands(program: Command, overrides: Partial<BootstrapDeps> = {}): void {
  addDirectoryOptions(
    program
      .command('start', { isDefault: true })
      .description('Provision fixtures and launch solana-test-validator with them preloaded')
      .argument('[validatorArgs...]', 'Arguments forwarded verbatim to solana-test-validator (use -- to forward anything)')
      .allowUnknownOption(),
  ).action(withCommandContext(async (ctx) => {
    const config = loadCommandConfig(ctx);
    const runner = createBootstrapRunner(config, { quiet: ctx.globalOpts.json, overrides });
    const report = unwrap(await runner.run('launch', readPassthroughArgs(ctx.cmd)));
    process.exitCode = report.exitCode ?? 0;
  }));

  addDirectoryOptions(
    program
      .command('provision')
      .description('Fetch any missing fixtures without starting the validator'),
  ).action(withCommandContext(async (ctx) => {
    const config = loadCommandConfig(ctx);
    const runner = createBootstrapRunner(config, { quiet: ctx.globalOpts.json, overrides });
    const report = unwrap(await runner.run('provision'));

    console.log(ctx.globalOpts.json
      ? formatProvisionJson(report.results)
      : formatProvisionSummary(report.results));
  }));

  addDirectoryOptions(
    program
      .command('plan')
      .description('Provision fixtures and print the validator command without running it')
      .argument('[validatorArgs...]', 'Arguments to append to the printed command')
      .allowUnknownOption(),
  ).action(withCommandContext(async (ctx) => {
    const config = loadCommandConfig(ctx);
    const runner = createBootstrapRunner(config, { quiet: ctx.globalOpts.json, overrides });
    const { plan } = unwrap(await runner.run('plan', readPassthroughArgs(ctx.cmd)));
    if (plan === undefined) {
      throw new LocalnetError('No launch plan was built');
    }

    console.log(ctx.globalOpts.json ? formatPlanJson(plan) : formatPlanCommand(plan));
  }));
}
