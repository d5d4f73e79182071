import { join, resolve } from 'node:path';
import type { Command } from 'commander';
import { writeDefaultConfig } from '@infra/config/config-loader.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import { LOCALNET_FILES } from '@shared/constants/paths.js';
import { LocalnetError } from '@shared/lib/errors.js';
import { withCommandContext } from '@cli/utils.js';

/**
 * Register `localnet init`, which marks the current directory as a localnet working directory.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description(`Write a default ${LOCALNET_FILES.config} into the working directory`)
    .option('--force', 'Overwrite an existing config file')
    .action(withCommandContext((ctx) => {
      const dir = resolve(ctx.globalOpts.cwd ?? process.cwd());
      const existing = join(dir, LOCALNET_FILES.config);
      if (JsonStore.exists(existing) && !ctx.cmd.opts()['force']) {
        throw new LocalnetError(`${existing} already exists. Use --force to overwrite it.`);
      }

      const path = writeDefaultConfig(dir);
      console.log(ctx.globalOpts.json
        ? JSON.stringify({ path }, null, 2)
        : `Created ${path}\nNext: run "localnet start" from ${dir}`);
    }, { needsWorkspace: false }));
}
