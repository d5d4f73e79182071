import { Command } from 'commander';
import { setLoggerOptions } from '@shared/lib/logger.js';
import type { BootstrapDeps } from '@features/bootstrap/bootstrap-runner.js';
import { registerBootstrapCommands } from './commands/bootstrap.js';
import { registerFixturesCommand } from './commands/fixtures.js';
import { registerInitCommand } from './commands/init.js';

const VERSION = '0.1.0';

export function createProgram(overrides: Partial<BootstrapDeps> = {}): Command {
  const program = new Command();

  program
    .name('localnet')
    .description('Provision program and account fixtures, then launch solana-test-validator with them preloaded')
    .version(VERSION)
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Enable verbose logging')
    .option('--cwd <path>', 'Set working directory');

  // Wire --verbose / --json to logger before any command runs
  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals();
    setLoggerOptions({ level: opts['verbose'] ? 'debug' : 'info', json: !!opts['json'] });
  });

  registerInitCommand(program);
  registerBootstrapCommands(program, overrides);
  registerFixturesCommand(program);

  return program;
}
