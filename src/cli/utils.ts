import { resolve } from 'node:path';
import { Command } from 'commander';
import { verifyWorkingDirectory } from '@features/bootstrap/preflight.js';
import { loadLocalnetConfig, type ConfigOverrides, type ResolvedConfig } from '@infra/config/config-loader.js';
import { LocalnetError, describeError } from '@shared/lib/errors.js';
import { unwrap } from '@shared/lib/result.js';

/**
 * Resolve the localnet working directory from a given cwd (or process.cwd()).
 * Throws WrongDirectoryError if localnet.config.json is not there.
 */
export function resolveWorkspaceDir(cwd?: string): string {
  return unwrap(verifyWorkingDirectory(resolve(cwd ?? process.cwd())));
}

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  cwd?: string;
}

export interface CommandContext {
  globalOpts: GlobalOptions;
  /** Absolute working directory; empty when the command runs without one */
  workspaceDir: string;
  cmd: Command;
}

type CommandHandler = (ctx: CommandContext) => void | Promise<void>;

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Extract global CLI options from a Commander command.
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals();
  return { json: !!opts['json'], verbose: !!opts['verbose'], cwd: stringOption(opts['cwd']) };
}

/**
 * Attach the --programs-dir / --accounts-dir overrides to a command.
 */
export function addDirectoryOptions(cmd: Command): Command {
  return cmd
    .option('--programs-dir <dir>', 'Directory for program binaries (env: PROGRAMS_DIR, default: ./programs)')
    .option('--accounts-dir <dir>', 'Directory for account snapshots (env: ACCOUNTS_DIR, default: ./accounts)');
}

export function readDirectoryOverrides(cmd: Command): ConfigOverrides {
  const opts = cmd.opts();
  return {
    programsDir: stringOption(opts['programsDir']),
    accountsDir: stringOption(opts['accountsDir']),
  };
}

function rootArgv(cmd: Command): string[] {
  let root = cmd;
  while (root.parent) root = root.parent;
  // Commander records the argv it parsed on the root command but does not type it
  const raw: unknown = Reflect.get(root, 'rawArgs');
  return Array.isArray(raw) ? raw.filter((token): token is string => typeof token === 'string') : [];
}

function countSeparators(tokens: readonly string[]): number {
  return tokens.filter((token) => token === '--').length;
}

/**
 * Tokens to forward to the validator.
 *
 * Commander consumes a `--` typed before any unknown option but keeps it in
 * `cmd.args` when an unknown option came first. When every typed separator
 * survived, the first one is localnet's and is dropped; later ones are forwarded.
 */
export function readPassthroughArgs(cmd: Command): string[] {
  const args = [...cmd.args];
  const typed = countSeparators(rootArgv(cmd));
  if (typed > 0 && countSeparators(args) === typed) {
    args.splice(args.indexOf('--'), 1);
  }
  return args;
}

/**
 * Capture the run's configuration once: config file, environment, then flags.
 */
export function loadCommandConfig(ctx: CommandContext): ResolvedConfig {
  return loadLocalnetConfig(ctx.workspaceDir, {
    env: process.env,
    overrides: readDirectoryOverrides(ctx.cmd),
  });
}

/**
 * Wrap a CLI command handler with standard boilerplate:
 * resolves the working directory, extracts global options, catches errors.
 *
 * Commander's .action() callback receives (...positionalArgs, localOpts, cmd);
 * handlers read positional arguments from `ctx.cmd.args`.
 */
export function withCommandContext(
  handler: CommandHandler,
  options?: { needsWorkspace?: boolean },
): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const cmd = args[args.length - 1];
    if (!(cmd instanceof Command)) {
      throw new LocalnetError('withCommandContext must wrap a Commander action handler');
    }
    const globalOpts = getGlobalOptions(cmd);

    try {
      const workspaceDir = options?.needsWorkspace === false
        ? ''
        : resolveWorkspaceDir(globalOpts.cwd);
      await handler({ globalOpts, workspaceDir, cmd });
    } catch (error) {
      handleCommandError(error, globalOpts.verbose);
    }
  };
}

/**
 * Centralized error handler for CLI commands.
 * Prints the error message, and the stack trace and cause if verbose is enabled.
 */
export function handleCommandError(error: unknown, verbose: boolean): void {
  console.error(`Error: ${describeError(error)}`);
  if (verbose && error instanceof Error) {
    if (error.stack) console.error(error.stack);
    if (error.cause !== undefined) console.error(`Caused by: ${describeError(error.cause)}`);
  }
  process.exitCode = 1;
}
