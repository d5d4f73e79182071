import { spawn, type SpawnOptions } from 'node:child_process';
import { constants } from 'node:os';
import type { LaunchPlan } from '@domain/types/launch-plan.js';
import type { IValidatorLauncher } from '@domain/ports/validator-launcher.js';
import { LaunchError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

/** The slice of ChildProcess the launcher relies on. */
export interface ValidatorProcess {
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ValidatorProcess;

/** Where interrupt signals arrive; `process` outside of tests. */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/**
 * Exit code to mirror for a finished child: its own code, or 128 + signal
 * number when it was killed by a signal (the shell convention).
 */
export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  return 1;
}

/**
 * Runs the validator in the foreground.
 *
 * Node cannot replace its own process image, so the child inherits stdio and
 * the launcher forwards interrupt signals to it until it exits. The resolved
 * number is the exit code the caller should exit with.
 */
export class ValidatorLauncher implements IValidatorLauncher {
  private _spawn: SpawnFn;
  private _signals: SignalSource;
  private _sharesTerminal: boolean;

  constructor() {
    this._spawn = (command, args, options) => spawn(command, args, options);
    this._signals = process;
    this._sharesTerminal = process.stdin.isTTY === true;
  }

  /** Replace the spawn function (for testing). */
  setSpawnFunction(fn: SpawnFn): void {
    this._spawn = fn;
  }

  /** Replace the signal source (for testing). */
  setSignalSource(source: SignalSource): void {
    this._signals = source;
  }

  /**
   * Whether the child runs in this terminal's foreground process group.
   * Ctrl-C already delivers SIGINT to the child there, so it is not sent twice.
   */
  setSharesTerminal(value: boolean): void {
    this._sharesTerminal = value;
  }

  launch(plan: LaunchPlan, onSpawn?: () => void): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      let child: ValidatorProcess;
      try {
        child = this._spawn(plan.command, plan.args, { stdio: 'inherit' });
      } catch (error) {
        reject(new LaunchError(plan.command, error instanceof Error ? error.message : String(error), error));
        return;
      }

      const sharesTerminal = this._sharesTerminal;
      const forwarders = FORWARDED_SIGNALS.map((signal) => {
        // Every signal keeps a listener so this process outlives the child
        const forward = () => {
          if (signal === 'SIGINT' && sharesTerminal) {
            logger.debug('validator received SIGINT from the terminal', { signal });
            return;
          }
          logger.debug('forwarding signal to validator', { signal });
          child.kill(signal);
        };
        this._signals.on(signal, forward);
        return { signal, forward };
      });
      const detach = () => {
        for (const { signal, forward } of forwarders) this._signals.off(signal, forward);
      };

      child.once('spawn', () => {
        logger.debug('validator started', { command: plan.command });
        onSpawn?.();
      });
      child.once('error', (error) => {
        detach();
        reject(new LaunchError(plan.command, error.message, error));
      });
      child.once('exit', (code, signal) => {
        detach();
        const exitCode = exitCodeFor(code, signal);
        logger.debug('validator exited', { code, signal, exitCode });
        resolve(exitCode);
      });
    });
  }
}
