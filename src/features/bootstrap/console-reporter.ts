import { relative } from 'node:path';
import type { ArtifactSpec, ProvisionResult } from '@domain/types/fixture.js';
import type { LaunchPlan } from '@domain/types/launch-plan.js';
import type { IProgressReporter } from '@domain/ports/progress-reporter.js';
import { colorEnabled, createPalette, type Palette } from '@shared/lib/ansi.js';

export interface ConsoleReporterOptions {
  /** Paths are printed relative to this directory when it contains them. */
  baseDir?: string;
  write?: (line: string) => void;
  color?: boolean;
}

/**
 * Narrates provisioning and launch on stdout, one line per event.
 */
export class ConsoleReporter implements IProgressReporter {
  private readonly write: (line: string) => void;
  private readonly color: Palette;
  private readonly baseDir: string | undefined;

  constructor(options: ConsoleReporterOptions = {}) {
    this.write = options.write ?? ((line) => console.log(line));
    this.color = createPalette(options.color ?? colorEnabled(process.stdout));
    this.baseDir = options.baseDir;
  }

  private display(path: string): string {
    if (!this.baseDir) return path;
    const rel = relative(this.baseDir, path);
    return rel && !rel.startsWith('..') ? `./${rel}` : path;
  }

  directoryCreated(dir: string): void {
    this.write(`Created directory: ${this.display(dir)}`);
  }

  fetchStarted(spec: ArtifactSpec): void {
    this.write(`Downloading ${spec.label}...`);
  }

  fetchCompleted(result: ProvisionResult): void {
    this.write(`${this.color.green('Downloaded')} ${result.spec.label} to ${this.display(result.path)}`);
  }

  cacheHit(result: ProvisionResult): void {
    this.write(this.color.dim(`Using cached ${result.spec.label} at ${this.display(result.path)}`));
  }

  launching(plan: LaunchPlan): void {
    this.write(this.color.bold(`Starting ${plan.command}...`));
  }
}
