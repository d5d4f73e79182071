import type { LaunchPlan } from '@domain/types/launch-plan.js';
import type { ProvisionResult } from '@domain/types/fixture.js';
import type { IFixtureFilesystem } from '@domain/ports/fixture-filesystem.js';
import type { IArtifactFetcher } from '@domain/ports/artifact-fetcher.js';
import type { IProgressReporter } from '@domain/ports/progress-reporter.js';
import type { IValidatorLauncher } from '@domain/ports/validator-launcher.js';
import { resolveArtifactSpecs } from '@domain/services/artifact-resolver.js';
import { provisionFixtures } from '@domain/services/fixture-provisioner.js';
import { buildLaunchPlan } from '@domain/services/launch-plan-builder.js';
import type { ResolvedConfig } from '@infra/config/config-loader.js';
import { LaunchError, LocalnetError, describeError } from '@shared/lib/errors.js';
import { ok, err, type Result } from '@shared/lib/result.js';
import { logger } from '@shared/lib/logger.js';
import { checkDependencies } from './preflight.js';

export type BootstrapState =
  | 'not-started'
  | 'preflight'
  | 'preflight-failed'
  | 'provisioning'
  | 'provisioning-failed'
  | 'provisioned'
  | 'launching'
  | 'launch-failed'
  | 'launched';

/**
 * How far a run goes:
 * - 'provision': preflight + provisioning
 * - 'plan': also builds the launch plan
 * - 'launch': also runs the validator
 */
export type BootstrapMode = 'provision' | 'plan' | 'launch';

export interface BootstrapDeps {
  filesystem: IFixtureFilesystem;
  fetcher: IArtifactFetcher;
  launcher: IValidatorLauncher;
  reporter: IProgressReporter;
  checkBinary: (binary: string) => Promise<boolean>;
}

export interface BootstrapReport {
  state: BootstrapState;
  results: ProvisionResult[];
  plan?: LaunchPlan;
  /** Validator exit code; set only in 'launch' mode */
  exitCode?: number;
}

/**
 * Drives one bootstrap run through
 * NotStarted → Preflight → Provisioning → Provisioned → Launching → Launched,
 * stopping in the matching *-failed state at the first error.
 *
 * Runners are single-use: build a new one per invocation.
 */
export class BootstrapRunner {
  private _state: BootstrapState = 'not-started';

  constructor(
    private readonly config: ResolvedConfig,
    private readonly deps: BootstrapDeps,
  ) {}

  get state(): BootstrapState {
    return this._state;
  }

  async run(mode: BootstrapMode, passthrough: readonly string[] = []): Promise<Result<BootstrapReport, LocalnetError>> {
    const initial = this._state;
    if (initial !== 'not-started') {
      throw new LocalnetError(`BootstrapRunner already used (state: ${initial})`);
    }

    this.transition('preflight');
    const required = mode === 'launch'
      ? [this.config.solanaBinary, this.config.validatorBinary]
      : [this.config.solanaBinary];
    const preflight = await checkDependencies(required, this.deps.checkBinary);
    if (!preflight.ok) return this.fail('preflight-failed', preflight.error);

    this.transition('provisioning');
    const specs = resolveArtifactSpecs(this.config.fixtureTable, this.config);
    const provisioned = await provisionFixtures(specs, this.deps);
    if (!provisioned.ok) return this.fail('provisioning-failed', provisioned.error);
    this.transition('provisioned');

    const results = provisioned.value;
    if (mode === 'provision') return ok({ state: this._state, results });

    const plan = buildLaunchPlan(results, passthrough, this.config);
    if (mode === 'plan') return ok({ state: this._state, results, plan });

    this.transition('launching');
    this.deps.reporter.launching(plan);
    try {
      const exitCode = await this.deps.launcher.launch(plan, () => this.transition('launched'));
      // A child that exits before its spawn event never reaches 'launched' through the callback
      if (this._state === 'launching') this.transition('launched');
      return ok({ state: this._state, results, plan, exitCode });
    } catch (error) {
      const launchError = error instanceof LaunchError
        ? error
        : new LaunchError(plan.command, describeError(error), error);
      return this.fail('launch-failed', launchError);
    }
  }

  private transition(next: BootstrapState): void {
    logger.debug('bootstrap state change', { from: this._state, to: next });
    this._state = next;
  }

  private fail<E extends LocalnetError>(state: BootstrapState, error: E): Result<never, E> {
    this.transition(state);
    return err(error);
  }
}
