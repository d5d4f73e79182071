import type { ArtifactSpec, ProvisionResult } from '@domain/types/fixture.js';
import type { LaunchPlan } from '@domain/types/launch-plan.js';

/** User-facing narration of a bootstrap run (stdout in the CLI). */
export interface IProgressReporter {
  directoryCreated(dir: string): void;
  fetchStarted(spec: ArtifactSpec): void;
  fetchCompleted(result: ProvisionResult): void;
  cacheHit(result: ProvisionResult): void;
  launching(plan: LaunchPlan): void;
}

export const silentReporter: IProgressReporter = {
  directoryCreated: () => {},
  fetchStarted: () => {},
  fetchCompleted: () => {},
  cacheHit: () => {},
  launching: () => {},
};
