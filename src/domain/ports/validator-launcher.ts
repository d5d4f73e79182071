import type { LaunchPlan } from '@domain/types/launch-plan.js';

/**
 * Port for running the validator.
 *
 * `launch` calls `onSpawn` once the child is running and resolves with the
 * exit code this tool should mirror. It rejects with a LaunchError when the
 * process cannot be started.
 */
export interface IValidatorLauncher {
  launch(plan: LaunchPlan, onSpawn?: () => void): Promise<number>;
}
