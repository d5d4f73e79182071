import type { ProvisionResult } from '@domain/types/fixture.js';
import { BINDING_FLAGS, type LaunchBinding, type LaunchPlan } from '@domain/types/launch-plan.js';

export interface LaunchPlanOptions {
  validatorBinary: string;
  /** Adds `--reset` so every run starts from a fresh ledger */
  reset: boolean;
}

/**
 * Accumulates typed bindings and flattens them into a token list only in build().
 *
 * Program bindings precede account bindings; each group keeps the order in
 * which results were bound. Passthrough tokens always come last, untouched.
 */
export class LaunchPlanBuilder {
  private readonly bindings: LaunchBinding[] = [];
  private readonly passthrough: string[] = [];

  constructor(
    private readonly command: string,
    private readonly baseArgs: readonly string[] = [],
  ) {}

  bind(result: ProvisionResult): this {
    this.bindings.push({
      flag: BINDING_FLAGS[result.spec.method],
      identity: result.spec.identity,
      path: result.path,
    });
    return this;
  }

  append(tokens: readonly string[]): this {
    this.passthrough.push(...tokens);
    return this;
  }

  build(): LaunchPlan {
    const ordered = [
      ...this.bindings.filter((b) => b.flag === '--bpf-program'),
      ...this.bindings.filter((b) => b.flag === '--account'),
    ];
    const args = [
      ...this.baseArgs,
      ...ordered.flatMap((b) => [b.flag, b.identity, b.path]),
      ...this.passthrough,
    ];
    return {
      command: this.command,
      args: Object.freeze(args),
      bindings: Object.freeze(ordered),
      passthrough: Object.freeze([...this.passthrough]),
    };
  }
}

export function buildLaunchPlan(
  results: readonly ProvisionResult[],
  passthrough: readonly string[],
  options: LaunchPlanOptions,
): LaunchPlan {
  const builder = new LaunchPlanBuilder(options.validatorBinary, options.reset ? ['--reset'] : []);
  for (const result of results) builder.bind(result);
  return builder.append(passthrough).build();
}
