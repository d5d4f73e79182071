import type { FetchMethod } from './fixture.js';

export type BindingFlag = '--bpf-program' | '--account';

export const BINDING_FLAGS: Record<FetchMethod, BindingFlag> = {
  'program-dump': '--bpf-program',
  'account-snapshot': '--account',
};

export interface LaunchBinding {
  readonly flag: BindingFlag;
  readonly identity: string;
  readonly path: string;
}

/**
 * Validator invocation for one run. `args` is the flattened token list:
 * base flags, program bindings, account bindings, then passthrough tokens.
 */
export interface LaunchPlan {
  readonly command: string;
  readonly args: readonly string[];
  readonly bindings: readonly LaunchBinding[];
  readonly passthrough: readonly string[];
}
