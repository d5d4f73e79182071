import type { LaunchPlan } from '@domain/types/launch-plan.js';

const SAFE_TOKEN = /^[A-Za-z0-9_\-./:=@,+]+$/;

/** Quote a token for POSIX shells; safe tokens are left as they are. */
export function quoteShellArg(token: string): string {
  if (SAFE_TOKEN.test(token)) return token;
  return `'${token.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a launch plan as a copy-pasteable shell command, one binding per line.
 */
export function formatPlanCommand(plan: LaunchPlan): string {
  const baseCount = plan.args.length - plan.bindings.length * 3 - plan.passthrough.length;
  const head = [plan.command, ...plan.args.slice(0, baseCount)].map(quoteShellArg).join(' ');
  const lines = [
    head,
    ...plan.bindings.map((b) => `  ${[b.flag, b.identity, b.path].map(quoteShellArg).join(' ')}`),
  ];
  if (plan.passthrough.length > 0) {
    lines.push(`  ${plan.passthrough.map(quoteShellArg).join(' ')}`);
  }
  return lines.join(' \\\n');
}

export function formatPlanJson(plan: LaunchPlan): string {
  return JSON.stringify({ command: plan.command, args: plan.args }, null, 2);
}
