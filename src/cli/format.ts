import type { Plan } from '../schema/index.js';

/** Human-readable plan listing for confirmation prompts. */
export function serializePlan(plan: Plan, task?: string): string {
  const lines: string[] = [];
  if (task !== undefined) lines.push(`🎯 Task: ${task}`);
  lines.push(`📝 Plan: ${String(plan.length)} steps`);
  plan.forEach((s, i) => {
    const flag = s.critical ? '' : ' (non-critical)';
    lines.push(`  ${String(i + 1)}. ${s.description || '(no description)'}${flag}`);
  });
  return lines.join('\n');
}
