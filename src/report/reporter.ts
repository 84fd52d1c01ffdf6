import type {
  ExecutionResult,
  Plan,
  RunReport,
  SkippedStep,
  StepOutcome,
} from '../schema/index.js';
import { isSuccess } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type {
  JsonOutput,
  JsonOutputSkipped,
  JsonOutputStep,
} from '../schema/jsonOutput.js';
import { EXIT_CODES } from '../core/errors.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputStep, JsonOutputSkipped };

// ── Exit code ────────────────────────────────────────────────

export function exitCodeFor(report: RunReport): number {
  if (report.state === 'failed') return EXIT_CODES.RESOURCE;
  return report.state === 'completed' && report.results.every((r) => isSuccess(r.outcome))
    ? EXIT_CODES.OK
    : EXIT_CODES.STEP_FAILED;
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(
  report: RunReport,
  plan: Plan,
  exitCode: number,
): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    summary: {
      run_id: report.runId,
      state: report.state,
      total_steps: report.totalSteps,
      completed_steps: report.completedSteps,
      success_rate: report.successRateText,
      generated_at: report.generatedAt,
    },
    steps: report.results.map((r) => stepToJSON(r, plan)),
    skipped: report.skipped.map(skippedToJSON),
    exitCode,
  };
}

function stepToJSON(r: ExecutionResult, plan: Plan): JsonOutputStep {
  return {
    step: r.stepIndex + 1,
    description: plan[r.stepIndex]?.description ?? '',
    instruction: r.instruction,
    result: {
      outcome: r.outcome,
      success: isSuccess(r.outcome),
      exit_code: r.exitCode,
      signal: r.signal,
      stdout: r.stdout,
      stderr: r.stderr,
      started_at: r.startedAt,
      finished_at: r.finishedAt,
      duration_ms: r.durationMs,
      error: r.error ?? null,
    },
  };
}

function skippedToJSON(s: SkippedStep): JsonOutputSkipped {
  return {
    step: s.stepIndex + 1,
    description: s.description,
    reason: s.reason,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  const entries: Array<[string, unknown]> = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [k, v] of entries) {
    sorted[k] = v;
  }
  return sorted;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(
  report: RunReport,
  plan: Plan,
  task?: string,
): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# steprelay Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  if (task !== undefined) lines.push(`| **Task** | ${escapeMarkdownCell(task)} |`);
  lines.push(`| **Run ID** | \`${report.runId}\` |`);
  lines.push(`| **State** | ${report.state} |`);
  lines.push(`| **Completed** | ${String(report.completedSteps)}/${String(report.totalSteps)} |`);
  lines.push(`| **Success rate** | ${report.successRateText} |`);
  lines.push(`| **Generated** | ${report.generatedAt} |`);
  lines.push('');

  // Step summary table
  lines.push(`## Steps`);
  lines.push('');
  lines.push(`| # | Description | Critical | Outcome | Exit | Duration |`);
  lines.push(`|---|-------------|----------|---------|------|----------|`);

  plan.forEach((step, index) => {
    const result = report.results.find((r) => r.stepIndex === index);
    const skipped = report.skipped.find((s) => s.stepIndex === index);
    const outcome = result
      ? `${result.outcome} ${outcomeIcon(result.outcome)}`
      : skipped
        ? 'skipped'
        : 'not attempted';
    lines.push(
      `| ${String(index + 1)} | ${escapeMarkdownCell(step.description)} | ${step.critical ? 'yes' : 'no'} | ${outcome} | ${result?.exitCode != null ? String(result.exitCode) : '-'} | ${result ? formatDuration(result.durationMs) : '-'} |`,
    );
  });

  lines.push('');

  // Per-step details for anything that went wrong
  const problems = report.results.filter((r) => !isSuccess(r.outcome));
  if (problems.length > 0) {
    lines.push(`## Failures`);
    lines.push('');

    for (const r of problems) {
      lines.push(`### Step ${String(r.stepIndex + 1)}: ${plan[r.stepIndex]?.description ?? ''}`);
      lines.push('');
      if (r.error !== undefined) {
        lines.push(`**Error:** ${r.error}`);
        lines.push('');
      }
      const stderr = (r.stderr ?? '').trim();
      if (stderr.length > 0) {
        lines.push('```');
        lines.push(stderr);
        lines.push('```');
        lines.push('');
      }
    }
  }

  if (report.skipped.length > 0) {
    lines.push(`## Skipped`);
    lines.push('');
    for (const s of report.skipped) {
      lines.push(`- Step ${String(s.stepIndex + 1)} (${s.description || 'no description'}): ${s.reason}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function outcomeIcon(outcome: StepOutcome): string {
  switch (outcome) {
    case 'success':
      return '[OK]';
    case 'failure':
      return '[FAIL]';
    case 'timeout':
      return '[TIMEOUT]';
    case 'spawn_error':
      return '[SPAWN]';
    case 'cancelled':
      return '[CANCELLED]';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
