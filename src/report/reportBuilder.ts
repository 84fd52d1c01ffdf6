import type {
  ExecutionResult,
  RunReport,
  SkippedStep,
  TerminalRunState,
} from '../schema/index.js';
import { isSuccess } from '../schema/index.js';

// ── Options ──────────────────────────────────────────────────

export interface BuildReportOptions {
  runId?: string | undefined;
  state?: TerminalRunState | undefined;
  skipped?: readonly SkippedStep[] | undefined;
  generatedAt?: string | undefined;
}

const EPOCH = new Date(0).toISOString();

// ── Success rate ─────────────────────────────────────────────

export function computeSuccessRate(completed: number, total: number): number {
  return total > 0 ? completed / total : 0;
}

/** `0.5` → `"50.0%"`. */
export function formatSuccessRate(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

// ── Builder ──────────────────────────────────────────────────
// Pure: the same inputs always produce an equal report. The timestamp
// defaults to the last result's finish time rather than the wall clock.

export function buildReport(
  planLength: number,
  results: readonly ExecutionResult[],
  options: BuildReportOptions = {},
): RunReport {
  const completedSteps = results.filter((r) => isSuccess(r.outcome)).length;
  const successRate = computeSuccessRate(completedSteps, planLength);
  const skipped = options.skipped ?? [];
  const lastResult = results[results.length - 1];

  return {
    runId: options.runId ?? 'unassigned',
    state: options.state ?? inferState(planLength, results, skipped.length),
    totalSteps: planLength,
    completedSteps,
    successRate,
    successRateText: formatSuccessRate(successRate),
    results: [...results],
    skipped: [...skipped],
    generatedAt: options.generatedAt ?? lastResult?.finishedAt ?? EPOCH,
  };
}

function inferState(
  planLength: number,
  results: readonly ExecutionResult[],
  skippedCount: number,
): TerminalRunState {
  if (results.some((r) => r.outcome === 'cancelled')) return 'cancelled';
  return results.length + skippedCount < planLength ? 'stopped' : 'completed';
}
