import type {
  LogLevel,
  MonitorEvent,
  Plan,
  RunReport,
  RunState,
} from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import type { EventBus } from '../events/eventBus.js';
import type { InstructionRunner } from '../runner/processRunner.js';
import { PlanExecutor } from './planExecutor.js';
import type { ExecutionHooks, PlanExecutorOptions } from './planExecutor.js';

// ── Observed executor ────────────────────────────────────────

/**
 * PlanExecutor with every lifecycle transition published on an EventBus.
 * The returned reports are exactly those of the inner executor.
 */
export class ObservedPlanExecutor {
  private readonly bus: EventBus;
  private readonly clock: () => Date;
  private readonly inner: PlanExecutor;

  constructor(
    runner: InstructionRunner,
    bus: EventBus,
    options: Omit<PlanExecutorOptions, 'hooks'> = {},
  ) {
    this.bus = bus;
    this.clock = options.clock ?? (() => new Date());
    this.inner = new PlanExecutor(runner, { ...options, hooks: this.createHooks() });
  }

  get state(): RunState {
    return this.inner.state;
  }

  get runId(): string | null {
    return this.inner.runId;
  }

  setPlan(plan: Plan, task?: string): string {
    return this.inner.setPlan(plan, task);
  }

  run(plan?: Plan, task?: string): Promise<RunReport> {
    return this.inner.run(plan, task);
  }

  cancel(): boolean {
    return this.inner.cancel();
  }

  /** Publish a free-form log line attributed to the current run. */
  log(level: LogLevel, message: string, details?: Record<string, unknown>): void {
    this.emitLog(this.inner.runId ?? 'none', level, message, details);
  }

  // ── Hook wiring ────────────────────────────────────────────

  private createHooks(): ExecutionHooks {
    return {
      onPlanSet: ({ runId, task, plan }) => {
        this.emit({
          type: 'plan_set',
          runId,
          timestamp: this.now(),
          data: {
            ...(task !== undefined ? { task } : {}),
            totalSteps: plan.length,
            steps: plan.map((s, index) => ({
              index,
              description: s.description,
              critical: s.critical,
            })),
          },
        });
        this.emitLog(runId, 'info', `📋 Plan received: ${String(plan.length)} steps`);
        plan.forEach((s, i) => {
          this.emitLog(runId, 'info', `  ${String(i + 1)}. ${s.description || 'Step'}`);
        });
      },

      onStepStarted: ({ runId, index, total, step }) => {
        this.emit({
          type: 'step_started',
          runId,
          timestamp: this.now(),
          data: { index, total, description: step.description },
        });
        this.emitLog(
          runId,
          'info',
          `📍 Step ${String(index + 1)}/${String(total)}: ${step.description}`,
          { instruction_preview: preview(step.instruction) },
        );
      },

      onStepCompleted: ({ runId, index, result }) => {
        this.emit({
          type: 'step_completed',
          runId,
          timestamp: this.now(),
          data: {
            index,
            outcome: result.outcome,
            exitCode: result.exitCode,
            durationMs: result.durationMs,
          },
        });
        const seconds = `${(result.durationMs / 1000).toFixed(2)}s`;
        if (result.outcome === 'success') {
          this.emitLog(runId, 'success', '✅ Agent completed task', { execution_time: seconds });
        } else {
          this.emitLog(runId, 'error', `❌ Agent step ended with ${result.outcome}`, {
            execution_time: seconds,
            error: preview(result.error ?? (result.stderr || 'Unknown error')),
          });
        }
      },

      onStepSkipped: ({ runId, index, reason }) => {
        this.emitLog(runId, 'warning', `⚠️ Step ${String(index + 1)} skipped: ${reason}`);
      },

      onRunCompleted: ({ runId, report }) => {
        this.emit({
          type: 'run_completed',
          runId,
          timestamp: this.now(),
          data: {
            state: report.state,
            totalSteps: report.totalSteps,
            completedSteps: report.completedSteps,
            successRate: report.successRateText,
          },
        });
        if (report.state === 'stopped') {
          this.emitLog(runId, 'error', '🛑 Critical step failed, stopping execution');
        }
        this.emitLog(
          runId,
          report.state === 'completed' ? 'success' : 'warning',
          `📊 Execution ${report.state}: ${report.successRateText}`,
        );
      },
    };
  }

  private emit(event: MonitorEvent): void {
    this.bus.publish(event);
  }

  private emitLog(
    runId: string,
    level: LogLevel,
    message: string,
    details?: Record<string, unknown>,
  ): void {
    this.emit({
      type: 'log',
      runId,
      timestamp: this.now(),
      data: { level, message, ...(details !== undefined ? { details } : {}) },
    });
  }

  private now(): string {
    return this.clock().toISOString();
  }
}

// ── Helpers ──────────────────────────────────────────────────

function preview(text: string): string {
  return text.length > LIMITS.PREVIEW_CHARS
    ? `${text.slice(0, LIMITS.PREVIEW_CHARS)}...`
    : text;
}
