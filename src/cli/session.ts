import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createInterface } from 'node:readline/promises';

import type { Command } from 'commander';
import { z } from 'zod';

import type { FileConfig, Plan, RunReport } from '../schema/index.js';
import {
  CONFIG_FILE,
  REPORT_DIR,
  TIMEOUTS,
  loadConfigFile,
  resolveRunnerConfig,
} from '../config/index.js';
import { ProcessRunner } from '../runner/processRunner.js';
import { PlanExecutor } from '../core/planExecutor.js';
import { ObservedPlanExecutor } from '../core/observedExecutor.js';
import {
  ConfigError,
  EXIT_CODES,
  ResourceExhaustionError,
  errorMessage,
} from '../core/errors.js';
import { EventBus } from '../events/eventBus.js';
import { startMonitorServer } from '../monitor/server.js';
import { exitCodeFor, generateJSON, generateMarkdown, serializeJSON } from '../report/reporter.js';
import * as log from '../utils/logger.js';

// ── Shared CLI options ───────────────────────────────────────

export interface SessionOptions {
  config: string;
  cwd?: string;
  timeout?: string;
  stepPause?: string;
  json?: true;
  reportPath?: string;
  monitor?: true;
  port?: string;
  hold?: true;
  yes?: true;
}

type Executor = Pick<PlanExecutor, 'run' | 'cancel'>;

// ── Shared option set ────────────────────────────────────────

export function withSessionOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to config file', CONFIG_FILE)
    .option('--cwd <dir>', 'Working directory for the agent')
    .option('--timeout <seconds>', 'Per-step timeout in seconds')
    .option('--step-pause <seconds>', 'Pause between steps in seconds')
    .option('--json', 'Output JSON report to stdout')
    .option('--report-path <dir>', 'Directory for report artifacts')
    .option('--monitor', 'Serve live progress over WebSocket')
    .option('--port <n>', 'Monitor port')
    .option('--hold', 'Keep the monitor open after the run until Ctrl+C');
}

// ── Config resolution ────────────────────────────────────────

export async function loadSessionConfig(opts: SessionOptions): Promise<FileConfig> {
  // The default config file is optional; an explicitly named one is not.
  return loadConfigFile(opts.config, opts.config === CONFIG_FILE);
}

export function createRunner(fileConfig: FileConfig, opts: SessionOptions): ProcessRunner {
  return new ProcessRunner(
    resolveRunnerConfig(fileConfig, {
      workingDir: opts.cwd,
      timeoutSeconds: parseFlag('--timeout', opts.timeout, FLAG_SCHEMAS.seconds),
    }),
  );
}

// ── Numeric flags ────────────────────────────────────────────

export const FLAG_SCHEMAS = {
  seconds: z.coerce.number().finite().positive(),
  pauseSeconds: z.coerce.number().finite().nonnegative(),
  port: z.coerce.number().int().min(0).max(65535),
  count: z.coerce.number().int().positive(),
} as const;

/** Parse a numeric flag; absent stays undefined, malformed is a usage error. */
export function parseFlag(
  flag: string,
  value: string | undefined,
  schema: z.ZodNumber,
): number | undefined {
  if (value === undefined) return undefined;
  const result = schema.safeParse(value.trim() === '' ? Number.NaN : value);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigError(`Invalid ${flag} value "${value}": ${reason}`);
  }
  return result.data;
}

// ── Confirmation ─────────────────────────────────────────────

export async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase() === 'y';
  } finally {
    rl.close();
  }
}

// ── Stderr summary ───────────────────────────────────────────

export function printSummary(report: RunReport, reportDir?: string): void {
  process.stderr.write(`\n--- steprelay Result ---\n`);
  process.stderr.write(`State:     ${report.state}\n`);
  process.stderr.write(
    `Completed: ${String(report.completedSteps)}/${String(report.totalSteps)}\n`,
  );
  process.stderr.write(`Success:   ${report.successRateText}\n`);
  if (report.skipped.length > 0) {
    process.stderr.write(`Skipped:   ${String(report.skipped.length)}\n`);
  }
  if (reportDir !== undefined) {
    process.stderr.write(`Report:    ${reportDir}\n`);
  }
  process.stderr.write(`Run ID:    ${report.runId}\n\n`);
}

// ── Report persistence (best effort) ─────────────────────────

async function writeReports(
  report: RunReport,
  plan: Plan,
  task: string | undefined,
  baseDir: string,
): Promise<string | undefined> {
  const outputDir = path.resolve(baseDir, report.runId);
  try {
    await mkdir(outputDir, { recursive: true });
    const json = generateJSON(report, plan, exitCodeFor(report));
    await writeFile(path.join(outputDir, 'summary.json'), serializeJSON(json) + '\n', 'utf-8');
    await writeFile(path.join(outputDir, 'report.md'), generateMarkdown(report, plan, task), 'utf-8');
    return outputDir;
  } catch (err) {
    log.warn(`Could not write report: ${errorMessage(err)}`);
    return undefined;
  }
}

// ── Session ──────────────────────────────────────────────────

/**
 * Run one plan end to end: executor (observed when --monitor is set),
 * Ctrl+C cancellation, report files, stdout JSON, exit code.
 */
export async function executeSession(
  plan: Plan,
  task: string | undefined,
  opts: SessionOptions,
  fileConfig: FileConfig,
): Promise<void> {
  const runner = createRunner(fileConfig, opts);
  const stepPauseSec =
    parseFlag('--step-pause', opts.stepPause, FLAG_SCHEMAS.pauseSeconds) ?? fileConfig.stepPause;
  const stepPauseMs = stepPauseSec !== undefined ? stepPauseSec * 1000 : TIMEOUTS.STEP_PAUSE;

  let executor: Executor;
  let closeMonitor: (() => Promise<void>) | undefined;

  if (opts.monitor) {
    const bus = new EventBus({
      historySize: fileConfig.monitor.historySize,
      queueSize: fileConfig.monitor.queueSize,
    });
    const server = await startMonitorServer(bus, {
      host: fileConfig.monitor.host,
      port: parseFlag('--port', opts.port, FLAG_SCHEMAS.port) ?? fileConfig.monitor.port,
    });
    closeMonitor = () => server.close();
    executor = new ObservedPlanExecutor(runner, bus, { stepPauseMs });
  } else {
    executor = new PlanExecutor(runner, { stepPauseMs });
  }

  const onSigint = (): void => {
    executor.cancel();
  };
  process.on('SIGINT', onSigint);

  log.section(task ?? `Plan (${String(plan.length)} steps) in ${runner.workingDir}`);

  let report: RunReport;
  try {
    report = await executor.run(plan, task);
  } catch (err) {
    if (err instanceof ResourceExhaustionError) {
      log.error(err.message);
      if (err.report !== undefined) printSummary(err.report);
      process.exitCode = err.exitCode;
      await closeMonitor?.();
      return;
    }
    throw err;
  } finally {
    process.off('SIGINT', onSigint);
  }

  const reportDir = await writeReports(
    report,
    plan,
    task,
    opts.reportPath ?? fileConfig.reportPath ?? REPORT_DIR,
  );

  const exitCode = exitCodeFor(report);
  if (opts.json) {
    process.stdout.write(serializeJSON(generateJSON(report, plan, exitCode)) + '\n');
  }
  printSummary(report, reportDir);
  process.exitCode = exitCode;

  if (closeMonitor !== undefined) {
    if (opts.hold) {
      log.monitor('Holding monitor open, press Ctrl+C to exit');
      await new Promise<void>((resolve) => process.once('SIGINT', () => resolve()));
    }
    await closeMonitor();
  }
}

export function failWith(prefix: string, err: unknown): void {
  process.stderr.write(`${prefix}: ${errorMessage(err)}\n`);
  process.exitCode =
    typeof err === 'object' && err !== null && 'exitCode' in err && typeof err.exitCode === 'number'
      ? err.exitCode
      : EXIT_CODES.CONFIG;
}
