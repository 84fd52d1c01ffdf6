import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import path from 'node:path';

import type { ExecutionResult, StepOutcome } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import { ResourceExhaustionError, errorMessage } from '../core/errors.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface ProcessRunnerConfig {
  command: string;
  args: readonly string[];
  workingDir: string;
  env?: Readonly<Record<string, string>> | undefined;
  timeoutMs?: number | undefined;
  killGraceMs?: number | undefined;
}

export interface ExecuteOptions {
  stepIndex?: number | undefined;
  signal?: AbortSignal | undefined;
}

/** Anything that can carry out one instruction and report how it ended. */
export interface InstructionRunner {
  execute(
    instruction: string,
    context?: string,
    options?: ExecuteOptions,
  ): Promise<ExecutionResult>;
}

export interface VerifyResult {
  ok: boolean;
  version?: string | undefined;
  error?: string | undefined;
}

// ── Payload ──────────────────────────────────────────────────

export function buildPayload(instruction: string, context = ''): string {
  return context.length > 0 ? `${context}\n\n${instruction}` : instruction;
}

// ── Spawn error classification ───────────────────────────────
// These mean the host is out of processes or descriptors, not that the
// agent binary is broken; they abort the whole run.

const RESOURCE_CODES: ReadonlySet<string> = new Set([
  'EMFILE',
  'ENFILE',
  'EAGAIN',
  'ENOMEM',
]);

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

// ── Supervision ──────────────────────────────────────────────

interface SuperviseInput {
  args: readonly string[];
  payload: string;
  instruction: string;
  stepIndex: number;
  timeoutMs: number;
  signal?: AbortSignal | undefined;
}

type Termination = 'timeout' | 'cancelled';

interface ResolvedRunnerConfig {
  command: string;
  args: readonly string[];
  workingDir: string;
  env: Readonly<Record<string, string>>;
  timeoutMs: number;
  killGraceMs: number;
}

export class ProcessRunner implements InstructionRunner {
  private readonly config: ResolvedRunnerConfig;
  private readonly log: ExecutionResult[] = [];

  constructor(config: ProcessRunnerConfig) {
    this.config = {
      command: config.command,
      args: [...config.args],
      workingDir: path.resolve(config.workingDir),
      env: { ...config.env },
      timeoutMs: config.timeoutMs ?? TIMEOUTS.STEP_TIMEOUT,
      killGraceMs: config.killGraceMs ?? TIMEOUTS.KILL_GRACE,
    };
  }

  get workingDir(): string {
    return this.config.workingDir;
  }

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  /** Snapshot of every result this runner has produced, oldest first. */
  executionLog(): readonly ExecutionResult[] {
    return Object.freeze([...this.log]);
  }

  async execute(
    instruction: string,
    context = '',
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult> {
    const result = await this.supervise({
      args: this.config.args,
      payload: buildPayload(instruction, context),
      instruction,
      stepIndex: options.stepIndex ?? 0,
      timeoutMs: this.config.timeoutMs,
      signal: options.signal,
    });
    this.log.push(result);
    return result;
  }

  /** Check that the configured command starts and answers `--version`. */
  async verify(): Promise<VerifyResult> {
    const result = await this.supervise({
      args: ['--version'],
      payload: '',
      instruction: '--version',
      stepIndex: 0,
      timeoutMs: TIMEOUTS.VERIFY_TIMEOUT,
    });

    if (result.outcome === 'success') {
      return { ok: true, version: (result.stdout ?? '').trim() };
    }
    return {
      ok: false,
      error:
        result.error ??
        ((result.stderr ?? '').trim() || `${this.config.command} ended with ${result.outcome}`),
    };
  }

  private supervise(input: SuperviseInput): Promise<ExecutionResult> {
    const startedAt = new Date();

    const finish = (
      outcome: StepOutcome,
      fields: Partial<Pick<ExecutionResult, 'stdout' | 'stderr' | 'exitCode' | 'signal' | 'error'>>,
    ): ExecutionResult => {
      const finishedAt = new Date();
      return Object.freeze({
        stepIndex: input.stepIndex,
        instruction: input.instruction,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
        stdout: fields.stdout ?? null,
        stderr: fields.stderr ?? null,
        exitCode: fields.exitCode ?? null,
        signal: fields.signal ?? null,
        outcome,
        ...(fields.error !== undefined ? { error: fields.error } : {}),
      });
    };

    if (input.signal?.aborted) {
      return Promise.resolve(finish('cancelled', { error: 'Cancelled before start' }));
    }

    return new Promise<ExecutionResult>((resolve, reject) => {
      const failSpawn = (err: unknown): void => {
        const code = errnoCode(err);
        if (code !== undefined && RESOURCE_CODES.has(code)) {
          reject(
            new ResourceExhaustionError(
              `Cannot spawn ${this.config.command}: ${errorMessage(err)}`,
              code,
            ),
          );
          return;
        }
        resolve(finish('spawn_error', { error: errorMessage(err) }));
      };

      let child: ChildProcess;
      try {
        // Own process group, so a signal reaches everything the agent started.
        child = spawn(this.config.command, [...input.args], {
          cwd: this.config.workingDir,
          env: { ...process.env, ...this.config.env },
          stdio: ['pipe', 'pipe', 'pipe'],
          detached: true,
        });
      } catch (err) {
        failSpawn(err);
        return;
      }

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let spawned = false;
      let settled = false;
      let terminatedBy: Termination | null = null;
      let killTimer: NodeJS.Timeout | undefined;

      const signalGroup = (sig: NodeJS.Signals): void => {
        const pid = child.pid;
        if (pid === undefined) return;
        try {
          process.kill(-pid, sig);
        } catch (err) {
          if (errnoCode(err) === 'ESRCH') return;
          log.detail(`Group signal failed (${errorMessage(err)}), signalling the agent only`);
          child.kill(sig);
        }
      };

      const terminate = (reason: Termination): void => {
        if (settled || terminatedBy !== null) return;
        terminatedBy = reason;
        signalGroup('SIGTERM');
        killTimer = setTimeout(() => {
          signalGroup('SIGKILL');
        }, this.config.killGraceMs);
      };

      const onAbort = (): void => {
        terminate('cancelled');
      };

      const deadline = setTimeout(() => {
        terminate('timeout');
      }, input.timeoutMs);

      const cleanup = (): void => {
        settled = true;
        clearTimeout(deadline);
        if (killTimer !== undefined) clearTimeout(killTimer);
        input.signal?.removeEventListener('abort', onAbort);
      };

      input.signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout.push(chunk);
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr.push(chunk);
      });

      child.once('spawn', () => {
        spawned = true;
      });

      child.on('error', (err) => {
        if (settled) return;
        if (spawned) {
          // Signal delivery failed; the exit handler still settles the step.
          log.warn(`Agent process error: ${errorMessage(err)}`);
          return;
        }
        cleanup();
        failSpawn(err);
      });

      // Settle on exit rather than close: a leftover process holding the
      // pipes must not keep the step open.
      child.once('exit', (code, signal) => {
        if (settled) return;
        cleanup();
        if (terminatedBy !== null) signalGroup('SIGKILL');

        let resolved = false;
        const settle = (): void => {
          if (resolved) return;
          resolved = true;
          clearTimeout(drain);
          const outcome: StepOutcome =
            terminatedBy ?? (code === 0 ? 'success' : 'failure');

          resolve(
            finish(outcome, {
              stdout: Buffer.concat(stdout).toString('utf8'),
              stderr: Buffer.concat(stderr).toString('utf8'),
              exitCode: code,
              signal,
              ...(terminatedBy === 'timeout'
                ? { error: `Timed out after ${String(input.timeoutMs / 1000)}s` }
                : terminatedBy === 'cancelled'
                  ? { error: 'Cancelled by operator' }
                  : {}),
            }),
          );
        };

        const drain = setTimeout(() => {
          child.stdout?.destroy();
          child.stderr?.destroy();
          settle();
        }, TIMEOUTS.OUTPUT_DRAIN);
        child.once('close', settle);
      });

      // EPIPE here means the agent exited without reading its input;
      // the exit status tells the story.
      child.stdin?.on('error', (err) => {
        log.detail(`stdin closed early: ${errorMessage(err)}`);
      });
      child.stdin?.end(input.payload, 'utf8');
    });
  }
}
