/**
 * ProcessRunner: subprocess supervision against real child processes.
 * Most children are the current Node binary running an inline script.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ProcessRunner, buildPayload } from '../../src/runner/processRunner.js';

const NODE = process.execPath;

function nodeRunner(script: string, overrides: { timeoutMs?: number; killGraceMs?: number; env?: Record<string, string>; workingDir?: string } = {}): ProcessRunner {
  return new ProcessRunner({
    command: NODE,
    args: ['-e', script],
    workingDir: overrides.workingDir ?? process.cwd(),
    timeoutMs: overrides.timeoutMs ?? 10_000,
    killGraceMs: overrides.killGraceMs ?? 500,
    env: overrides.env,
  });
}

describe('buildPayload', () => {
  it('returns the instruction alone without context', () => {
    expect(buildPayload('do it')).toBe('do it');
    expect(buildPayload('do it', '')).toBe('do it');
  });

  it('puts context before the instruction separated by a blank line', () => {
    expect(buildPayload('do it', 'repo is empty')).toBe('repo is empty\n\ndo it');
  });
});

describe('ProcessRunner.execute', () => {
  it('delivers the payload on stdin and captures stdout', async () => {
    const runner = nodeRunner('process.stdin.pipe(process.stdout)');
    const result = await runner.execute('hello', 'ctx', { stepIndex: 2 });

    expect(result.outcome).toBe('success');
    expect(result.exitCode).toBe(0);
    expect(result.signal).toBeNull();
    expect(result.stdout).toBe('ctx\n\nhello');
    expect(result.stderr).toBe('');
    expect(result.stepIndex).toBe(2);
    expect(result.instruction).toBe('hello');
    expect(result.error).toBeUndefined();
  });

  it('classifies a non-zero exit as failure and keeps stderr', async () => {
    const runner = nodeRunner('process.stderr.write("boom"); process.exit(3)');
    const result = await runner.execute('anything');

    expect(result.outcome).toBe('failure');
    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('boom');
  });

  it('passes configured environment variables to the child', async () => {
    const runner = nodeRunner('process.stdout.write(process.env.STEPRELAY_MARKER ?? "")', {
      env: { STEPRELAY_MARKER: 'marker-value' },
    });
    const result = await runner.execute('x');
    expect(result.stdout).toBe('marker-value');
  });

  it('runs the child in the configured working directory', async () => {
    const dir = realpathSync(os.tmpdir());
    const runner = nodeRunner('process.stdout.write(process.cwd())', { workingDir: dir });
    const result = await runner.execute('x');
    expect(realpathSync(result.stdout ?? '')).toBe(dir);
    expect(runner.workingDir).toBe(dir);
  });

  it('times out a slow child well before it would finish', async () => {
    const runner = nodeRunner('setTimeout(() => {}, 5000)', { timeoutMs: 1000 });
    const started = Date.now();
    const result = await runner.execute('sleep');
    const elapsed = Date.now() - started;

    expect(result.outcome).toBe('timeout');
    expect(result.error).toBe('Timed out after 1s');
    expect(result.signal).toBe('SIGTERM');
    expect(result.exitCode).toBeNull();
    expect(elapsed).toBeGreaterThanOrEqual(900);
    expect(elapsed).toBeLessThan(4000);
  });

  it('escalates to SIGKILL when the child ignores SIGTERM', async () => {
    const runner = nodeRunner(
      'process.on("SIGTERM", () => {}); setTimeout(() => {}, 10000)',
      { timeoutMs: 1000, killGraceMs: 300 },
    );
    const result = await runner.execute('stubborn');

    expect(result.outcome).toBe('timeout');
    expect(result.signal).toBe('SIGKILL');
  });

  it('reports a missing executable as spawn_error without streams', async () => {
    const runner = new ProcessRunner({
      command: '/nonexistent/steprelay-agent',
      args: [],
      workingDir: process.cwd(),
    });
    const result = await runner.execute('x');

    expect(result.outcome).toBe('spawn_error');
    expect(result.stdout).toBeNull();
    expect(result.stderr).toBeNull();
    expect(result.exitCode).toBeNull();
    expect(result.error).toContain('ENOENT');
  });

  it('terminates the child when the signal aborts', async () => {
    const runner = nodeRunner('setTimeout(() => {}, 10000)');
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 200);

    const result = await runner.execute('long', '', { signal: controller.signal });

    expect(result.outcome).toBe('cancelled');
    expect(result.error).toBe('Cancelled by operator');
  });

  it('times out a shell whose own subprocess outlives the signal to the shell', async () => {
    const runner = new ProcessRunner({
      command: 'sh',
      args: ['-c', 'sleep 5; echo done'],
      workingDir: process.cwd(),
      timeoutMs: 1000,
      killGraceMs: 300,
    });
    const started = Date.now();
    const result = await runner.execute('x');
    const elapsed = Date.now() - started;

    expect(result.outcome).toBe('timeout');
    expect(result.stdout).toBe('');
    expect(elapsed).toBeLessThan(3000);
  });

  it('cancels a shell and its subprocess together', async () => {
    const runner = new ProcessRunner({
      command: 'sh',
      args: ['-c', 'sleep 5; echo done'],
      workingDir: process.cwd(),
      killGraceMs: 300,
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 200);
    const started = Date.now();

    const result = await runner.execute('x', '', { signal: controller.signal });
    const elapsed = Date.now() - started;

    expect(result.outcome).toBe('cancelled');
    expect(result.stdout).toBe('');
    expect(elapsed).toBeLessThan(3000);
  });

  it('settles once the agent exits even if a background process keeps its pipes', async () => {
    const runner = new ProcessRunner({
      command: 'sh',
      args: ['-c', 'sleep 5 & echo started'],
      workingDir: process.cwd(),
    });
    const started = Date.now();
    const result = await runner.execute('x');
    const elapsed = Date.now() - started;

    expect(result.outcome).toBe('success');
    expect(result.stdout).toBe('started\n');
    expect(elapsed).toBeLessThan(3000);
  });

  it('does not spawn when the signal is already aborted', async () => {
    const runner = new ProcessRunner({
      command: '/nonexistent/steprelay-agent',
      args: [],
      workingDir: process.cwd(),
    });
    const controller = new AbortController();
    controller.abort();

    const result = await runner.execute('x', '', { signal: controller.signal });

    expect(result.outcome).toBe('cancelled');
    expect(result.error).toBe('Cancelled before start');
  });
});

describe('ProcessRunner spawn failures', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir !== undefined) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('reports a file without the execute bit as spawn_error', async () => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'steprelay-runner-'));
    const script = path.join(dir, 'agent.sh');
    writeFileSync(script, '#!/bin/sh\necho hi\n', { mode: 0o644 });

    const runner = new ProcessRunner({ command: script, args: [], workingDir: dir });
    const result = await runner.execute('x');

    expect(result.outcome).toBe('spawn_error');
    expect(result.error).toContain('EACCES');
    expect(result.exitCode).toBeNull();
    expect(runner.executionLog()).toHaveLength(1);
  });
});

describe('ProcessRunner.executionLog', () => {
  it('records every result in order and hands out frozen snapshots', async () => {
    const runner = nodeRunner('process.exit(0)');
    await runner.execute('first', '', { stepIndex: 0 });
    const before = runner.executionLog();
    await runner.execute('second', '', { stepIndex: 1 });
    const after = runner.executionLog();

    expect(before.map((r) => r.instruction)).toEqual(['first']);
    expect(after.map((r) => r.instruction)).toEqual(['first', 'second']);
    expect(Object.isFrozen(after)).toBe(true);
  });
});

describe('ProcessRunner.verify', () => {
  it('reports the version of a working command', async () => {
    const runner = new ProcessRunner({ command: NODE, args: [], workingDir: process.cwd() });
    const result = await runner.verify();

    expect(result.ok).toBe(true);
    expect(result.version).toBe(process.version);
    expect(runner.executionLog()).toEqual([]);
  });

  it('reports a missing command', async () => {
    const runner = new ProcessRunner({
      command: '/nonexistent/steprelay-agent',
      args: [],
      workingDir: process.cwd(),
    });
    const result = await runner.verify();

    expect(result.ok).toBe(false);
    expect(result.error).toContain('ENOENT');
  });
});
