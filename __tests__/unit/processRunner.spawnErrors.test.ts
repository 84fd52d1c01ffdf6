/**
 * ProcessRunner: errno classification of spawn failures the host raises
 * rarely (descriptor or process table exhaustion). `spawn` is replaced by
 * a child that fails before it starts.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const failure = vi.hoisted(() => ({ code: 'EMFILE' }));

vi.mock('node:child_process', async () => {
  const { EventEmitter } = await import('node:events');
  const { PassThrough } = await import('node:stream');

  return {
    spawn: vi.fn((command: string) => {
      const child = Object.assign(new EventEmitter(), {
        pid: undefined,
        stdin: new PassThrough(),
        stdout: new PassThrough(),
        stderr: new PassThrough(),
        kill: vi.fn(() => false),
      });
      process.nextTick(() => {
        child.emit(
          'error',
          Object.assign(new Error(`spawn ${command} ${failure.code}`), { code: failure.code }),
        );
      });
      return child;
    }),
  };
});

import { ProcessRunner } from '../../src/runner/processRunner.js';
import { ResourceExhaustionError } from '../../src/core/errors.js';

function runner(): ProcessRunner {
  return new ProcessRunner({ command: 'agent', args: [], workingDir: process.cwd() });
}

describe('ProcessRunner spawn errno classification', () => {
  beforeEach(() => {
    failure.code = 'EMFILE';
  });

  it('rejects with ResourceExhaustionError when the descriptor table is full', async () => {
    const pending = runner().execute('x');

    await expect(pending).rejects.toBeInstanceOf(ResourceExhaustionError);
    await expect(pending).rejects.toMatchObject({
      code: 'EMFILE',
      exitCode: 5,
      message: 'Cannot spawn agent: spawn agent EMFILE',
    });
  });

  it.each(['ENFILE', 'EAGAIN', 'ENOMEM'])('treats %s as resource exhaustion', async (code) => {
    failure.code = code;
    await expect(runner().execute('x')).rejects.toMatchObject({
      name: 'ResourceExhaustionError',
      code,
    });
  });

  it('keeps other spawn errors as spawn_error results', async () => {
    failure.code = 'EPERM';
    const r = runner();
    const result = await r.execute('x');

    expect(result.outcome).toBe('spawn_error');
    expect(result.error).toBe('spawn agent EPERM');
    expect(r.executionLog()).toHaveLength(1);
  });

  it('does not record a rejected step in the execution log', async () => {
    const r = runner();
    await expect(r.execute('x')).rejects.toBeInstanceOf(ResourceExhaustionError);
    expect(r.executionLog()).toEqual([]);
  });
});
