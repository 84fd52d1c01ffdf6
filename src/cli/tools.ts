import type { Command } from 'commander';

import { CONFIG_FILE } from '../config/index.js';
import { ConfigError, EXIT_CODES } from '../core/errors.js';
import { ProcessInventory } from '../inventory/processInventory.js';
import * as log from '../utils/logger.js';
import {
  createRunner,
  executeSession,
  failWith,
  loadSessionConfig,
  withSessionOptions,
} from './session.js';
import type { SessionOptions } from './session.js';

// ── quick: one instruction ───────────────────────────────────

export function registerQuickCommand(program: Command): void {
  withSessionOptions(
    program
      .command('quick')
      .description('Send a single instruction to the agent')
      .argument('<instruction...>', 'Instruction text')
      .option('--context <text>', 'Context prepended to the instruction'),
  ).action(async (words: string[], opts: SessionOptions & { context?: string }) => {
    try {
      const instruction = words.join(' ');
      const fileConfig = await loadSessionConfig(opts);
      await executeSession(
        [
          {
            description: 'Quick command',
            instruction,
            critical: true,
            ...(opts.context !== undefined ? { context: opts.context } : {}),
          },
        ],
        undefined,
        opts,
        fileConfig,
      );
    } catch (err) {
      failWith('Error', err);
    }
  });
}

// ── verify: agent CLI available? ─────────────────────────────

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Check that the agent CLI is installed and responds')
    .option('--config <path>', 'Path to config file', CONFIG_FILE)
    .action(async (opts: SessionOptions) => {
      try {
        const fileConfig = await loadSessionConfig(opts);
        const result = await createRunner(fileConfig, opts).verify();
        if (result.ok) {
          log.info(`Agent CLI ready: ${result.version ?? ''}`);
          process.exitCode = EXIT_CODES.OK;
        } else {
          log.error(`Agent CLI unavailable: ${result.error ?? 'unknown error'}`);
          process.exitCode = EXIT_CODES.STEP_FAILED;
        }
      } catch (err) {
        failWith('Error', err);
      }
    });
}

// ── ps / kill: agent process inventory ───────────────────────

export function registerProcessCommands(program: Command): void {
  program
    .command('ps')
    .description('List running agent processes')
    .option('--match <text>', 'Command-line substring to match', 'codex')
    .option('--json', 'Output JSON to stdout')
    .action(async (opts: { match: string; json?: true }) => {
      try {
        const processes = await new ProcessInventory(opts.match).find();
        if (opts.json) {
          process.stdout.write(JSON.stringify(processes, null, 2) + '\n');
          return;
        }
        if (processes.length === 0) {
          log.info('No matching processes');
          return;
        }
        for (const p of processes) {
          log.detail(
            `${String(p.pid)}  cpu ${p.cpuPercent.toFixed(1)}%  mem ${p.memoryMb.toFixed(1)}MB  since ${p.startedAt}  ${p.command}`,
          );
        }
      } catch (err) {
        failWith('Error', err);
      }
    });

  program
    .command('kill')
    .description('Terminate an agent process (graceful, then forced)')
    .argument('<pid>', 'Process id')
    .option('--force', 'Skip the graceful phase')
    .action(async (pidText: string, opts: { force?: true }) => {
      try {
        const pid = Number(pidText);
        if (!Number.isInteger(pid) || pid <= 0) {
          throw new ConfigError(`Invalid pid: ${pidText}`);
        }
        const outcome = await new ProcessInventory('').terminate(pid, { force: opts.force === true });
        log.info(`PID ${String(pid)}: ${outcome}`);
        process.exitCode = outcome === 'not_found' ? EXIT_CODES.STEP_FAILED : EXIT_CODES.OK;
      } catch (err) {
        failWith('Error', err);
      }
    });
}

