import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema, parsePlanFile } from '../schema/index.js';
import type { FileConfig, Plan } from '../schema/index.js';
import type { ProcessRunnerConfig } from '../runner/processRunner.js';
import { EXECUTOR, TIMEOUTS } from './defaults.js';

// ── Structured file reading ─────────────────────────────────

async function readStructured(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf-8');
  return filePath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.steprelay.yaml` (or JSON) config file.
 * A missing file yields the all-defaults config when `optional` is set;
 * an invalid file always throws.
 */
export async function loadConfigFile(
  configPath: string,
  optional = false,
): Promise<FileConfig> {
  let parsed: unknown;
  try {
    parsed = await readStructured(configPath);
  } catch (err) {
    if (optional && isMissingFile(err)) return fileConfigSchema.parse({});
    throw err;
  }
  return fileConfigSchema.parse(parsed ?? {});
}

/** Load a plan file: either a bare step list or `{ task, steps }`. */
export async function loadPlanFile(
  planPath: string,
): Promise<{ task: string | undefined; steps: Plan }> {
  return parsePlanFile(await readStructured(planPath));
}

/**
 * Resolve the runner configuration.
 * Precedence: explicit overrides → config file → environment → defaults.
 */
export function resolveRunnerConfig(
  file: FileConfig,
  overrides: { workingDir?: string | undefined; timeoutSeconds?: number | undefined } = {},
  env: NodeJS.ProcessEnv = process.env,
): ProcessRunnerConfig {
  const workingDir = overrides.workingDir ?? file.executor.workingDir ?? process.cwd();
  const timeoutSeconds = overrides.timeoutSeconds ?? file.executor.timeout;

  return {
    command: file.executor.command ?? env['STEPRELAY_COMMAND'] ?? EXECUTOR.COMMAND,
    args: file.executor.args ?? [...EXECUTOR.ARGS],
    workingDir: path.resolve(workingDir),
    env: { ...EXECUTOR.ENV, ...file.executor.env },
    timeoutMs:
      timeoutSeconds !== undefined ? timeoutSeconds * 1000 : TIMEOUTS.STEP_TIMEOUT,
    killGraceMs:
      file.executor.killGrace !== undefined
        ? file.executor.killGrace * 1000
        : TIMEOUTS.KILL_GRACE,
  };
}
