import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { TIMEOUTS } from '../config/defaults.js';

// ── Public types ─────────────────────────────────────────────

export interface ProcessEntry {
  pid: number;
  command: string;
  startedAt: string;
  cpuPercent: number;
  memoryMb: number;
}

export type ProcessLister = () => Promise<ProcessEntry[]>;

/** `process.kill` shape: signal 0 checks liveness. */
export type KillFn = (pid: number, signal: NodeJS.Signals | 0) => void;

export type TerminateOutcome = 'terminated' | 'killed' | 'not_found';

export interface InventoryOptions {
  lister?: ProcessLister | undefined;
  kill?: KillFn | undefined;
  graceMs?: number | undefined;
  pollMs?: number | undefined;
}

// ── ps-based lister ──────────────────────────────────────────

const execFileAsync = promisify(execFile);

/** `[[dd-]hh:]mm:ss` → seconds. */
export function parseElapsed(text: string): number {
  const [dayPart, clock] = text.includes('-') ? text.split('-', 2) : ['0', text];
  const parts = (clock ?? '').split(':').map(Number);
  let seconds = 0;
  for (const p of parts) seconds = seconds * 60 + (Number.isNaN(p) ? 0 : p);
  return Number(dayPart ?? 0) * 86_400 + seconds;
}

export function parsePsOutput(stdout: string, now: Date = new Date()): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of stdout.split('\n')) {
    const match = /^\s*(\d+)\s+([\d.]+)\s+(\d+)\s+(\S+)\s+(.+)$/.exec(line);
    if (!match) continue;
    const [, pid, cpu, rssKb, elapsed, command] = match;
    if (pid === undefined || command === undefined) continue;
    entries.push({
      pid: Number(pid),
      command: command.trim(),
      startedAt: new Date(now.getTime() - parseElapsed(elapsed ?? '0') * 1000).toISOString(),
      cpuPercent: Number(cpu),
      memoryMb: Number(rssKb) / 1024,
    });
  }
  return entries;
}

export const psLister: ProcessLister = async () => {
  const { stdout } = await execFileAsync('ps', ['-eo', 'pid=,pcpu=,rss=,etime=,args=']);
  return parsePsOutput(stdout);
};

// ── Inventory ────────────────────────────────────────────────

export class ProcessInventory {
  private readonly pattern: string;
  private readonly lister: ProcessLister;
  private readonly kill: KillFn;
  private readonly graceMs: number;
  private readonly pollMs: number;

  constructor(pattern: string, options: InventoryOptions = {}) {
    this.pattern = pattern.toLowerCase();
    this.lister = options.lister ?? psLister;
    this.kill = options.kill ?? ((pid, signal) => {
      process.kill(pid, signal);
    });
    this.graceMs = options.graceMs ?? TIMEOUTS.TERMINATE_GRACE;
    this.pollMs = options.pollMs ?? 100;
  }

  /** Processes whose command line contains the pattern (case-insensitive). */
  async find(): Promise<ProcessEntry[]> {
    const all = await this.lister();
    return all.filter(
      (p) => p.pid !== process.pid && p.command.toLowerCase().includes(this.pattern),
    );
  }

  /** SIGTERM, wait out the grace period, then SIGKILL if still alive. */
  async terminate(pid: number, options: { force?: boolean } = {}): Promise<TerminateOutcome> {
    if (!this.isAlive(pid)) return 'not_found';

    if (!options.force) {
      this.signal(pid, 'SIGTERM');
      const deadline = Date.now() + this.graceMs;
      while (Date.now() < deadline) {
        if (!this.isAlive(pid)) return 'terminated';
        await sleep(this.pollMs);
      }
      if (!this.isAlive(pid)) return 'terminated';
    }

    this.signal(pid, 'SIGKILL');
    return 'killed';
  }

  private isAlive(pid: number): boolean {
    try {
      this.kill(pid, 0);
      return true;
    } catch (err) {
      // EPERM: exists but owned by someone else.
      return err instanceof Error && 'code' in err && err.code === 'EPERM';
    }
  }

  private signal(pid: number, signal: NodeJS.Signals): void {
    try {
      this.kill(pid, signal);
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) throw err;
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
