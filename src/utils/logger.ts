/**
 * Live execution logger for steprelay.
 *
 * All output goes to stderr so stdout stays clean for JSON contract output.
 * Emoji prefixes give instant visual context in the terminal.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function step(index: number, total: number, description: string): void {
  write(`📍 [${String(index + 1)}/${String(total)}] ${description}`);
}

export function stepResult(
  index: number,
  total: number,
  outcome: string,
  description: string,
): void {
  const icon = outcome === 'success' ? '✅' : outcome === 'timeout' ? '⏱️ ' : '❌';
  write(`${icon} [${String(index + 1)}/${String(total)}] ${description} (${outcome})`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function planned(stepCount: number): void {
  write(`📋 Plan received: ${String(stepCount)} steps`);
}

export function dispatch(instruction: string): void {
  write(`🤖 Sending to agent: ${instruction}`);
}

export function llm(message: string): void {
  write(`🧠 ${message}`);
}

export function monitor(message: string): void {
  write(`📡 ${message}`);
}
