/**
 * Live execution logger for the orchestrator.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
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

export function subtask(index: number, total: number, name: string): void {
  write(`📋 [${String(index)}/${String(total)}] ${name}`);
}

export function attempt(
  attemptIndex: number,
  maxAttempts: number,
  action: string,
): void {
  write(`🦾 attempt ${String(attemptIndex)}/${String(maxAttempts)}: ${action}`);
}

export function attemptResult(
  attemptIndex: number,
  complete: boolean,
  rationale: string,
): void {
  const icon = complete ? '✅' : '❌';
  write(`${icon} attempt ${String(attemptIndex)}: ${rationale}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function retry(stage: string, tryNumber: number, message: string): void {
  write(`🔁 ${stage} retry ${String(tryNumber)}: ${message}`);
}
