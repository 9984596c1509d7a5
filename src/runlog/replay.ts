import { readFile } from 'node:fs/promises';

import type { RunLogEntry } from '../schema/index.js';
import { runLogEntrySchema } from '../schema/index.js';
import { RunLogError } from './runLog.js';

// ── Public types ─────────────────────────────────────────────

export interface ReplayResult {
  entries: RunLogEntry[];
  /** True when the file ends in a partial line, i.e. a crash mid-write. */
  truncated: boolean;
}

export interface ReplayedSubtask {
  subtaskId: string;
  attemptCount: number;
  completed: boolean;
  lastRationale: string;
}

// ── Reading ──────────────────────────────────────────────────

/**
 * Read a steps.jsonl back. Every newline-terminated line must be a valid
 * record; a trailing unterminated line is dropped and reported.
 */
export async function replayRunLog(stepsPath: string): Promise<ReplayResult> {
  let raw: string;
  try {
    raw = await readFile(stepsPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RunLogError(`Cannot read run log ${stepsPath}: ${message}`, { cause: err });
  }
  return parseRunLog(raw);
}

export function parseRunLog(raw: string): ReplayResult {
  const lines = raw.split('\n');
  const tail = lines.pop() ?? '';
  const entries: RunLogEntry[] = [];

  lines.forEach((line, index) => {
    if (line.trim() === '') return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      throw new RunLogError(`Corrupt run log record at line ${String(index + 1)}`);
    }

    const result = runLogEntrySchema.safeParse(parsed);
    if (!result.success) {
      throw new RunLogError(
        `Invalid run log record at line ${String(index + 1)}: ${result.error.message}`,
      );
    }
    entries.push(result.data);
  });

  return { entries, truncated: tail.trim() !== '' };
}

// ── Analysis ─────────────────────────────────────────────────

/** Group entries by subtask, in first-appearance order. */
export function summarizeReplay(entries: readonly RunLogEntry[]): ReplayedSubtask[] {
  const bySubtask = new Map<string, ReplayedSubtask>();

  for (const entry of entries) {
    const current = bySubtask.get(entry.subtaskId);
    bySubtask.set(entry.subtaskId, {
      subtaskId: entry.subtaskId,
      attemptCount: (current?.attemptCount ?? 0) + 1,
      completed: (current?.completed ?? false) || entry.verifierResult.complete,
      lastRationale: entry.verifierResult.rationale,
    });
  }

  return [...bySubtask.values()];
}

/**
 * Ordering violations in a history: a subtask whose attempts are split
 * by another subtask's, or attempt indices that are not 1..k.
 */
export function findOrderingViolations(
  entries: readonly Pick<RunLogEntry, 'subtaskId' | 'attemptIndex'>[],
): string[] {
  const violations: string[] = [];
  const finished = new Set<string>();
  let current: string | null = null;
  let expectedIndex = 1;

  for (const entry of entries) {
    if (entry.subtaskId !== current) {
      if (current !== null) finished.add(current);
      if (finished.has(entry.subtaskId)) {
        violations.push(`Subtask ${entry.subtaskId} resumes after another subtask started`);
      }
      current = entry.subtaskId;
      expectedIndex = 1;
    }

    if (entry.attemptIndex !== expectedIndex) {
      violations.push(
        `Subtask ${entry.subtaskId}: expected attempt ${String(expectedIndex)}, found ${String(entry.attemptIndex)}`,
      );
    }
    expectedIndex = entry.attemptIndex + 1;
  }

  return violations;
}
