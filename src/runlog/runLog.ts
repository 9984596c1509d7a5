import { mkdir, open, writeFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';

import type { Frame } from '../env/frame.js';
import { encodePng } from '../env/frame.js';
import type { RunRecord, SealedAttempt } from '../schema/index.js';
import { serializeJSON } from '../utils/json.js';

// ── Error ────────────────────────────────────────────────────
// Nothing can be recorded safely once the log is gone, so this one
// is never contained: it ends the run.

export class RunLogError extends Error {
  readonly exitCode = 4;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RunLogError';
  }
}

// ── Public types ─────────────────────────────────────────────

export type FrameSlot = 'before' | 'after';

export interface FrameStore {
  /** Persist a frame and return its reference relative to the run dir. */
  saveFrame(subtaskId: string, attemptIndex: number, slot: FrameSlot, frame: Frame): Promise<string>;
}

export interface AttemptLog extends FrameStore {
  readonly runDir: string;
  readonly stepsPath: string;
  /** Resolves only once the record is on disk. */
  append(attempt: SealedAttempt): Promise<void>;
}

export interface RunLogOptions {
  baseDir: string;
  runId: string;
  taskName: string;
  now?: Date | undefined;
}

export const STEPS_FILE = 'steps.jsonl';
export const SUMMARY_FILE = 'summary.json';
export const REPORT_FILE = 'report.md';
const IMAGES_DIR = 'images';

/**
 * One run's on-disk log:
 *
 *   <baseDir>/<yyyymmdd_hhmmss>-<runId8>/
 *     steps.jsonl                          one line per sealed attempt
 *     images/<subtask>/attempt_<n>_<slot>.png
 *     summary.json, report.md              written at the end
 *
 * <subtask> is the id with unsafe characters replaced; an id whose safe
 * name is already taken by another subtask gets a _2, _3, ... suffix.
 */
export class RunLog implements AttemptLog {
  readonly runDir: string;
  readonly stepsPath: string;
  private readonly runId: string;
  private readonly taskName: string;
  private handle: FileHandle | null;
  /** Subtask id → image directory name. Distinct ids never share a directory. */
  private readonly imageDirs = new Map<string, string>();

  private constructor(runDir: string, handle: FileHandle, runId: string, taskName: string) {
    this.runDir = runDir;
    this.stepsPath = path.join(runDir, STEPS_FILE);
    this.handle = handle;
    this.runId = runId;
    this.taskName = taskName;
  }

  static async create(options: RunLogOptions): Promise<RunLog> {
    const stamp = formatStamp(options.now ?? new Date());
    const runDir = path.resolve(options.baseDir, `${stamp}-${options.runId.slice(0, 8)}`);

    try {
      await mkdir(path.join(runDir, IMAGES_DIR), { recursive: true });
      const handle = await open(path.join(runDir, STEPS_FILE), 'a');
      return new RunLog(runDir, handle, options.runId, options.taskName);
    } catch (err) {
      throw new RunLogError(`Cannot create run log in ${runDir}: ${describe(err)}`, { cause: err });
    }
  }

  async saveFrame(
    subtaskId: string,
    attemptIndex: number,
    slot: FrameSlot,
    frame: Frame,
  ): Promise<string> {
    const ref = path.posix.join(
      IMAGES_DIR,
      this.imageDirFor(subtaskId),
      `attempt_${String(attemptIndex)}_${slot}.png`,
    );
    const target = path.join(this.runDir, ...ref.split('/'));

    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, encodePng(frame));
    } catch (err) {
      throw new RunLogError(`Cannot write frame ${ref}: ${describe(err)}`, { cause: err });
    }

    return ref;
  }

  async append(attempt: SealedAttempt): Promise<void> {
    const handle = this.requireOpen();
    const line = serializeJSON({ ...attempt, runId: this.runId, taskName: this.taskName }) + '\n';

    try {
      await handle.appendFile(line, 'utf-8');
      await handle.datasync();
    } catch (err) {
      throw new RunLogError(
        `Cannot append attempt ${attempt.subtaskId}#${String(attempt.attemptIndex)}: ${describe(err)}`,
        { cause: err },
      );
    }
  }

  async writeSummary(record: RunRecord): Promise<string> {
    return this.writeArtifact(SUMMARY_FILE, serializeJSON(record, 2) + '\n');
  }

  async writeReport(markdown: string): Promise<string> {
    return this.writeArtifact(REPORT_FILE, markdown);
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }

  private async writeArtifact(name: string, content: string): Promise<string> {
    const target = path.join(this.runDir, name);
    try {
      await writeFile(target, content, 'utf-8');
    } catch (err) {
      throw new RunLogError(`Cannot write ${name}: ${describe(err)}`, { cause: err });
    }
    return target;
  }

  private imageDirFor(subtaskId: string): string {
    const known = this.imageDirs.get(subtaskId);
    if (known !== undefined) return known;

    const taken = new Set(this.imageDirs.values());
    const base = safeSegment(subtaskId);
    let segment = base;
    for (let n = 2; taken.has(segment); n++) {
      segment = `${base}_${String(n)}`;
    }
    this.imageDirs.set(subtaskId, segment);
    return segment;
  }

  private requireOpen(): FileHandle {
    if (!this.handle) {
      throw new RunLogError(`Run log ${this.stepsPath} is closed`);
    }
    return this.handle;
  }
}

// ── Helpers ──────────────────────────────────────────────────

function formatStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replaceAll('-', '')}_${iso.slice(11, 19).replaceAll(':', '')}`;
}

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, '_');
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
