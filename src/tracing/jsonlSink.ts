/**
 * JSONL Trace Sink
 *
 * Writes trace events to a local JSON Lines file, one event per line.
 * Tracing is best-effort: write failures are reported once and never
 * reach the control loop. The run log is what must not lose data.
 */

import { createWriteStream, mkdirSync } from 'node:fs';
import type { WriteStream } from 'node:fs';
import path from 'node:path';

import { serializeJSON } from '../utils/json.js';
import * as log from '../utils/logger.js';
import type { TraceEvent, TraceSink } from './sink.js';

export class JsonlTraceSink implements TraceSink {
  readonly filePath: string;
  private readonly stream: WriteStream | null;
  private closed = false;
  private failed = false;

  constructor(filePath: string) {
    this.filePath = filePath;

    let stream: WriteStream | null = null;
    try {
      mkdirSync(path.dirname(filePath), { recursive: true });
      stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
      stream.on('error', (err) => this.fail(err));
    } catch (err) {
      this.fail(err);
    }
    this.stream = stream;
  }

  emit(event: TraceEvent): void {
    if (this.closed || this.failed || !this.stream) return;
    this.stream.write(serializeJSON({ ts: new Date().toISOString(), ...event }) + '\n');
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const stream = this.stream;
    if (!stream || stream.destroyed) return;

    await new Promise<void>((resolve) => {
      stream.end(() => resolve());
    });
  }

  private fail(err: unknown): void {
    if (this.failed) return;
    this.failed = true;
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`Trace sink ${this.filePath} disabled: ${message}`);
  }
}
