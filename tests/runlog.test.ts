import { appendFile, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { createFrame, decodePng } from '../src/env/index.js';
import {
  findOrderingViolations,
  parseRunLog,
  replayRunLog,
  RunLog,
  RunLogError,
  summarizeReplay,
} from '../src/runlog/index.js';
import type { Attempt } from '../src/schema/index.js';
import { sealAttempt } from '../src/schema/index.js';
import { makeTempDir, removeDir } from './helpers/fakes.js';

let baseDir: string;

beforeEach(async () => {
  baseDir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(baseDir);
});

function attempt(subtaskId: string, attemptIndex: number, complete = false): Attempt {
  return {
    subtaskId,
    attemptIndex,
    chosenAction: 'move_right',
    agentReason: 'test',
    paramsUsed: { speed: 0.35 },
    beforeFrameRef: null,
    afterFrameRef: null,
    execution: { ok: true, steps: 18, terminatedReason: 'chunk_complete', telemetry: { armPosMin: -0.5, timeEndS: null } },
    verifierResult: { complete, rationale: complete ? 'crossed' : 'not yet' },
    failure: null,
    startedAt: '2026-05-06T07:08:09.000Z',
    finishedAt: '2026-05-06T07:08:10.000Z',
  };
}

async function openLog(): Promise<RunLog> {
  return RunLog.create({
    baseDir,
    runId: 'abcdef0123456789',
    taskName: 'demo',
    now: new Date('2026-05-06T07:08:09.000Z'),
  });
}

describe('RunLog', () => {
  it('creates a timestamped run directory', async () => {
    const log = await openLog();
    await log.close();

    expect(log.runDir).toBe(path.join(baseDir, '20260506_070809-abcdef01'));
    expect(log.stepsPath).toBe(path.join(log.runDir, 'steps.jsonl'));
  });

  it('appends one JSON line per attempt with run metadata', async () => {
    const log = await openLog();
    await log.append(sealAttempt(attempt('a', 1)));
    await log.append(sealAttempt(attempt('a', 2, true)));
    await log.close();

    const lines = (await readFile(log.stepsPath, 'utf-8')).split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');

    const first: unknown = JSON.parse(lines[0] ?? '');
    expect(first).toEqual({ ...attempt('a', 1), runId: 'abcdef0123456789', taskName: 'demo' });
  });

  it('writes frames as PNG under images/<subtask>/', async () => {
    const log = await openLog();
    const frame = createFrame(6, 5, 77);

    const ref = await log.saveFrame('cross line/right', 3, 'before', frame);
    await log.close();

    expect(ref).toBe('images/cross_line_right/attempt_3_before.png');
    const decoded = decodePng(await readFile(path.join(log.runDir, 'images', 'cross_line_right', 'attempt_3_before.png')));
    expect(decoded.width).toBe(6);
    expect(decoded.height).toBe(5);
    expect(decoded.data[0]).toBe(77);
  });

  it('keeps subtasks whose safe names collide in separate directories', async () => {
    const log = await openLog();

    const first = await log.saveFrame('pick up', 1, 'before', createFrame(4, 4, 1));
    const second = await log.saveFrame('pick_up', 1, 'before', createFrame(4, 4, 2));
    const third = await log.saveFrame('pick/up', 1, 'before', createFrame(4, 4, 3));
    const again = await log.saveFrame('pick up', 2, 'before', createFrame(4, 4, 4));
    await log.close();

    expect([first, second, third, again]).toEqual([
      'images/pick_up/attempt_1_before.png',
      'images/pick_up_2/attempt_1_before.png',
      'images/pick_up_3/attempt_1_before.png',
      'images/pick_up/attempt_2_before.png',
    ]);
    const kept = decodePng(await readFile(path.join(log.runDir, ...first.split('/'))));
    expect(kept.data[0]).toBe(1);
  });

  it('refuses appends after close', async () => {
    const log = await openLog();
    await log.close();

    await expect(log.append(sealAttempt(attempt('a', 1)))).rejects.toBeInstanceOf(RunLogError);
  });

  it('throws RunLogError when the base directory is a file', async () => {
    const file = path.join(baseDir, 'file');
    await writeFile(file, '');

    await expect(
      RunLog.create({ baseDir: file, runId: 'abcdef0123456789', taskName: 'demo' }),
    ).rejects.toThrow('Cannot create run log');
  });
});

describe('replay', () => {
  it('reads back every committed attempt', async () => {
    const log = await openLog();
    await log.append(sealAttempt(attempt('a', 1)));
    await log.append(sealAttempt(attempt('a', 2, true)));
    await log.close();

    const { entries, truncated } = await replayRunLog(log.stepsPath);

    expect(truncated).toBe(false);
    expect(entries.map((e) => e.attemptIndex)).toEqual([1, 2]);
  });

  it('drops a partial trailing line left by a crash mid-write', async () => {
    const log = await openLog();
    await log.append(sealAttempt(attempt('a', 1)));
    await log.close();

    const full = JSON.stringify({ ...attempt('a', 2), runId: 'r', taskName: 't' });
    await appendFile(log.stepsPath, full.slice(0, 40));

    const { entries, truncated } = await replayRunLog(log.stepsPath);

    expect(truncated).toBe(true);
    expect(entries).toHaveLength(1);
    expect(entries[0]?.attemptIndex).toBe(1);
  });

  it('rejects a corrupt committed line', () => {
    expect(() => parseRunLog('{"not json\n')).toThrow('Corrupt run log record at line 1');
  });

  it('rejects a committed line that is not an attempt', () => {
    expect(() => parseRunLog('{"subtaskId":"a"}\n')).toThrow('Invalid run log record at line 1');
  });

  it('raises RunLogError for a missing file', async () => {
    await expect(replayRunLog(path.join(baseDir, 'missing.jsonl'))).rejects.toBeInstanceOf(RunLogError);
  });

  it('summarizes attempts per subtask', () => {
    const entries = [attempt('a', 1), attempt('a', 2, true), attempt('b', 1)].map((a) => ({
      ...a,
      runId: 'r',
      taskName: 't',
    }));

    expect(summarizeReplay(entries)).toEqual([
      { subtaskId: 'a', attemptCount: 2, completed: true, lastRationale: 'crossed' },
      { subtaskId: 'b', attemptCount: 1, completed: false, lastRationale: 'not yet' },
    ]);
  });
});

describe('findOrderingViolations', () => {
  it('accepts contiguous per-subtask runs', () => {
    expect(
      findOrderingViolations([
        { subtaskId: 'a', attemptIndex: 1 },
        { subtaskId: 'a', attemptIndex: 2 },
        { subtaskId: 'b', attemptIndex: 1 },
      ]),
    ).toEqual([]);
  });

  it('flags interleaved subtasks and index gaps', () => {
    expect(
      findOrderingViolations([
        { subtaskId: 'a', attemptIndex: 1 },
        { subtaskId: 'b', attemptIndex: 2 },
        { subtaskId: 'a', attemptIndex: 2 },
      ]),
    ).toEqual([
      'Subtask b: expected attempt 1, found 2',
      'Subtask a resumes after another subtask started',
      'Subtask a: expected attempt 1, found 2',
    ]);
  });
});
