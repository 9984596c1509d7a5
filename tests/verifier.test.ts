import type { VerifierInput } from '../src/core/index.js';
import { createFrame, MockArmEnv } from '../src/env/index.js';
import { createMockClient } from '../src/llm/index.js';
import type { LLMClient } from '../src/llm/index.js';
import {
  createVerifier,
  LLMVisionVerifier,
  locateMarker,
  StubVerifier,
  toVerifierResult,
  tryParseVerifierResponse,
  VerifierResponseError,
} from '../src/verifier/index.js';

function inputAt(armPos: number, params: Record<string, unknown>, subtaskId = 'cross_line'): VerifierInput {
  const env = new MockArmEnv({ controlHz: 50, initialArmPos: armPos });
  const frame = env.observe().frame;
  return {
    subtaskId,
    beforeFrame: frame,
    afterFrame: frame,
    instruction: 'cross the line',
    successCriteria: 'marker past the line',
    params,
  };
}

describe('locateMarker', () => {
  it('finds the marker centre column', () => {
    const env = new MockArmEnv({ controlHz: 50, initialArmPos: 0.5 });

    expect(locateMarker(env.observe().frame)).toBe(env.markerX());
  });

  it('returns null when there is no green', () => {
    expect(locateMarker(createFrame(96, 96, 18))).toBeNull();
  });
});

describe('StubVerifier', () => {
  it('completes once the marker is past the line on the target side', async () => {
    const result = await new StubVerifier().check(inputAt(0.5, { target: 'right' }));

    expect(result).toEqual({
      complete: true,
      rationale: 'Marker crossed line to the right. markerX=67, lineX=48.',
      confidence: 0.92,
    });
  });

  it('proposes a faster, longer chunk when short of the line', async () => {
    const result = await new StubVerifier().check(
      inputAt(-0.6, { target: 'right', speed: 0.35, chunkDurationS: 0.35 }),
    );

    expect(result.complete).toBe(false);
    expect(result.rationale).toBe('Still not across line. markerX=24, lineX=48, target=right.');
    expect(result.failureMode).toBe('not_crossed_line');
    expect(result.confidence).toBe(0.78);
    expect(result.updatedParams?.['target']).toBe('right');
    expect(result.updatedParams?.['speed']).toBeCloseTo(0.43);
    expect(result.updatedParams?.['chunkDurationS']).toBeCloseTo(0.4);
  });

  it('caps proposed speed and chunk duration', async () => {
    const result = await new StubVerifier().check(
      inputAt(-0.6, { target: 'right', speed: 1.19, chunkDurationS: 0.79 }),
    );

    expect(result.updatedParams?.['speed']).toBe(1.2);
    expect(result.updatedParams?.['chunkDurationS']).toBe(0.8);
  });

  it('takes the target from the subtask name when params omit it', async () => {
    const result = await new StubVerifier().check(inputAt(-0.6, {}, 'return_left'));

    expect(result).toEqual({
      complete: true,
      rationale: 'Marker crossed line to the left. markerX=24, lineX=48.',
      confidence: 0.92,
    });
  });

  it('respects the crossing margin', async () => {
    // markerX 52 is four pixels right of the line: not enough with margin 4.
    const env = new MockArmEnv({ controlHz: 50, initialArmPos: 0.12 });
    expect(env.markerX()).toBe(52);

    const strict = await new StubVerifier({ crossingMarginPx: 4 }).check(inputAt(0.12, { target: 'right' }));
    const loose = await new StubVerifier({ crossingMarginPx: 2 }).check(inputAt(0.12, { target: 'right' }));

    expect(strict.complete).toBe(false);
    expect(loose.complete).toBe(true);
  });

  it('reports a missing marker', async () => {
    const blank = createFrame(96, 96, 18);
    const result = await new StubVerifier().check({
      ...inputAt(0, { speed: 0.3 }),
      afterFrame: blank,
    });

    expect(result).toEqual({
      complete: false,
      rationale: 'No marker visible in the post-execution frame.',
      confidence: 0.2,
      failureMode: 'missing_marker',
      updatedParams: { speed: 0.3, chunkDurationS: 0.45 },
    });
  });

  it('jitters adjustments when asked', async () => {
    const verifier = new StubVerifier({ jitter: true, random: () => 0 });
    const result = await verifier.check(inputAt(-0.6, { target: 'right', speed: 0.35, chunkDurationS: 0.35 }));

    expect(result.updatedParams?.['speed']).toBeCloseTo(0.43 * 0.95);
    expect(result.updatedParams?.['chunkDurationS']).toBeCloseTo(0.4 * 0.92);
  });
});

describe('verifier response parsing', () => {
  it('accepts a fenced JSON reply', () => {
    const raw = '```json\n{"status":"success","confidence":0.9,"failure_mode":null,"adjustment":null,"notes":"past the line"}\n```';

    const parsed = tryParseVerifierResponse(raw);

    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(toVerifierResult(parsed.response, { speed: 0.3 })).toEqual({
        complete: true,
        rationale: 'past the line',
        confidence: 0.9,
      });
    }
  });

  it('merges an adjustment over the current params', () => {
    const parsed = tryParseVerifierResponse(
      '{"status":"fail","confidence":0.6,"failure_mode":"short","adjustment":{"speed":0.5},"notes":null}',
    );

    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(toVerifierResult(parsed.response, { speed: 0.3, target: 'left' })).toEqual({
        complete: false,
        rationale: 'short',
        confidence: 0.6,
        failureMode: 'short',
        updatedParams: { speed: 0.5, target: 'left' },
      });
    }
  });

  it('treats uncertain as incomplete', () => {
    const parsed = tryParseVerifierResponse(
      '{"status":"uncertain","confidence":0.4,"failure_mode":null,"adjustment":null,"notes":null}',
    );

    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(toVerifierResult(parsed.response, {})).toEqual({
        complete: false,
        rationale: 'status=uncertain',
        confidence: 0.4,
      });
    }
  });

  it('rejects empty, non-JSON and extra-field replies', () => {
    expect(tryParseVerifierResponse('  ')).toEqual({ ok: false, error: 'Empty verifier response' });
    expect(tryParseVerifierResponse('looks good').ok).toBe(false);
    expect(
      tryParseVerifierResponse(
        '{"status":"success","confidence":1,"failure_mode":null,"adjustment":null,"notes":null,"extra":1}',
      ).ok,
    ).toBe(false);
  });
});

describe('LLMVisionVerifier', () => {
  const good = '{"status":"success","confidence":0.8,"failure_mode":null,"adjustment":null,"notes":"crossed"}';

  it('sends both frames and maps the reply', async () => {
    const calls: { labels: (string | undefined)[]; user: string }[] = [];
    const client: LLMClient = {
      generate: async () => good,
      generateWithImages: async (_system, user, images) => {
        calls.push({ labels: images.map((i) => i.label), user });
        return good;
      },
    };

    const result = await new LLMVisionVerifier(client).check(inputAt(0.5, { target: 'right' }));

    expect(result).toEqual({ complete: true, rationale: 'crossed', confidence: 0.8 });
    expect(calls[0]?.labels).toEqual(['BEFORE (before.png)', 'AFTER (after.png)']);
    expect(calls[0]?.user.split('\n')[0]).toBe('Subtask: cross_line');
  });

  it('inserts replacement patterns in the instruction literally', async () => {
    const users: string[] = [];
    const client: LLMClient = {
      generate: async () => good,
      generateWithImages: async (_system, user) => {
        users.push(user);
        return good;
      },
    };
    const input = { ...inputAt(0.5, { note: "$'" }), instruction: "cross $& the $` line" };

    await new LLMVisionVerifier(client).check(input);

    const lines = users[0]?.split('\n') ?? [];
    expect(lines[1]).toBe("Instruction: cross $& the $` line");
    expect(lines[3]).toBe('Parameters: {"note":"$\'"}');
  });

  it('passes the call signal to both the vision call and the repair call', async () => {
    const seen: (AbortSignal | undefined)[] = [];
    const client: LLMClient = {
      generate: async (_system, _user, options) => {
        seen.push(options?.signal);
        return good;
      },
      generateWithImages: async (_system, _user, _images, options) => {
        seen.push(options?.signal);
        return 'not json at all';
      },
    };
    const signal = new AbortController().signal;

    await new LLMVisionVerifier(client).check({ ...inputAt(0.5, {}), signal });

    expect(seen).toEqual([signal, signal]);
  });

  it('repairs an unusable first reply once', async () => {
    const client = createMockClient(['not json at all', good]);

    const result = await new LLMVisionVerifier(client).check(inputAt(0.5, {}));

    expect(result.complete).toBe(true);
  });

  it('throws after a failed repair', async () => {
    const client = createMockClient(['nope', 'still nope']);

    await expect(new LLMVisionVerifier(client).check(inputAt(0.5, {}))).rejects.toBeInstanceOf(
      VerifierResponseError,
    );
  });

  it('requires image support', async () => {
    const client: LLMClient = { generate: async () => good };

    await expect(new LLMVisionVerifier(client).check(inputAt(0.5, {}))).rejects.toThrow(
      'LLM client does not support image input',
    );
  });
});

describe('createVerifier', () => {
  it('builds the configured variant', () => {
    const makeClient = () => createMockClient();

    expect(createVerifier({ type: 'stub', crossingMarginPx: 4, jitter: false }, makeClient).kind).toBe('stub');
    expect(createVerifier({ type: 'llm', crossingMarginPx: 4, jitter: false }, makeClient).kind).toBe('llm');
  });
});
