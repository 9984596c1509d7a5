import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { buildTask, ConfigError, loadConfigFile } from '../src/config/index.js';
import { loadLLMConfig } from '../src/llm/index.js';
import { makeTempDir, removeDir } from './helpers/fakes.js';

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(dir);
});

async function writeConfig(name: string, content: string): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, content, 'utf-8');
  return file;
}

const MINIMAL_YAML = `
task:
  name: demo
  subtasks:
    - name: cross_line_right
      instruction: Move right
      successCriteria: Marker right of line
      params:
        target: right
haltOnExhaustion: false
`;

describe('loadConfigFile', () => {
  it('loads YAML and applies defaults', async () => {
    const config = await loadConfigFile(await writeConfig('task.yaml', MINIMAL_YAML));

    expect(config.haltOnExhaustion).toBe(false);
    expect(config.runDir).toBe('runs');
    expect(config.verbose).toBe(false);
    expect(config.agent).toEqual({ type: 'rule_based' });
    expect(config.verifier).toEqual({ type: 'stub', crossingMarginPx: 4, jitter: false });
    expect(config.env).toEqual({ controlHz: 50, armLimit: 1, initialArmPos: -0.6 });
    expect(config.collaborator).toEqual({ retries: 2, timeoutMs: 30000, retryDelayMs: 500 });
    expect(config.tracing).toEqual({ enabled: false });
  });

  it('loads JSON', async () => {
    const file = await writeConfig(
      'task.json',
      JSON.stringify({
        task: { name: 'demo', subtasks: [{ name: 'a', instruction: 'i', successCriteria: 's' }] },
        haltOnExhaustion: true,
        collaborator: { retries: 0 },
      }),
    );

    const config = await loadConfigFile(file);

    expect(config.collaborator.retries).toBe(0);
    expect(config.task.subtasks[0]?.params).toEqual({});
  });

  it('requires haltOnExhaustion', async () => {
    const file = await writeConfig('task.yaml', MINIMAL_YAML.replace('haltOnExhaustion: false', ''));

    await expect(loadConfigFile(file)).rejects.toThrow('haltOnExhaustion: Required');
  });

  it('names the offending field', async () => {
    const file = await writeConfig('task.yaml', `${MINIMAL_YAML}\nagent:\n  type: psychic\n`);

    await expect(loadConfigFile(file)).rejects.toThrow(/agent\.type/);
  });

  it('reports a missing file as a ConfigError', async () => {
    await expect(loadConfigFile(path.join(dir, 'absent.yaml'))).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('buildTask', () => {
  it('fills attempt limits from defaults', async () => {
    const config = await loadConfigFile(await writeConfig('task.yaml', MINIMAL_YAML));

    expect(buildTask(config)).toEqual({
      name: 'demo',
      subtasks: [
        {
          name: 'cross_line_right',
          instruction: 'Move right',
          successCriteria: 'Marker right of line',
          initialParams: { target: 'right' },
          maxAttempts: 10,
          maxAttemptSeconds: 10,
        },
      ],
    });
  });

  it('rejects duplicate subtask names', async () => {
    const yaml = `
task:
  name: demo
  subtasks:
    - { name: a, instruction: i, successCriteria: s }
    - { name: a, instruction: j, successCriteria: t }
haltOnExhaustion: true
`;
    const config = await loadConfigFile(await writeConfig('dup.yaml', yaml));

    expect(() => buildTask(config)).toThrow('Duplicate subtask name "a"');
  });
});

describe('loadLLMConfig', () => {
  it('takes the key that matches the provider', () => {
    const config = loadLLMConfig(
      { provider: 'openai' },
      { ANTHROPIC_API_KEY: 'test-anthropic', OPENAI_API_KEY: 'test-openai' },
    );

    expect(config.provider).toBe('openai');
    expect(config.apiKey).toBe('test-openai');
  });

  it('prefers overrides over the environment', () => {
    const config = loadLLMConfig(
      { model: 'override-model' },
      { LLM_PROVIDER: 'mock', ORCHESTRATOR_MODEL: 'env-model' },
    );

    expect(config.provider).toBe('mock');
    expect(config.model).toBe('override-model');
  });
});
