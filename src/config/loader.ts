import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import { taskSchema } from '../schema/task.js';
import type { Task } from '../schema/task.js';
import { LIMITS } from './defaults.js';

// ── Error ────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a YAML (or JSON) task config file.
 * Throws a ConfigError naming the file if it is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config ${configPath}: ${message}`);
  }

  try {
    const parsed: unknown = configPath.endsWith('.json')
      ? JSON.parse(raw)
      : parseYaml(raw);
    return fileConfigSchema.parse(parsed);
  } catch (err) {
    throw new ConfigError(`Invalid config ${configPath}: ${describe(err)}`);
  }
}

/** Turn the config's task block into an immutable, validated Task. */
export function buildTask(config: FileConfig): Task {
  const result = taskSchema.safeParse({
    name: config.task.name,
    subtasks: config.task.subtasks.map((entry) => ({
      name: entry.name,
      instruction: entry.instruction,
      successCriteria: entry.successCriteria,
      initialParams: { ...entry.params },
      maxAttempts: entry.maxAttempts ?? LIMITS.MAX_ATTEMPTS,
      maxAttemptSeconds: entry.maxAttemptSeconds ?? LIMITS.MAX_ATTEMPT_SECONDS,
    })),
  });

  if (!result.success) {
    throw new ConfigError(`Invalid task "${config.task.name}": ${describe(result.error)}`);
  }

  return result.data;
}

// ── Helpers ─────────────────────────────────────────────────

function describe(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}
