import path from 'node:path';

import type { Command } from 'commander';

import { createDecisionAgent } from '../agent/index.js';
import { buildTask, loadConfigFile } from '../config/loader.js';
import { Orchestrator } from '../core/index.js';
import { EnvFrameCapture, MockArmEnv, MotionExecutor } from '../env/index.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMClient } from '../llm/index.js';
import { generateJSON } from '../report/index.js';
import {
  findOrderingViolations,
  replayRunLog,
  summarizeReplay,
} from '../runlog/index.js';
import type { FileConfig, LLMProvider, RunRecord } from '../schema/index.js';
import { EXIT_CODES, exitCodeForStatus } from '../schema/index.js';
import { ConsoleTraceSink, FanoutTraceSink, JsonlTraceSink } from '../tracing/index.js';
import type { TraceSink } from '../tracing/index.js';
import { createVerifier } from '../verifier/index.js';
import { serializeJSON } from '../utils/json.js';

// ── Public types ─────────────────────────────────────────────

export interface ExecuteRunOptions {
  /** Overrides the config's runDir. */
  runDir?: string | undefined;
  verbose?: boolean | undefined;
  /** Trace file; overrides config.tracing. */
  tracePath?: string | undefined;
  signal?: AbortSignal | undefined;
  /** Supplies the LLM client for llm agents and verifiers. */
  makeClient?: ((provider: LLMProvider | undefined, model: string | undefined) => LLMClient) | undefined;
}

// ── Wiring ───────────────────────────────────────────────────

function defaultClientFactory(
  timeoutMs: number,
): (provider: LLMProvider | undefined, model: string | undefined) => LLMClient {
  return (provider, model) => createLLMClient(loadLLMConfig({ provider, model, timeoutMs }));
}

function buildSink(config: FileConfig, options: ExecuteRunOptions, runDir: string): TraceSink {
  const sinks: TraceSink[] = [];

  if (options.verbose ?? config.verbose) {
    sinks.push(new ConsoleTraceSink());
  }

  const tracePath = options.tracePath
    ?? (config.tracing.enabled
      ? (config.tracing.path ?? path.join(runDir, 'trace.jsonl'))
      : undefined);
  if (tracePath !== undefined) {
    sinks.push(new JsonlTraceSink(path.resolve(tracePath)));
  }

  return new FanoutTraceSink(sinks);
}

/**
 * Run a validated config against the simulated arm. The environment is
 * reset before the first subtask and closed afterwards.
 */
export async function executeRun(
  config: FileConfig,
  options: ExecuteRunOptions = {},
): Promise<RunRecord> {
  const task = buildTask(config);
  const runDir = path.resolve(options.runDir ?? config.runDir);
  const makeClient = options.makeClient ?? defaultClientFactory(config.collaborator.timeoutMs);

  const env = new MockArmEnv({
    controlHz: config.env.controlHz,
    armLimit: config.env.armLimit,
    initialArmPos: config.env.initialArmPos,
  });
  const sink = buildSink(config, options, runDir);

  try {
    env.reset();

    const orchestrator = new Orchestrator({
      agent: createDecisionAgent(config.agent, () =>
        makeClient(config.agent.provider, config.agent.model),
      ),
      verifier: createVerifier(config.verifier, () =>
        makeClient(config.verifier.provider, config.verifier.model),
      ),
      executor: new MotionExecutor(env),
      capture: new EnvFrameCapture(env),
      runDir,
      haltOnExhaustion: config.haltOnExhaustion,
      retry: config.collaborator,
      sink,
    });

    return await orchestrator.run(task, { signal: options.signal });
  } finally {
    env.close();
    await sink.close();
  }
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(record: RunRecord): void {
  const completed = record.outcomes.filter((o) => o.state === 'COMPLETED').length;

  process.stderr.write(`\n--- Run Result ---\n`);
  process.stderr.write(`Task:      ${record.taskName}\n`);
  process.stderr.write(`Result:    ${record.status}\n`);
  process.stderr.write(
    `Subtasks:  ${String(completed)}/${String(record.outcomes.length)} completed\n`,
  );
  process.stderr.write(`Attempts:  ${String(record.attempts.length)}\n`);
  process.stderr.write(`Time:      ${(record.durationMs / 1000).toFixed(1)}s\n`);
  process.stderr.write(`Run dir:   ${record.runDir}\n\n`);
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the subtasks defined in a task config file')
    .requiredOption('--config <path>', 'Path to task config file (YAML or JSON)')
    .option('--run-dir <dir>', 'Parent directory for run logs')
    .option('--verbose', 'Live progress on stderr')
    .option('--json', 'Output JSON to stdout')
    .option('--trace <path>', 'Write trace events to a JSONL file')
    .action(
      async (opts: {
        config: string;
        runDir?: string;
        verbose?: true;
        json?: true;
        trace?: string;
      }) => {
        const controller = new AbortController();
        const onSigint = (): void => {
          process.stderr.write('\nInterrupted: finishing current attempt, then stopping\n');
          controller.abort();
        };
        process.once('SIGINT', onSigint);

        try {
          const config = await loadConfigFile(opts.config);
          const record = await executeRun(config, {
            runDir: opts.runDir,
            verbose: opts.verbose,
            tracePath: opts.trace,
            signal: controller.signal,
          });

          if (opts.json) {
            process.stdout.write(serializeJSON(generateJSON(record), 2) + '\n');
          }
          printSummary(record);

          process.exitCode = exitCodeForStatus(record.status);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          process.stderr.write(`Error: ${message}\n`);
          process.exitCode = EXIT_CODES.error;
        } finally {
          process.removeListener('SIGINT', onSigint);
        }
      },
    );
}

export function registerReplayCommand(program: Command): void {
  program
    .command('replay')
    .description('Read a steps.jsonl run log back and check its ordering')
    .argument('<steps>', 'Path to a steps.jsonl file')
    .option('--json', 'Output JSON to stdout')
    .action(async (stepsPath: string, opts: { json?: true }) => {
      try {
        const { entries, truncated } = await replayRunLog(stepsPath);
        const subtasks = summarizeReplay(entries);
        const violations = findOrderingViolations(entries);

        if (opts.json) {
          process.stdout.write(
            serializeJSON({ attempts: entries.length, subtasks, truncated, violations }, 2) + '\n',
          );
        }

        process.stderr.write(`\n--- Replay: ${stepsPath} ---\n`);
        process.stderr.write(`Attempts:  ${String(entries.length)}\n`);
        for (const s of subtasks) {
          const state = s.completed ? 'COMPLETED' : 'not completed';
          process.stderr.write(`  ${s.subtaskId}: ${state}, ${String(s.attemptCount)} attempt(s)\n`);
        }
        if (truncated) {
          process.stderr.write('Trailing partial record dropped (interrupted write)\n');
        }
        for (const v of violations) {
          process.stderr.write(`Ordering violation: ${v}\n`);
        }

        process.exitCode = violations.length > 0 ? EXIT_CODES.fail : EXIT_CODES.success;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Error: ${message}\n`);
        process.exitCode = EXIT_CODES.error;
      }
    });
}
