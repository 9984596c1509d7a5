#!/usr/bin/env node

/**
 * embodied-orchestrator CLI entry point.
 * Thin wrapper; run logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand, registerReplayCommand } from './run.js';

const program = new Command();

program
  .name('embodied-orchestrator')
  .description(
    'Sequence embodied-control subtasks: decide, move, capture, verify, retry. Every attempt lands in an append-only run log.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerReplayCommand(program);

program.parse();
