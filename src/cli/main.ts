#!/usr/bin/env node

/**
 * steprelay CLI entry point.
 * Thin wrapper; all logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import {
  registerPlanCommand,
  registerProcessCommands,
  registerQuickCommand,
  registerRunCommand,
  registerTemplateCommand,
  registerVerifyCommand,
} from './index.js';

const program = new Command();

program
  .name('steprelay')
  .description(
    'Run a plan of coding-agent steps as supervised subprocesses and stream progress to observers.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerTemplateCommand(program);
registerPlanCommand(program);
registerQuickCommand(program);
registerVerifyCommand(program);
registerProcessCommands(program);

await program.parseAsync();
