#!/usr/bin/env node
// City orchestrator CLI

import { Command } from 'commander';
import { logger, parseLogLevel } from '../core/logger.js';
import { registerRunCommand } from './commands/run.js';
import { dispatchCommand } from './commands/dispatch.js';
import { departmentsCommand } from './commands/departments.js';
import { evaluateCommand } from './commands/evaluate.js';
import { handleError } from './utils/error-handler.js';

const program = new Command();

program
  .name('city')
  .description('City services orchestrator - supervise departments, decide recommendations and dispatch calls')
  .version('0.1.0')
  .option('--log-level <level>', 'debug, info, warn, error or silent', 'info');

program.hook('preAction', command => {
  logger.setLevel(parseLogLevel(command.opts<{ logLevel: string }>().logLevel));
});

// Register all commands
registerRunCommand(program);
program.addCommand(dispatchCommand);
program.addCommand(departmentsCommand);
program.addCommand(evaluateCommand);

program.parseAsync().catch(handleError);
