#!/usr/bin/env -S node --import tsx

/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * dataviews CLI - Inspect and maintain saved .view files
 */

import { Command } from 'commander';
import { inspectCommand } from './commands/inspect.js';
import { relocateCommand } from './commands/relocate.js';

const program = new Command();

program
  .name('dataviews')
  .description('Inspect and maintain saved data views')
  .version('0.1.0');

program
  .command('inspect <file>')
  .description('Show the view graph stored in a .view file')
  .option('--json', 'Print the decoded file as JSON')
  .action(inspectCommand);

program
  .command('relocate <file>')
  .description('Rebase the targets of a moved .view file to its current directory')
  .action(relocateCommand);

program.parse();
