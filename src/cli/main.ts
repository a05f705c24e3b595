#!/usr/bin/env node

/**
 * acceptkit CLI entry point.
 * Thin wrapper; all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerOrderCommand, registerRunCommand } from './run.js';

const program = new Command();

program
  .name('acceptkit')
  .description(
    'Browser acceptance-test harness. Runs suite files against local or remote browsers, concurrently and in reproducible seeded order.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerOrderCommand(program);

await program.parseAsync();
