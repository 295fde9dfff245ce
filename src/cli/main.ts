#!/usr/bin/env node

/**
 * wayfind CLI entry point.
 * Thin wrapper; all logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerFindCommand, registerRunCommand } from './run.js';

const program = new Command();

program
  .name('wayfind')
  .description(
    'Drive a browser with natural-language element descriptions. Elements are matched by an LLM and cached per page.',
  )
  .version('0.1.0');

registerFindCommand(program);
registerRunCommand(program);

await program.parseAsync();
