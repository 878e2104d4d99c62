#!/usr/bin/env node
/**
 * @propsweep/cli - CLI for propsweep
 */

import { Command } from 'commander';
import { PROPSWEEP_VERSION } from '@propsweep/core';
import { checkCommand } from './commands/check.js';

const program = new Command();

program
  .name('propsweep')
  .description('Find private class members that are never read')
  .version(PROPSWEEP_VERSION);

program.addCommand(checkCommand);

await program.parseAsync();
