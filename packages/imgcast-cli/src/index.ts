#!/usr/bin/env node

/**
 * imgcast CLI - write OS images to removable storage
 */

import { Command } from 'commander';
import { registerWriteCommand } from './commands/write.js';
import { registerHashCommands } from './commands/hash.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('imgcast')
  .description('Download, verify and write OS images to SD cards and USB drives')
  .version(VERSION);

registerWriteCommand(program);
registerHashCommands(program);

await program.parseAsync();
