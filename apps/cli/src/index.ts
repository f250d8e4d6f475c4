#!/usr/bin/env node
/**
 * SchemaSmith CLI
 */

import { Command } from 'commander';
import { createGenerateCommand } from './commands/generate.js';

const program = new Command();

program
  .name('schemasmith')
  .description('Generate TypeScript entity and value set modules from SQL schema definitions')
  .version('0.1.0');

program.addCommand(createGenerateCommand());

await program.parseAsync();
