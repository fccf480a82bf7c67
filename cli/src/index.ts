#!/usr/bin/env tsx

import { Command } from 'commander';
import { registerMaterialCommands } from './commands/materials.js';
import { registerRecipeCommands } from './commands/recipes.js';
import { registerBatchCommands } from './commands/batches.js';

const program = new Command();

program
  .name('batchkeep')
  .description('Stock, recipes and production batches from the terminal')
  .version('1.0.0');

registerMaterialCommands(program);
registerRecipeCommands(program);
registerBatchCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');
await program.parseAsync(args);
