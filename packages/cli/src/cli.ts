#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { setupSignalHandlers } from './utils/signals.js';
import { createGenerateCommand } from './commands/generate.js';
import { createScriptCommand } from './commands/script.js';
import { PackageJsonSchema, validate } from '@servicescape/core';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read the CLI package's own version
const packageJson = validate(
  PackageJsonSchema,
  JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8')),
  'PackageJson'
);

setupSignalHandlers();

const program = new Command();
program
  .name('servicescape')
  .description('Architecture diagrams for service landscapes, rendered with D2')
  .version(packageJson.version);

program.addCommand(createGenerateCommand());
program.addCommand(createScriptCommand());

await program.parseAsync();
