#!/usr/bin/env node

/**
 * notion-mirror - mirror a local folder tree into Notion pages
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { registerMirrorCommand } from './commands/mirror.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
  .name('notion-mirror')
  .description('Mirror a local folder structure into a Notion page')
  .version(pkg.version);

registerMirrorCommand(program);

await program.parseAsync();
