#!/usr/bin/env node
/**
 * portcullis CLI
 *
 *   portcullis serve    # Start the gatekeeper HTTP server
 *   portcullis token    # Issue a bearer token
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { createServeCommand, createTokenCommand } from './commands/index.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');

const program = new Command();

program
  .name('portcullis')
  .description('Request gatekeeper for the control-plane API')
  .version(packageJson.version);

program.addCommand(createServeCommand());
program.addCommand(createTokenCommand());

// Parse and run
program.parse();
