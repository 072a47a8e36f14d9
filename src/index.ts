#!/usr/bin/env node

// src/index.ts - Process entry point

const majorVersion = parseInt(process.version.slice(1).split('.')[0], 10);
if (majorVersion < 20) {
  console.error(`❌ Node.js 20+ required. Current: ${process.version}`);
  process.exit(1);
}

import { createProgram, CommanderError } from './cli/program.js';
import { ErrorFactory } from './utils/error-factory.js';
import { Logger } from './utils/logger.js';

async function main(): Promise<void> {
  Logger.configureFromEnv();

  try {
    const program = await createProgram();
    await program.parseAsync(process.argv);
  } catch (error) {
    // --help and --version surface as CommanderError with exit code 0
    if (error instanceof CommanderError) {
      process.exit(error.exitCode);
    }

    const details = ErrorFactory.describe(error);
    Logger.error(details.message);
    if (details.suggestion) {
      Logger.info(details.suggestion);
    }
    if (process.env.DEBUG) {
      console.error(error);
    }
    process.exit(1);
  }
}

void main();
