#!/usr/bin/env node
// Loaded first so the .env file is applied before configuration constants are read
import 'dotenv/config';
import { createProgram } from './program';
import { logError } from '../utils/error-utils';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logError(error, 'agentsteam');
    process.exitCode = 1;
  });
