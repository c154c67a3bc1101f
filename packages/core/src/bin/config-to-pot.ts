#!/usr/bin/env node

import dotenv from 'dotenv';
import { runConfigToPot } from '../cli/config-to-pot.js';

// Load environment variables
dotenv.config();

runConfigToPot(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
