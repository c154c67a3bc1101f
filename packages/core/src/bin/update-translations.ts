#!/usr/bin/env node

import dotenv from 'dotenv';
import { runUpdateTranslations } from '../cli/update-translations.js';

// Load environment variables
dotenv.config();

runUpdateTranslations(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
