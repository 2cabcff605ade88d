#!/usr/bin/env node

import { run } from './run.js';

try {
  process.exitCode = run(process.argv.slice(2));
} catch (error) {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
