#!/usr/bin/env node
import { createProgram } from './cli.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
