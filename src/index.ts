#!/usr/bin/env node

import { createProgram } from './cli.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
