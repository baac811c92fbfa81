#!/usr/bin/env node
/**
 * Tablesmith CLI entry point
 *
 * Compiled to dist/bin/tablesmith.js by TypeScript.
 * Registered as the `tablesmith` binary in package.json.
 */

import dotenv from 'dotenv';
import { createProgram } from '../cli/index.js';

dotenv.config();

createProgram()
  .parseAsync(process.argv)
  .catch((err) => {
    console.error('Fatal error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
