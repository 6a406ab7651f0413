#!/usr/bin/env node
/**
 * @fileoverview docfacts CLI entry point
 *
 * Commands:
 *   docfacts discover <path>   - List supported source files
 *   docfacts collect <path>    - Collect per-function metadata
 *   docfacts apply <file>      - Document one function atomically
 *   docfacts document <path>   - Document many functions
 *   docfacts extract <path>    - Export fenced documentation blocks
 *   docfacts lint <path>       - Check documentation blocks
 *
 * @packageDocumentation
 */

import { formatError } from './errors.js';
import { runCli } from './run.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exitCode = 1;
  });
