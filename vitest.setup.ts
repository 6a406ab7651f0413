/**
 * Shared Vitest setup for docfacts.
 *
 * Component logs go to stderr; keep them quiet during test runs unless
 * DOCFACTS_LOG_LEVEL asks for them.
 */

import { afterEach, beforeAll, vi } from 'vitest';
import { setLogLevel, parseLogLevel } from './src/telemetry/logger.js';

beforeAll(() => {
  setLogLevel(parseLogLevel(process.env.DOCFACTS_LOG_LEVEL) ?? 'silent');
});

afterEach(() => {
  vi.restoreAllMocks();
});
