/**
 * Console logger for core services. Silent unless --verbose; writes to stderr
 * so --json output stays parseable.
 */

import type { Logger } from '@expert-council/core';
import { color } from './output';

export function createConsoleLogger(verbose = false): Logger {
  const write = (format: (s: string) => string) => (msg: string, ...args: unknown[]) => {
    if (verbose) console.error(format(msg), ...args);
  };

  return {
    debug: write(color.dim),
    info: write((s) => s),
    warn: write(color.yellow),
    error: write(color.red),
  };
}
