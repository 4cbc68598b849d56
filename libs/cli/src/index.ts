/**
 * Council CLI library: command creators and output helpers for embedding or
 * extending the `council` command.
 *
 * @packageDocumentation
 */

export { VERSION, createProgram } from './program';
export * from './commands';
export { formatSyncReport, formatTargetResult, reportFailed, color } from './utils/output';
export { createConsoleLogger } from './utils/logger';
export { createContext, resolveProjectRoot } from './utils/context';
export type { CouncilContext } from './utils/context';
