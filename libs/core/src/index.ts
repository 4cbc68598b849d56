/**
 * @expert-council/core
 *
 * Expert persona records, tool adapters and the sync engine that keeps each
 * AI coding tool's agent and command files in line with the council.
 */

export * from './errors';
export * from './logger';
export type { SyncEvent, SyncEventHandler } from './events';

export * from './config';
export * from './expert';
export * from './adapters';
export * from './templates';
export * from './sync';
