/**
 * CLI Commands
 */

export { createInitCommand, runInit } from './init';
export type { InitOptions } from './init';
export { createSyncCommand, runSync } from './sync';
export type { SyncCommandOptions } from './sync';
export { createTargetsCommand, listTargets, formatTargets } from './targets';
export type { TargetInfo } from './targets';
export { createListCommand, formatExpert } from './list';
export { createUninstallCommand, findInstalledPaths } from './uninstall';
export type { UninstallOptions } from './uninstall';
