export { createCouncil, defaultConfig, loadConfig, parseConfig, saveConfig, formatZodIssues } from './loader';
export { CouncilConfigSchema } from './config.schema';
export type { CouncilConfig, CouncilConfigInput } from './config.schema';
export {
  COUNCIL_DIR,
  CONFIG_FILE,
  EXPERTS_DIR,
  SYNC_STATE_FILE,
  INSTALLED_DIR,
  MY_COUNCIL_DIR,
  councilPath,
  councilExists,
  getUserCouncilDir,
  getInstalledDir,
  getMyCouncilDir,
} from './paths';
