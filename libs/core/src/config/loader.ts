/**
 * Configuration loader for the project council (.council/config.yaml)
 */

import * as fs from 'node:fs';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ZodError } from 'zod';
import { ConfigError, CouncilExistsError, CouncilNotInitializedError, errorMessage, hasErrorCode } from '../errors';
import { CouncilConfigSchema } from './config.schema';
import type { CouncilConfig, CouncilConfigInput } from './config.schema';
import { CONFIG_FILE, EXPERTS_DIR, councilExists, councilPath } from './paths';

export function defaultConfig(): CouncilConfig {
  return CouncilConfigSchema.parse({});
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate raw config data, filling defaults.
 */
export function parseConfig(raw: unknown, configPath: string): CouncilConfig {
  const result = CouncilConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config ${configPath}: ${formatZodIssues(result.error)}`, configPath);
  }
  return result.data;
}

/**
 * Load the project's council config.
 * Throws CouncilNotInitializedError when the council root or its config is missing.
 */
export function loadConfig(projectRoot: string): CouncilConfig {
  if (!councilExists(projectRoot)) {
    throw new CouncilNotInitializedError(councilPath(projectRoot));
  }

  const configPath = councilPath(projectRoot, CONFIG_FILE);
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      throw new CouncilNotInitializedError(councilPath(projectRoot));
    }
    throw new ConfigError(`Failed to read config: ${errorMessage(err)}`, configPath);
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Failed to parse config ${configPath}: ${errorMessage(err)}`, configPath);
  }

  return parseConfig(raw, configPath);
}

/**
 * Save the config to .council/config.yaml, creating the council root if needed.
 */
export function saveConfig(projectRoot: string, config: CouncilConfigInput): void {
  const configPath = councilPath(projectRoot, CONFIG_FILE);
  const validated = parseConfig(config, configPath);
  fs.mkdirSync(councilPath(projectRoot), { recursive: true });
  fs.writeFileSync(configPath, stringifyYaml(validated), 'utf-8');
}

/**
 * Create the project council: `.council/experts/` and a fresh config.yaml.
 * Throws CouncilExistsError when `.council/` is already there.
 */
export function createCouncil(projectRoot: string, config: CouncilConfigInput = {}): CouncilConfig {
  if (councilExists(projectRoot)) {
    throw new CouncilExistsError(councilPath(projectRoot));
  }

  const validated = parseConfig(config, councilPath(projectRoot, CONFIG_FILE));
  fs.mkdirSync(councilPath(projectRoot, EXPERTS_DIR), { recursive: true });
  fs.writeFileSync(councilPath(projectRoot, EXPERTS_DIR, '.gitkeep'), '', 'utf-8');
  saveConfig(projectRoot, validated);
  return validated;
}
