/**
 * Typed error classes for the council core
 */

export class CouncilError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'CouncilError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class CouncilNotInitializedError extends CouncilError {
  public readonly councilDir: string;

  constructor(councilDir: string) {
    super(`Council not initialized at ${councilDir}: run 'council init' first`, 'COUNCIL_NOT_INITIALIZED');
    this.name = 'CouncilNotInitializedError';
    this.councilDir = councilDir;
  }
}

export class CouncilExistsError extends CouncilError {
  public readonly councilDir: string;

  constructor(councilDir: string) {
    super(`Council already initialized at ${councilDir}`, 'COUNCIL_EXISTS');
    this.name = 'CouncilExistsError';
    this.councilDir = councilDir;
  }
}

export class ConfigError extends CouncilError {
  public readonly configPath: string;

  constructor(message: string, configPath: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

export class UnknownTargetError extends CouncilError {
  public readonly target: string;
  public readonly validTargets: string[];

  constructor(target: string, validTargets: string[]) {
    super(`Unknown target '${target}' - valid targets: ${validTargets.join(', ')}`, 'UNKNOWN_TARGET');
    this.name = 'UnknownTargetError';
    this.target = target;
    this.validTargets = validTargets;
  }
}

export class NoTargetsError extends CouncilError {
  constructor() {
    super('No AI tool detected and no fallback target is registered', 'NO_TARGETS');
    this.name = 'NoTargetsError';
  }
}

export class ExpertParseError extends CouncilError {
  public readonly filePath?: string;

  constructor(message: string, filePath?: string) {
    super(filePath ? `${filePath}: ${message}` : message, 'EXPERT_PARSE_ERROR');
    this.name = 'ExpertParseError';
    this.filePath = filePath;
  }
}

export class ExpertFormatError extends CouncilError {
  public readonly expertId: string;

  constructor(expertId: string, reason: string) {
    super(`Cannot format expert '${expertId || '(no id)'}': ${reason}`, 'EXPERT_FORMAT_ERROR');
    this.name = 'ExpertFormatError';
    this.expertId = expertId;
  }
}

export class ExpertIntegrityError extends CouncilError {
  public readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(`Saved expert file ${filePath} is invalid: ${reason}`, 'EXPERT_INTEGRITY_ERROR');
    this.name = 'ExpertIntegrityError';
    this.filePath = filePath;
  }
}

export class TargetDirectoryError extends CouncilError {
  public readonly target: string;
  public readonly directory: string;

  constructor(target: string, directory: string, cause: unknown) {
    super(
      `Cannot create ${directory} for target '${target}': ${errorMessage(cause)}`,
      'TARGET_DIRECTORY_ERROR',
    );
    this.name = 'TargetDirectoryError';
    this.target = target;
    this.directory = directory;
  }
}

/**
 * Message of an unknown thrown value.
 * Duck-typed: Node system errors may come from another realm, where
 * `instanceof Error` is false.
 */
export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

/** Whether a thrown value is a Node system error with the given code (e.g. ENOENT) */
export function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
