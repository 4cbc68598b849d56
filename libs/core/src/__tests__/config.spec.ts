/**
 * Council config loading and paths
 */

import * as path from 'node:path';
import { ConfigError, CouncilExistsError, CouncilNotInitializedError } from '../errors';
import { createCouncil, defaultConfig, loadConfig, saveConfig } from '../config/loader';
import { councilExists, getUserCouncilDir, getMyCouncilDir } from '../config/paths';
import { initCouncil, listFiles, makeTempDir, readProjectFile, removeDir, writeProjectFile } from './helpers';

describe('config', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => removeDir(root));

  it('fills defaults', () => {
    expect(defaultConfig()).toEqual({ version: 1 });
  });

  it('loads targets and commands', () => {
    initCouncil(root, 'version: 1\ntool: claude\ntargets:\n  - claude\n  - generic\ncommands:\n  - council\n');

    expect(loadConfig(root)).toEqual({
      version: 1,
      tool: 'claude',
      targets: ['claude', 'generic'],
      commands: ['council'],
    });
  });

  it('drops keys it does not know', () => {
    initCouncil(root, 'version: 1\nai:\n  timeout: 30\n');
    expect(loadConfig(root)).toEqual({ version: 1 });
  });

  it('treats an empty file as defaults', () => {
    initCouncil(root, '');
    expect(loadConfig(root)).toEqual(defaultConfig());
  });

  it('requires an initialised council', () => {
    expect(councilExists(root)).toBe(false);
    expect(() => loadConfig(root)).toThrow(CouncilNotInitializedError);
  });

  it('requires the config file inside the council directory', () => {
    writeProjectFile(root, '.council/experts/.keep', '');
    expect(() => loadConfig(root)).toThrow(CouncilNotInitializedError);
  });

  it('reports schema violations with their path', () => {
    initCouncil(root, 'targets: claude\n');
    expect(() => loadConfig(root)).toThrow(ConfigError);
    expect(() => loadConfig(root)).toThrow(/targets: Expected array, received string/);
  });

  it('reports malformed YAML', () => {
    initCouncil(root, 'targets: [claude\n');
    expect(() => loadConfig(root)).toThrow(/^Failed to parse config /);
  });

  it('saves validated config', () => {
    saveConfig(root, { targets: ['opencode'] });

    expect(readProjectFile(root, '.council/config.yaml')).toBe('version: 1\ntargets:\n  - opencode\n');
    expect(loadConfig(root).targets).toEqual(['opencode']);
  });
});

describe('createCouncil', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => removeDir(root));

  it('creates the experts directory and config', () => {
    expect(createCouncil(root, { tool: 'claude' })).toEqual({ version: 1, tool: 'claude' });

    expect(listFiles(root)).toEqual(['.council/config.yaml', '.council/experts/.gitkeep']);
    expect(readProjectFile(root, '.council/config.yaml')).toBe('version: 1\ntool: claude\n');
    expect(loadConfig(root)).toEqual({ version: 1, tool: 'claude' });
  });

  it('refuses to overwrite an existing council', () => {
    initCouncil(root, 'targets:\n  - generic\n');

    expect(() => createCouncil(root)).toThrow(CouncilExistsError);
    expect(readProjectFile(root, '.council/config.yaml')).toBe('targets:\n  - generic\n');
  });

  it('validates the config before creating anything', () => {
    expect(() => createCouncil(root, { tool: '' })).toThrow(ConfigError);
    expect(councilExists(root)).toBe(false);
  });
});

describe('user council directory', () => {
  const original = process.env['COUNCIL_HOME'];

  afterEach(() => {
    if (original === undefined) {
      delete process.env['COUNCIL_HOME'];
    } else {
      process.env['COUNCIL_HOME'] = original;
    }
  });

  it('honours COUNCIL_HOME', () => {
    process.env['COUNCIL_HOME'] = '/tmp/council-home';
    expect(getUserCouncilDir()).toBe(path.resolve('/tmp/council-home'));
    expect(getMyCouncilDir()).toBe(path.join(path.resolve('/tmp/council-home'), 'my-council'));
  });
});
