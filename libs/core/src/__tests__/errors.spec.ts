/**
 * Error helpers
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { TargetDirectoryError, errorMessage, hasErrorCode } from '../errors';
import { makeTempDir, removeDir } from './helpers';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected a throw');
}

describe('hasErrorCode', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => removeDir(root));

  it('matches the code of a failed fs call', () => {
    const err = thrownBy(() => fs.readFileSync(path.join(root, 'missing.md'), 'utf-8'));
    expect(hasErrorCode(err, 'ENOENT')).toBe(true);
    expect(hasErrorCode(err, 'EACCES')).toBe(false);
  });

  it('matches error-shaped values that are not Error instances', () => {
    expect(hasErrorCode({ code: 'ENOENT', message: 'gone' }, 'ENOENT')).toBe(true);
  });

  it('rejects values without a code', () => {
    expect(hasErrorCode(new Error('plain'), 'ENOENT')).toBe(false);
    expect(hasErrorCode(null, 'ENOENT')).toBe(false);
    expect(hasErrorCode('ENOENT', 'ENOENT')).toBe(false);
  });
});

describe('errorMessage', () => {
  it('reads the message of error-shaped values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage({ message: 'from elsewhere' })).toBe('from elsewhere');
  });

  it('stringifies anything else', () => {
    expect(errorMessage('text')).toBe('text');
    expect(errorMessage(42)).toBe('42');
  });

  it('feeds TargetDirectoryError', () => {
    const err = new TargetDirectoryError('claude', '.claude/agents', { code: 'EEXIST', message: 'file exists' });
    expect(err.message).toBe("Cannot create .claude/agents for target 'claude': file exists");
  });
});
