/**
 * Unit tests for the error taxonomy helpers
 */

import { describe, it, expect } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import * as vm from 'vm';
import { describeError, errorCode, NotFoundError } from '../../src/model/errors';
import { createTempDir, removeTempDir } from '../helpers';

describe('errorCode', () => {
  it('reads the code of a Node filesystem error', () => {
    const tempDir = createTempDir();
    let thrown: unknown;
    try {
      fs.readFileSync(path.join(tempDir, 'missing.json'));
    } catch (error) {
      thrown = error;
    }
    removeTempDir(tempDir);

    expect(errorCode(thrown)).toBe('ENOENT');
  });

  it('reads the code of an error created in another realm', () => {
    const foreign: unknown = vm.runInNewContext("Object.assign(new Error('exists'), { code: 'EEXIST' })");

    expect(foreign instanceof Error).toBe(false);
    expect(errorCode(foreign)).toBe('EEXIST');
  });

  it('returns undefined without a string code', () => {
    expect(errorCode(new Error('plain'))).toBeUndefined();
    expect(errorCode({ code: 17 })).toBeUndefined();
    expect(errorCode('ENOENT')).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });
});

describe('describeError', () => {
  it('uses the message of an error and stringifies anything else', () => {
    expect(describeError(new Error('disk full'))).toBe('disk full');
    expect(describeError(42)).toBe('42');
  });
});

describe('NotFoundError', () => {
  it('carries its code through toJSON', () => {
    expect(new NotFoundError('patient', 'P9').toJSON()).toMatchObject({ code: 'NOT_FOUND' });
  });
});
