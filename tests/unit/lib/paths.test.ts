/**
 * Unit tests for Path Utilities
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { join, resolve } from 'node:path';
import { getStatePath, getStateDir, STATE_DIR_NAME } from '../../../src/lib/paths.js';

describe('getStatePath', () => {
  it('should return state.json path relative to config', () => {
    const configPath = resolve('/project/deploy.yaml');
    const result = getStatePath(configPath);

    assert.strictEqual(result, join(resolve('/project'), '.vmconverge', 'state.json'));
  });

  it('should handle config in subdirectory', () => {
    const configPath = resolve('/project/config/deploy.yaml');
    const result = getStatePath(configPath);

    assert.strictEqual(result, join(resolve('/project/config'), '.vmconverge', 'state.json'));
  });

  it('should resolve relative config paths', () => {
    const configPath = 'deploy.yaml';
    const result = getStatePath(configPath);

    const expectedDir = resolve(configPath, '..');
    assert.strictEqual(result, join(expectedDir, '.vmconverge', 'state.json'));
  });
});

describe('getStateDir', () => {
  it('should return the .vmconverge directory path', () => {
    const configPath = resolve('/project/deploy.yaml');
    const result = getStateDir(configPath);

    assert.strictEqual(result, join(resolve('/project'), STATE_DIR_NAME));
  });

  it('should handle config in subdirectory', () => {
    const configPath = resolve('/project/config/deploy.yaml');
    const result = getStateDir(configPath);

    assert.strictEqual(result, join(resolve('/project/config'), '.vmconverge'));
  });
});
