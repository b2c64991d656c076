/**
 * Unit tests for backing-store URL handling
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { parseBlobUrl, resolveBlobRef, snapshotUrl } from '../../../src/core/blob-url.js';
import { ConfigError } from '../../../src/core/errors.js';

const URL_ = 'https://teststore.blob.core.windows.net/vhds/data/disk1.vhd';

describe('parseBlobUrl', () => {
  it('should split account, container and name', () => {
    assert.deepStrictEqual(parseBlobUrl(URL_), { storage: 'teststore', container: 'vhds', name: 'data/disk1.vhd' });
  });

  it('should return null for malformed URLs', () => {
    assert.strictEqual(parseBlobUrl('teststore/vhds/disk.vhd'), null);
    assert.strictEqual(parseBlobUrl('https://teststore.blob.core.windows.net/vhds'), null);
    assert.strictEqual(parseBlobUrl('ftp://teststore.blob.core.windows.net/vhds/disk.vhd'), null);
  });
});

describe('resolveBlobRef', () => {
  it('should return the parsed address when the account matches', () => {
    assert.strictEqual(resolveBlobRef(URL_, 'teststore').container, 'vhds');
  });

  it('should reject a URL in another storage account', () => {
    assert.throws(
      () => resolveBlobRef(URL_, 'otherstore'),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message ===
          `storage otherstore provided in the deployment specification doesn't match the storage of BLOB ${URL_}`
    );
  });

  it('should reject a malformed URL', () => {
    assert.throws(() => resolveBlobRef('not a url', 'teststore'), /failed to parse BLOB URL not a url/);
  });
});

describe('snapshotUrl', () => {
  it('should append the snapshot query', () => {
    assert.strictEqual(snapshotUrl(URL_, '2026-10-18T10:00:00Z'), `${URL_}?snapshot=2026-10-18T10:00:00Z`);
  });
});
