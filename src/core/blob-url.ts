/**
 * Backing-store URL handling
 *
 * Disk backing stores are page blobs addressed as
 * scheme://account.host/container/name.
 */

import { ConfigError } from './errors.js';

/**
 * Parsed blob address
 */
export interface BlobRef {
  /** Storage account name */
  storage: string;
  container: string;
  name: string;
  /** Snapshot id, when addressing a snapshot of the blob */
  snapshot?: string;
}

const BLOB_URL_PATTERN = /^https?:\/\/([^./]+)\.[^/]+\/([^/]+)\/(.+)$/;

/**
 * Parse a blob URL, or return null when it is malformed.
 */
export function parseBlobUrl(url: string): BlobRef | null {
  const match = BLOB_URL_PATTERN.exec(url);
  if (!match || !match[1] || !match[2] || !match[3]) {
    return null;
  }
  return { storage: match[1], container: match[2], name: match[3] };
}

/**
 * Parse a blob URL and check it lives in the machine's storage account.
 *
 * @throws ConfigError if the URL is malformed or names another account
 */
export function resolveBlobRef(url: string, storage: string | null): BlobRef {
  const blob = parseBlobUrl(url);
  if (!blob) {
    throw new ConfigError(`failed to parse BLOB URL ${url}`, 'CONFIG_VALIDATION_FAILED');
  }
  if (blob.storage !== storage) {
    throw new ConfigError(
      `storage ${storage ?? '(none)'} provided in the deployment specification doesn't match the storage of BLOB ${url}`,
      'CONFIG_VALIDATION_FAILED'
    );
  }
  return blob;
}

/**
 * URL of a snapshot of the blob at `url`.
 */
export function snapshotUrl(url: string, snapshotId: string): string {
  return `${url}?snapshot=${snapshotId}`;
}
