import { isCanonicalVersion } from './model';

export const BINARY_NAME = 'solc';
export const HASH_FILE_NAME = 'sha256.hash';

export interface DestinationKey {
  readonly binaryKey: string;
  readonly hashKey: string;
}

/**
 * Object keys for one compiler version
 *
 * Both objects live under `[prefix/]<platform>/<version>/`.
 */
export function destinationKeys(platform: string, version: string, prefix?: string): DestinationKey {
  if (!isCanonicalVersion(version)) {
    throw new Error(`Not a canonical version token: ${version}`);
  }
  if (!/^[A-Za-z0-9._-]+$/.test(platform)) {
    throw new Error(`Invalid platform: ${platform}`);
  }

  const dir = [trimSlashes(prefix ?? ''), platform, version].filter(x => x !== '').join('/');
  return {
    binaryKey: `${dir}/${BINARY_NAME}`,
    hashKey: `${dir}/${HASH_FILE_NAME}`,
  };
}

function trimSlashes(x: string) {
  return x.replace(/^\/+|\/+$/g, '');
}
