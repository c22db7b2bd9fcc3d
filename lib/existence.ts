import { DestinationKey } from './destination';
import { IObjectStore } from './stores/object-store';

/**
 * What the destination already holds for one version
 *
 * - `absent`: no binary
 * - `complete`: binary and hash file (or binary, when hash files aren't checked)
 * - `binary-only`: binary without its hash file
 */
export type ExistingState = 'absent' | 'complete' | 'binary-only';

/**
 * Probe the store for a version's objects using metadata requests only
 */
export async function checkExisting(store: IObjectStore, keys: DestinationKey, verifyHashFile: boolean): Promise<ExistingState> {
  if (!await store.exists(keys.binaryKey)) { return 'absent'; }
  if (!verifyHashFile) { return 'complete'; }
  return await store.exists(keys.hashKey) ? 'complete' : 'binary-only';
}
