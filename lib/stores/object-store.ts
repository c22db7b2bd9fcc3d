/**
 * The destination for compiler binaries and their hash files
 */
export interface IObjectStore {
  /**
   * Human-readable location, for log messages
   */
  readonly displayName: string;

  /**
   * Whether an object exists, without downloading it
   */
  exists(key: string): Promise<boolean>;

  get(key: string): Promise<Uint8Array>;

  put(key: string, body: Uint8Array, contentType?: string): Promise<void>;
}
