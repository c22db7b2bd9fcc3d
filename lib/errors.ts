import { SimpleError } from './util/flow';

/**
 * The artifact source could not be listed at all; nothing can be synced
 */
export class ListingUnavailableError extends SimpleError {
  constructor(source: string, cause: unknown) {
    super(`Listing unavailable (${source}): ${describeError(cause)}`);
  }
}

/**
 * A single candidate did not report a usable version
 */
export class VersionUnparsableError extends SimpleError {
  constructor(public readonly candidate: string, detail: string) {
    super(`Could not determine version of ${candidate}: ${detail}`);
  }
}

export class ConfigError extends SimpleError {
}

/**
 * Fetching, reading or uploading one artifact failed
 */
export class TransferFailedError extends Error {
  constructor(message: string, public readonly transient: boolean = false) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The binary made it to the store but the hash file did not
 *
 * Retrying the whole artifact is safe.
 */
export class PartialUploadError extends TransferFailedError {
  constructor(key: string, cause: unknown) {
    super(`Uploaded binary but not its hash file ${key}: ${describeError(cause)}`);
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) { return e.message || e.name; }
  return `${e}`;
}
