import { promises as fs } from 'fs';
import * as log from './util/log';
import { contentHash } from './util/files';
import { Retry, RetryOptions } from './util/retry';
import { DestinationKey, destinationKeys } from './destination';
import { describeError, PartialUploadError, TransferFailedError } from './errors';
import { checkExisting } from './existence';
import { IHttpClient, isTransient } from './http';
import { CompilerArtifact, TransferOutcome } from './model';
import { IObjectStore } from './stores/object-store';

export interface TransferWorkerOptions {
  readonly store: IObjectStore;
  readonly http: IHttpClient;

  /**
   * Key prefix in the store, before the platform
   */
  readonly prefix?: string;

  /**
   * Also require the hash file before skipping a version, and regenerate it
   * from the stored binary when it is missing
   *
   * @default true
   */
  readonly verifyHashFile?: boolean;

  /**
   * Backoff for downloads. Only transient network errors are retried.
   */
  readonly retry?: Omit<RetryOptions, 'shouldRetry' | 'onRetry'>;
}

/**
 * Brings one compiler version into the store
 */
export class TransferWorker {
  private readonly store: IObjectStore;
  private readonly http: IHttpClient;
  private readonly verifyHashFile: boolean;
  private readonly retry: Retry;

  constructor(private readonly options: TransferWorkerOptions) {
    this.store = options.store;
    this.http = options.http;
    this.verifyHashFile = options.verifyHashFile ?? true;
    this.retry = new Retry({
      ...options.retry,
      shouldRetry: isTransient,
      onRetry: (e, attempt, delayMs) => {
        log.warning(`${describeError(e)} (retry ${attempt} in ${(delayMs / 1000).toFixed(1)}s)`);
      },
    });
  }

  /**
   * Process an artifact; failures are reported in the outcome, never thrown
   */
  public async process(artifact: CompilerArtifact): Promise<TransferOutcome> {
    const version = artifact.version;
    try {
      const keys = destinationKeys(artifact.platform, version, this.options.prefix);

      switch (await checkExisting(this.store, keys, this.verifyHashFile)) {
        case 'complete':
          log.info(`Skipping existing version: ${version}`);
          return { kind: 'skipped-existing', version };
        case 'binary-only':
          return await this.repairHashFile(version, keys);
        case 'absent':
          return await this.transfer(artifact, keys);
      }
    } catch (e) {
      const reason = describeError(e);
      log.error(`Failed to process version ${version}: ${reason}`);
      return { kind: 'failed', version, reason };
    }
  }

  private async transfer(artifact: CompilerArtifact, keys: DestinationKey): Promise<TransferOutcome> {
    const bytes = await this.fetchBytes(artifact);
    const digest = contentHash(bytes);

    try {
      await this.store.put(keys.binaryKey, bytes, 'application/octet-stream');
    } catch (e) {
      throw new TransferFailedError(`Upload of ${keys.binaryKey} failed: ${describeError(e)}`);
    }
    await this.putHashFile(keys, digest);

    log.info(`Upload completed ${artifact.version} (${bytes.length} bytes, hash: ${digest.substring(0, 16)}...)`);
    return { kind: 'uploaded', version: artifact.version, bytes: bytes.length, digest, repairedHash: false };
  }

  /**
   * A previous run stored the binary but not its hash file
   *
   * Hash what is actually stored rather than what the source has now, so the
   * pair stays consistent.
   */
  private async repairHashFile(version: string, keys: DestinationKey): Promise<TransferOutcome> {
    log.warning(`${version} is missing ${keys.hashKey}, hashing the stored binary`);

    const stored = await this.store.get(keys.binaryKey);
    const digest = contentHash(stored);
    await this.putHashFile(keys, digest);

    log.info(`Hash file restored ${version} (hash: ${digest.substring(0, 16)}...)`);
    return { kind: 'uploaded', version, bytes: stored.length, digest, repairedHash: true };
  }

  private async putHashFile(keys: DestinationKey, digest: string) {
    try {
      await this.store.put(keys.hashKey, Buffer.from(digest, 'utf-8'), 'text/plain');
    } catch (e) {
      throw new PartialUploadError(keys.hashKey, e);
    }
  }

  private async fetchBytes(artifact: CompilerArtifact): Promise<Uint8Array> {
    const origin = artifact.origin;
    switch (origin.type) {
      case 'remote':
        log.info(`Downloading ${artifact.version}: ${origin.url}`);
        return this.retry.execute(() => this.http.getBytes(origin.url));

      case 'local':
        log.info(`Reading local compiler ${artifact.version}: ${origin.path}`);
        try {
          return await fs.readFile(origin.path);
        } catch (e) {
          throw new TransferFailedError(`Reading ${origin.path} failed: ${describeError(e)}`);
        }
    }
  }
}
