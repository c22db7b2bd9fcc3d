import * as log from '../util/log';
import { Timer } from '../util/timer';
import { SyncConfig } from '../config';
import { AxiosHttpClient, IHttpClient } from '../http';
import { synchronize } from '../orchestrator';
import { LocalScanSource } from '../sources/local-scan';
import { RemoteListingSource } from '../sources/remote-listing';
import { ExecVersionQuery, IVersionQuery } from '../sources/version-query';
import { IVersionSource, limitArtifacts } from '../sources/version-source';
import { IObjectStore } from '../stores/object-store';
import { S3ObjectStore } from '../stores/s3-store';
import { formatSummary, SyncSummary } from '../summary';
import { TransferWorker } from '../transfer-worker';

/**
 * Collaborators a run talks to; anything left out is built from the config
 */
export interface SyncDependencies {
  readonly store?: IObjectStore;
  readonly http?: IHttpClient;
  readonly versionQuery?: IVersionQuery;

  /**
   * Backoff base for download retries
   */
  readonly retryDelayMs?: number;
}

export interface RunSyncOptions {
  readonly signal?: AbortSignal;
}

export async function runSync(config: SyncConfig, deps: SyncDependencies = {}, options: RunSyncOptions = {}): Promise<SyncSummary> {
  const http = deps.http ?? new AxiosHttpClient();
  const store = deps.store ?? S3ObjectStore.create({
    bucketName: config.bucket,
    region: config.region,
    profileName: config.profile,
  });

  const source = limitArtifacts(makeSource(config, http, deps), config.limit);
  const worker = new TransferWorker({
    store,
    http,
    prefix: config.prefix,
    verifyHashFile: config.verifyHashFile,
    retry: { maxRetries: config.retries, initialDelayMs: deps.retryDelayMs },
  });

  log.info(`Syncing ${source.describe()} to ${store.displayName}`);
  const timer = new Timer('sync');
  let finished = 0;
  const summary = await synchronize(source, worker, {
    workers: config.workers,
    signal: options.signal,
    onOutcome: outcome => {
      finished += 1;
      log.debug(`[${finished}] ${outcome.version}: ${outcome.kind}`);
    },
  });
  timer.stop();

  log.info(`Sync completed in ${timer.humanTime()}:`);
  for (const line of formatSummary(summary)) {
    (summary.ok ? log.info : log.warning)(line);
  }
  return summary;
}

function makeSource(config: SyncConfig, http: IHttpClient, deps: SyncDependencies): IVersionSource {
  switch (config.mode.type) {
    case 'remote':
      return new RemoteListingSource(http, { baseUrl: config.mode.baseUrl, platform: config.platform });
    case 'local':
      return new LocalScanSource(deps.versionQuery ?? new ExecVersionQuery(), { root: config.mode.root, platform: config.platform });
  }
}
