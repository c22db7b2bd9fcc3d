import * as log from './util/log';
import { PromisePool } from './util/concurrency';
import { describeError } from './errors';
import { CompilerArtifact, TransferOutcome } from './model';
import { IVersionSource } from './sources/version-source';
import { OutcomeTally, SyncSummary } from './summary';

/**
 * Anything that can turn an artifact into an outcome without throwing
 */
export interface IArtifactProcessor {
  process(artifact: CompilerArtifact): Promise<TransferOutcome>;
}

export interface SynchronizeOptions {
  /**
   * Maximum number of artifacts in flight
   *
   * @default 3
   */
  readonly workers?: number;

  /**
   * Stops artifacts that haven't started yet; running ones finish
   */
  readonly signal?: AbortSignal;

  readonly onOutcome?: (outcome: TransferOutcome) => void;
}

/**
 * Process every artifact from the source with bounded concurrency
 *
 * Rejects only if the source itself fails; per-artifact failures end up in
 * the summary.
 */
export async function synchronize(source: IVersionSource, processor: IArtifactProcessor, options: SynchronizeOptions = {}): Promise<SyncSummary> {
  const workers = options.workers ?? 3;
  const pool = new PromisePool(workers);
  const tally = new OutcomeTally();
  log.debug(`Synchronizing ${source.describe()} with concurrency ${workers}`);

  const pending = new Array<Promise<void>>();
  try {
    for await (const artifact of source.artifacts()) {
      pending.push(pool.queue(async () => {
        if (options.signal?.aborted) {
          tally.recordCancelled();
          return;
        }

        const outcome = await processSafely(processor, artifact);
        tally.record(outcome);
        options.onOutcome?.(outcome);
      }));
    }
  } catch (e) {
    // Let whatever already started finish before reporting
    await Promise.allSettled(pending);
    throw e;
  }

  await Promise.all(pending);
  log.debug(`Peak concurrency: ${pool.peak}`);
  return tally.summary();
}

async function processSafely(processor: IArtifactProcessor, artifact: CompilerArtifact): Promise<TransferOutcome> {
  try {
    return await processor.process(artifact);
  } catch (e) {
    return { kind: 'failed', version: artifact.version, reason: describeError(e) };
  }
}
