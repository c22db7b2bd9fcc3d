import { compareVersions, TransferOutcome } from './model';

export interface FailureRecord {
  readonly version: string;
  readonly reason: string;
}

export interface SyncSummary {
  readonly uploaded: number;
  readonly skippedExisting: number;
  readonly failed: number;

  /**
   * Artifacts that were never started because the run was cancelled
   */
  readonly cancelled: number;

  /**
   * Sorted by version, so the summary doesn't depend on completion order
   */
  readonly failures: FailureRecord[];

  /**
   * Whether every artifact was processed and none failed
   */
  readonly ok: boolean;
}

/**
 * Accumulates outcomes one at a time
 */
export class OutcomeTally {
  private uploaded = 0;
  private skippedExisting = 0;
  private cancelled = 0;
  private readonly failures = new Array<FailureRecord>();
  private readonly versions = new Set<string>();

  public record(outcome: TransferOutcome) {
    if (this.versions.has(outcome.version)) {
      throw new Error(`Outcome for ${outcome.version} recorded twice`);
    }
    this.versions.add(outcome.version);

    switch (outcome.kind) {
      case 'uploaded':
        this.uploaded += 1;
        break;
      case 'skipped-existing':
        this.skippedExisting += 1;
        break;
      case 'failed':
        this.failures.push({ version: outcome.version, reason: outcome.reason });
        break;
    }
  }

  public recordCancelled() {
    this.cancelled += 1;
  }

  public summary(): SyncSummary {
    const failures = [...this.failures].sort((a, b) => compareVersions(a.version, b.version));
    return {
      uploaded: this.uploaded,
      skippedExisting: this.skippedExisting,
      failed: failures.length,
      cancelled: this.cancelled,
      failures,
      ok: failures.length === 0 && this.cancelled === 0,
    };
  }
}

/**
 * Lines for the end-of-run report
 */
export function formatSummary(summary: SyncSummary, maxFailures = 10): string[] {
  const lines = [
    `   Uploaded: ${summary.uploaded}`,
    `   Skipped (already present): ${summary.skippedExisting}`,
    `   Failed: ${summary.failed}`,
  ];
  if (summary.cancelled > 0) {
    lines.push(`   Cancelled: ${summary.cancelled}`);
  }

  for (const f of summary.failures.slice(0, maxFailures)) {
    lines.push(`   - ${f.version}: ${f.reason}`);
  }
  if (summary.failures.length > maxFailures) {
    lines.push(`   ... and ${summary.failures.length - maxFailures} more failed versions`);
  }
  return lines;
}
