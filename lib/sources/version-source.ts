import * as log from '../util/log';
import { CompilerArtifact, describeOrigin } from '../model';

/**
 * Produces the artifacts to synchronize
 *
 * Fatal problems (the source cannot be enumerated at all) are thrown as
 * `ListingUnavailableError`; problems with individual entries are logged
 * and the entry is left out.
 */
export interface IVersionSource {
  describe(): string;
  artifacts(): AsyncIterable<CompilerArtifact>;
}

/**
 * Truncate a source to its first `limit` artifacts
 *
 * The source is always enumerated in full first, so which artifacts are kept
 * does not depend on how the source happens to schedule its work.
 */
export function limitArtifacts(source: IVersionSource, limit?: number): IVersionSource {
  if (limit === undefined) { return source; }

  return {
    describe: () => `${source.describe()} (limit ${limit})`,
    artifacts: async function*() {
      const all = new Array<CompilerArtifact>();
      for await (const artifact of source.artifacts()) {
        all.push(artifact);
      }
      if (all.length > limit) {
        log.info(`Limiting processing to ${limit} of ${all.length} versions`);
      }
      yield* all.slice(0, limit);
    },
  };
}

/**
 * Tracks versions already produced, so no version is handed out twice
 */
export class VersionDeduplicator {
  private readonly seen = new Map<string, CompilerArtifact>();

  /**
   * Returns true if this is the first artifact with its version
   */
  public admit(artifact: CompilerArtifact): boolean {
    const first = this.seen.get(artifact.version);
    if (first) {
      if (describeOrigin(first.origin) !== describeOrigin(artifact.origin)) {
        log.warning(`Ignoring ${describeOrigin(artifact.origin)}: ${artifact.version} already provided by ${describeOrigin(first.origin)}`);
      }
      return false;
    }
    this.seen.set(artifact.version, artifact);
    return true;
  }
}
