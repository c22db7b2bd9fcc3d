import * as path from 'path';
import * as log from '../util/log';
import { DirectoryEntry, exists, statEntries } from '../util/files';
import { describeError, ListingUnavailableError, VersionUnparsableError } from '../errors';
import { BINARY_NAME } from '../destination';
import { CompilerArtifact, isCanonicalVersion } from '../model';
import { IVersionQuery } from './version-query';
import { IVersionSource, VersionDeduplicator } from './version-source';

export interface LocalScanOptions {
  readonly root: string;
  readonly platform: string;
}

/**
 * Artifacts from compiler binaries in a local directory
 *
 * Each candidate binary is run to find out which version it is.
 */
export class LocalScanSource implements IVersionSource {
  constructor(private readonly versionQuery: IVersionQuery, private readonly options: LocalScanOptions) {
  }

  public describe() {
    return path.resolve(this.options.root);
  }

  public async *artifacts(): AsyncIterable<CompilerArtifact> {
    const root = path.resolve(this.options.root);
    log.info(`Scanning local compiler directory: ${root}`);

    let candidates: string[];
    try {
      candidates = await findCandidateFiles(root);
    } catch (e) {
      throw new ListingUnavailableError(root, e);
    }

    const dedup = new VersionDeduplicator();
    let found = 0;
    for (const candidate of candidates) {
      const version = await this.versionOf(candidate);
      if (version === undefined) { continue; }

      const artifact: CompilerArtifact = {
        version,
        platform: this.options.platform,
        origin: { type: 'local', path: candidate },
      };
      if (dedup.admit(artifact)) {
        log.info(`Found compiler ${version}: ${candidate}`);
        found += 1;
        yield artifact;
      }
    }

    if (found === 0) {
      log.warning(`No local compiler files found in ${root}`);
    }
  }

  private async versionOf(candidate: string): Promise<string | undefined> {
    const result = await this.versionQuery.queryVersion(candidate);
    if (!result.ok) {
      log.warning(new VersionUnparsableError(candidate, result.error.message).message);
      return undefined;
    }

    const version = extractVersionToken(result.value);
    if (version === undefined) {
      log.warning(new VersionUnparsableError(candidate, `no version in output: ${JSON.stringify(result.value.trim())}`).message);
    }
    return version;
  }
}

/**
 * Files named like the compiler, directly in `root` or one directory down
 *
 * Entries and subdirectories that cannot be read are skipped with a warning;
 * only an unusable `root` is an error.
 */
export async function findCandidateFiles(root: string): Promise<string[]> {
  if (!await exists(root, (s) => s.isDirectory())) {
    throw new Error(`Local directory does not exist: ${root}`);
  }

  const onError = (fullPath: string, e: unknown) => {
    log.warning(`Skipping ${fullPath}: ${describeError(e)}`);
  };

  const topLevel = await statEntries(root, { onError });
  const ret = topLevel.filter(isCandidate).map(e => e.path);

  for (const dir of topLevel.filter(e => e.stats.isDirectory())) {
    try {
      const entries = await statEntries(dir.path, { filter: isCandidateName, onError });
      ret.push(...entries.filter(isCandidate).map(e => e.path));
    } catch (e) {
      onError(dir.path, e);
    }
  }
  return ret;
}

function isCandidate(entry: DirectoryEntry) {
  return entry.stats.isFile() && isCandidateName(entry.name);
}

function isCandidateName(name: string) {
  return name.startsWith(BINARY_NAME);
}

/**
 * Find the canonical version token in `solc --version` output
 *
 * `Version: 0.8.29-develop.2025.9.18+commit.d4b8c7ae.Darwin.appleclang`
 * becomes `v0.8.29+commit.d4b8c7ae`.
 */
export function extractVersionToken(output: string): string | undefined {
  const m = /^.*Version:\s*(\d+\.\d+\.\d+)(?:-[0-9A-Za-z.-]*)?\+commit\.([0-9a-f]+)/m.exec(output);
  if (!m) { return undefined; }
  const version = `v${m[1]}+commit.${m[2]}`;
  return isCanonicalVersion(version) ? version : undefined;
}
