import * as log from '../util/log';
import { ListingUnavailableError } from '../errors';
import { IHttpClient } from '../http';
import { CompilerArtifact, isCanonicalVersion } from '../model';
import { IVersionSource, VersionDeduplicator } from './version-source';

export const DEFAULT_BASE_URL = 'https://binaries.soliditylang.org/linux-amd64';

export const LISTING_DOCUMENT = 'list.json';

export interface RemoteListingOptions {
  readonly baseUrl: string;
  readonly platform: string;
}

export interface ListingEntry {
  readonly fileName: string;
  readonly version: string;
}

/**
 * Artifacts from the official binary listing
 */
export class RemoteListingSource implements IVersionSource {
  private readonly baseUrl: string;

  constructor(private readonly http: IHttpClient, private readonly options: RemoteListingOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  public describe() {
    return this.baseUrl;
  }

  public async *artifacts(): AsyncIterable<CompilerArtifact> {
    const listingUrl = `${this.baseUrl}/${LISTING_DOCUMENT}`;
    log.info(`Fetching version list from ${listingUrl}`);

    let document: string;
    try {
      document = await this.http.getText(listingUrl);
    } catch (e) {
      throw new ListingUnavailableError(listingUrl, e);
    }

    const entries = parseListing(document, this.options.platform);
    if (entries.length === 0) {
      throw new ListingUnavailableError(listingUrl, `no solc-${this.options.platform} binaries found in listing`);
    }
    log.info(`Found ${entries.length} versions`);

    const dedup = new VersionDeduplicator();
    for (const entry of entries) {
      const artifact: CompilerArtifact = {
        version: entry.version,
        platform: this.options.platform,
        origin: { type: 'remote', url: `${this.baseUrl}/${entry.fileName}` },
      };
      if (dedup.admit(artifact)) {
        yield artifact;
      }
    }
  }
}

/**
 * Find binary file names in a listing document
 *
 * The document is scanned as text, so both the JSON build list and an HTML
 * directory index work. Names are returned once each, in order of first
 * appearance. Prerelease builds don't match and are left out.
 */
export function parseListing(document: string, platform: string): ListingEntry[] {
  const pattern = new RegExp(`solc-${escapeRegExp(platform)}-v(\\d+\\.\\d+\\.\\d+)\\+commit\\.([0-9a-f]+)(?![0-9A-Za-z.+-])`, 'g');

  const ret = new Array<ListingEntry>();
  const seen = new Set<string>();
  for (const m of document.matchAll(pattern)) {
    const fileName = m[0];
    const version = `v${m[1]}+commit.${m[2]}`;
    if (seen.has(fileName) || !isCanonicalVersion(version)) { continue; }
    seen.add(fileName);
    ret.push({ fileName, version });
  }
  return ret;
}

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
