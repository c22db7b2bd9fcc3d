/**
 * Where the bytes of an artifact come from
 */
export type ArtifactOrigin =
  | { readonly type: 'remote'; readonly url: string }
  | { readonly type: 'local'; readonly path: string };

/**
 * One compiler binary to reconcile with the destination store
 */
export interface CompilerArtifact {
  /**
   * Canonical version token, e.g. `v0.8.29+commit.d4b8c7ae`
   */
  readonly version: string;

  /**
   * Target triple, e.g. `linux-amd64`
   */
  readonly platform: string;

  readonly origin: ArtifactOrigin;

  /**
   * Informational only
   */
  readonly sizeHint?: number;
}

export type TransferOutcome =
  | {
    readonly kind: 'uploaded';
    readonly version: string;
    readonly bytes: number;
    readonly digest: string;
    /**
     * Only the hash file was written, derived from the binary already stored
     */
    readonly repairedHash: boolean;
  }
  | { readonly kind: 'skipped-existing'; readonly version: string }
  | { readonly kind: 'failed'; readonly version: string; readonly reason: string };

export interface VersionToken {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly commit: string;
}

const CANONICAL_VERSION = /^v(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)\+commit\.([0-9a-f]{6,40})$/;

/**
 * Parse a canonical version token, returning undefined if it is malformed
 */
export function parseVersionToken(version: string): VersionToken | undefined {
  const m = CANONICAL_VERSION.exec(version);
  if (!m) { return undefined; }
  return {
    major: parseInt(m[1], 10),
    minor: parseInt(m[2], 10),
    patch: parseInt(m[3], 10),
    commit: m[4],
  };
}

export function isCanonicalVersion(version: string) {
  return parseVersionToken(version) !== undefined;
}

/**
 * Order by numeric major, minor and patch; anything else by plain string
 */
export function compareVersions(a: string, b: string): number {
  const va = parseVersionToken(a);
  const vb = parseVersionToken(b);
  if (va && vb) {
    const d = va.major - vb.major || va.minor - vb.minor || va.patch - vb.patch;
    if (d !== 0) { return d; }
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function describeOrigin(origin: ArtifactOrigin) {
  switch (origin.type) {
    case 'remote': return origin.url;
    case 'local': return origin.path;
  }
}
