import { destinationKeys } from '../lib/destination';
import { compareVersions, isCanonicalVersion, parseVersionToken } from '../lib/model';
import { versions } from './fakes';

test('canonical version tokens are parsed', () => {
  expect(parseVersionToken('v0.8.29+commit.d4b8c7ae')).toEqual({
    major: 0,
    minor: 8,
    patch: 29,
    commit: 'd4b8c7ae',
  });
});

test('malformed version tokens are rejected', () => {
  expect(isCanonicalVersion('0.8.29+commit.d4b8c7ae')).toBe(false);
  expect(isCanonicalVersion('v0.8.29')).toBe(false);
  expect(isCanonicalVersion('v0.08.1+commit.d4b8c7ae')).toBe(false);
  expect(isCanonicalVersion('v0.8.29+commit.D4B8C7AE')).toBe(false);
  expect(isCanonicalVersion('v0.8.29-nightly+commit.d4b8c7ae')).toBe(false);
  expect(isCanonicalVersion('v0.8.29+commit.d4b8c7ae/../x')).toBe(false);
});

test('versions sort numerically', () => {
  expect([
    'v0.8.10+commit.0000000a',
    'v0.10.0+commit.abcdef01',
    'v0.8.2+commit.00000002',
    'v0.8.2+commit.00000001',
    'not-a-version',
  ].sort(compareVersions)).toEqual([
    'not-a-version',
    'v0.8.2+commit.00000001',
    'v0.8.2+commit.00000002',
    'v0.8.10+commit.0000000a',
    'v0.10.0+commit.abcdef01',
  ]);
});

test('keys are rooted at the platform', () => {
  expect(destinationKeys('linux-amd64', 'v0.8.29+commit.d4b8c7ae')).toEqual({
    binaryKey: 'linux-amd64/v0.8.29+commit.d4b8c7ae/solc',
    hashKey: 'linux-amd64/v0.8.29+commit.d4b8c7ae/sha256.hash',
  });
});

test('prefix goes in front of the platform, without stray slashes', () => {
  expect(destinationKeys('linux-amd64', 'v0.8.29+commit.d4b8c7ae', '/mirror/solc/').binaryKey)
    .toEqual('mirror/solc/linux-amd64/v0.8.29+commit.d4b8c7ae/solc');
});

test('same version and platform always map to the same keys', () => {
  expect(destinationKeys('linux-amd64', 'v0.4.26+commit.4563c3fc'))
    .toEqual(destinationKeys('linux-amd64', 'v0.4.26+commit.4563c3fc'));
});

test('different versions never share a key', () => {
  const keys = versions(50).flatMap(v => {
    const k = destinationKeys('linux-amd64', v);
    return [k.binaryKey, k.hashKey];
  });
  expect(new Set(keys).size).toEqual(100);
});

test('non-canonical versions are refused', () => {
  expect(() => destinationKeys('linux-amd64', 'v0.8.29')).toThrow(/Not a canonical version token/);
  expect(() => destinationKeys('linux/amd64', 'v0.8.29+commit.d4b8c7ae')).toThrow(/Invalid platform/);
});
