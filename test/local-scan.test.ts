import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ListingUnavailableError } from '../lib/errors';
import { extractVersionToken, findCandidateFiles, LocalScanSource } from '../lib/sources/local-scan';
import { captureLogs, collect, FakeVersionQuery } from './fakes';

const SOLC_0_8_29 = 'solc, the solidity compiler commandline interface\nVersion: 0.8.29+commit.d4b8c7ae.Linux.g++\n';
const SOLC_0_8_19 = 'solc, the solidity compiler commandline interface\nVersion: 0.8.19+commit.7dd6d404.Linux.g++\n';

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'solc-sync-scan-'));
  await touch('solc');
  await touch('solc-0.8.19');
  await touch('other-tool');
  await touch('bin/solc-nightly');
  await touch('docs/deep/solc');
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

test('candidates are solc-prefixed files in the root and one level down', async () => {
  expect(await findCandidateFiles(root)).toEqual([
    path.join(root, 'solc'),
    path.join(root, 'solc-0.8.19'),
    path.join(root, 'bin', 'solc-nightly'),
  ]);
});

test('unreadable entries are skipped with a warning', async () => {
  const logs = captureLogs();
  await fs.symlink('loop', path.join(root, 'loop'));
  await fs.symlink('solc-loop', path.join(root, 'bin', 'solc-loop'));

  expect(await findCandidateFiles(root)).toEqual([
    path.join(root, 'solc'),
    path.join(root, 'solc-0.8.19'),
    path.join(root, 'bin', 'solc-nightly'),
  ]);
  expect(logs.filter(l => l.level === 'warning').map(l => l.message)).toEqual([
    expect.stringContaining(`Skipping ${path.join(root, 'loop')}: ELOOP`),
    expect.stringContaining(`Skipping ${path.join(root, 'bin', 'solc-loop')}: ELOOP`),
  ]);
});

test('missing root directory is a listing failure', async () => {
  const source = new LocalScanSource(new FakeVersionQuery({}), { root: path.join(root, 'nope'), platform: 'linux-amd64' });

  await expect(collect(source.artifacts())).rejects.toBeInstanceOf(ListingUnavailableError);
});

test('binaries that report a version become artifacts', async () => {
  const query = new FakeVersionQuery({
    [path.join(root, 'solc')]: SOLC_0_8_29,
    [path.join(root, 'solc-0.8.19')]: SOLC_0_8_19,
    [path.join(root, 'bin', 'solc-nightly')]: new Error('spawn EACCES'),
  });
  const source = new LocalScanSource(query, { root, platform: 'linux-amd64' });

  expect(await collect(source.artifacts())).toEqual([
    { version: 'v0.8.29+commit.d4b8c7ae', platform: 'linux-amd64', origin: { type: 'local', path: path.join(root, 'solc') } },
    { version: 'v0.8.19+commit.7dd6d404', platform: 'linux-amd64', origin: { type: 'local', path: path.join(root, 'solc-0.8.19') } },
  ]);
  expect(query.queried).toHaveLength(3);
});

test('a binary that cannot run is a warning, not an error', async () => {
  const logs = captureLogs();
  const query = new FakeVersionQuery({
    [path.join(root, 'solc')]: SOLC_0_8_29,
    [path.join(root, 'solc-0.8.19')]: new Error('cannot execute binary file'),
    [path.join(root, 'bin', 'solc-nightly')]: 'Segmentation fault',
  });
  const source = new LocalScanSource(query, { root, platform: 'linux-amd64' });

  const artifacts = await collect(source.artifacts());

  expect(artifacts.map(a => a.version)).toEqual(['v0.8.29+commit.d4b8c7ae']);
  expect(logs.filter(l => l.level === 'warning').map(l => l.message)).toEqual([
    `Could not determine version of ${path.join(root, 'solc-0.8.19')}: cannot execute binary file`,
    `Could not determine version of ${path.join(root, 'bin', 'solc-nightly')}: no version in output: "Segmentation fault"`,
  ]);
});

test('the first binary of a version wins', async () => {
  const logs = captureLogs();
  const query = new FakeVersionQuery({
    [path.join(root, 'solc')]: SOLC_0_8_29,
    [path.join(root, 'solc-0.8.19')]: SOLC_0_8_29,
  });
  const source = new LocalScanSource(query, { root, platform: 'linux-amd64' });

  const artifacts = await collect(source.artifacts());

  expect(artifacts).toHaveLength(1);
  expect(artifacts[0].origin).toEqual({ type: 'local', path: path.join(root, 'solc') });
  expect(logs).toContainEqual({
    level: 'warning',
    message: `Ignoring ${path.join(root, 'solc-0.8.19')}: v0.8.29+commit.d4b8c7ae already provided by ${path.join(root, 'solc')}`,
  });
});

describe('version extraction', () => {
  test('release build', () => {
    expect(extractVersionToken(SOLC_0_8_29)).toEqual('v0.8.29+commit.d4b8c7ae');
  });

  test('prerelease and platform suffixes are dropped', () => {
    expect(extractVersionToken('Version: 0.8.29-develop.2025.9.18+commit.d4b8c7ae.Darwin.appleclang'))
      .toEqual('v0.8.29+commit.d4b8c7ae');
  });

  test('output without a version does not match', () => {
    expect(extractVersionToken('solc, the solidity compiler commandline interface\n')).toBeUndefined();
    expect(extractVersionToken('Version: 0.4.11')).toBeUndefined();
    expect(extractVersionToken('')).toBeUndefined();
  });
});

async function touch(relPath: string) {
  const fullPath = path.join(root, relPath);
  await fs.mkdir(path.dirname(fullPath), { recursive: true });
  await fs.writeFile(fullPath, `#!/bin/sh\necho ${relPath}\n`);
}
