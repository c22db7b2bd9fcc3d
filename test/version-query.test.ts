import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ExecVersionQuery } from '../lib/sources/version-query';

const VERSION_OUTPUT = 'solc, the solidity compiler commandline interface\nVersion: 0.8.29+commit.d4b8c7ae.Linux.g++\n';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'solc-sync-query-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function script(name: string, body: string) {
  const fullPath = path.join(dir, name);
  await fs.writeFile(fullPath, `#!/bin/sh\n${body}\n`, { mode: 0o644 });
  return fullPath;
}

test('binary is made executable and its output captured', async () => {
  const solc = await script('solc', `printf '${VERSION_OUTPUT.replace(/\n/g, '\\n')}'`);

  const result = await new ExecVersionQuery().queryVersion(solc);

  expect(result).toEqual({ ok: true, value: VERSION_OUTPUT });
  expect((await fs.stat(solc)).mode & 0o777).toEqual(0o755);
});

test('nonzero exit is a failed result', async () => {
  const solc = await script('solc', 'echo broken >&2\nexit 1');

  const result = await new ExecVersionQuery().queryVersion(solc);

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.message).toContain(`'${solc} --version' failed: `);
    expect(result.error.message).toContain('broken');
  }
});

test('file that cannot be executed is a failed result', async () => {
  const solc = await script('solc', 'echo never');

  const result = await new ExecVersionQuery({ makeExecutable: false }).queryVersion(solc);

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.message).toContain('EACCES');
  }
});

test('missing file is a failed result', async () => {
  const result = await new ExecVersionQuery().queryVersion(path.join(dir, 'nope'));

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.message).toContain('ENOENT');
  }
});

test('a binary that hangs is stopped after the timeout', async () => {
  const solc = await script('solc', 'exec sleep 10');
  const start = Date.now();

  const result = await new ExecVersionQuery({ timeoutMs: 200 }).queryVersion(solc);

  expect(result.ok).toBe(false);
  expect(Date.now() - start).toBeLessThan(5000);
});
