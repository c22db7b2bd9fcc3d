import { PromisePool } from '../lib/util/concurrency';

test('refuses a non-positive bound', () => {
  expect(() => new PromisePool(0)).toThrow('Need a positive integer, got: 0');
  expect(() => new PromisePool(1.5)).toThrow();
});

test('starts thunks in order and keeps their results in order', async () => {
  const pool = new PromisePool(2);
  const started = new Array<number>();

  const results = await Promise.all([3, 1, 2, 0].map((n, i) => pool.queue(async () => {
    started.push(i);
    await new Promise((ok) => setTimeout(ok, n * 3));
    return n * 10;
  })));

  expect(started).toEqual([0, 1, 2, 3]);
  expect(results).toEqual([30, 10, 20, 0]);
  expect(pool.peak).toEqual(2);
});

test('a rejected thunk frees its slot', async () => {
  const pool = new PromisePool(1);

  const failing = pool.queue(async () => { throw new Error('nope'); });
  const next = pool.queue(async () => 'ok');

  await expect(failing).rejects.toThrow('nope');
  await expect(next).resolves.toEqual('ok');
});

test('a thunk that throws synchronously is a rejection', async () => {
  const pool = new PromisePool(1);

  const thunk = (): Promise<string> => { throw new Error('sync'); };

  await expect(pool.queue(thunk)).rejects.toThrow('sync');
  await expect(pool.queue(async () => 'after')).resolves.toEqual('after');
});
