/**
 * Controls how many promises are executed at once
 *
 * Thunks are started in the order they were queued. A thunk only starts
 * once fewer than `maxN` others are running.
 */
export class PromisePool {
  private readonly _queue: Array<() => Promise<void>> = [];
  private _active = 0;
  private _peak = 0;

  constructor(private readonly maxN: number) {
    if (!Number.isInteger(maxN) || maxN < 1) {
      throw new Error(`Need a positive integer, got: ${maxN}`);
    }
  }

  /**
   * Highest number of thunks that were ever running at the same time
   */
  public get peak() { return this._peak; }

  public queue<A>(pThunk: () => Promise<A>): Promise<A> {
    return new Promise<A>((resolve, reject) => {
      this._queue.push(async () => {
        try {
          resolve(await pThunk());
        } catch (e) {
          reject(e);
        }
      });
      this.launchMore();
    });
  }

  private launchMore() {
    while (this._active < this.maxN) {
      const next = this._queue.shift();
      if (!next) { return; }

      this._active += 1;
      this._peak = Math.max(this._peak, this._active);

      void next().finally(() => {
        this._active -= 1;
        this.launchMore();
      });
    }
  }
}
