import * as child_process from 'child_process';
import { promises as fs } from 'fs';
import * as util from 'util';
import * as log from '../util/log';
import { describeError } from '../errors';

const cpExecFile = util.promisify(child_process.execFile);

export type Result<A, E = Error> =
  | { readonly ok: true; readonly value: A }
  | { readonly ok: false; readonly error: E };

/**
 * Asks a compiler binary to report its version
 *
 * Resolves to the raw output; never rejects.
 */
export interface IVersionQuery {
  queryVersion(binaryPath: string): Promise<Result<string>>;
}

export interface ExecVersionQueryOptions {
  /**
   * @default 30000
   */
  readonly timeoutMs?: number;

  /**
   * Set the executable bits before running the binary
   *
   * @default true
   */
  readonly makeExecutable?: boolean;
}

/**
 * Runs `<binary> --version`
 */
export class ExecVersionQuery implements IVersionQuery {
  private readonly timeoutMs: number;
  private readonly makeExecutable: boolean;

  constructor(options: ExecVersionQueryOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.makeExecutable = options.makeExecutable ?? true;
  }

  public async queryVersion(binaryPath: string): Promise<Result<string>> {
    try {
      if (this.makeExecutable) {
        await fs.chmod(binaryPath, 0o755);
      }

      log.debug(`${binaryPath} --version`);
      const { stdout } = await cpExecFile(binaryPath, ['--version'], {
        timeout: this.timeoutMs,
        encoding: 'utf-8',
      });
      return { ok: true, value: stdout };
    } catch (e) {
      return { ok: false, error: new Error(`'${binaryPath} --version' failed: ${describeError(e)}`) };
    }
  }
}
