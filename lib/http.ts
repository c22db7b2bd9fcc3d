import axios, { AxiosInstance } from 'axios';
import { TransferFailedError } from './errors';

/**
 * HTTP access needed by the remote listing source and the downloader
 */
export interface IHttpClient {
  getText(url: string): Promise<string>;
  getBytes(url: string): Promise<Uint8Array>;
}

export interface HttpClientOptions {
  /**
   * @default 30000
   */
  readonly listingTimeoutMs?: number;

  /**
   * @default 300000
   */
  readonly downloadTimeoutMs?: number;
}

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ECONNABORTED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE']);

export class AxiosHttpClient implements IHttpClient {
  private readonly http: AxiosInstance;
  private readonly listingTimeoutMs: number;
  private readonly downloadTimeoutMs: number;

  constructor(options: HttpClientOptions = {}) {
    this.listingTimeoutMs = options.listingTimeoutMs ?? 30_000;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? 300_000;
    this.http = axios.create({ maxRedirects: 5 });
  }

  public async getText(url: string): Promise<string> {
    try {
      const response = await this.http.get<string>(url, {
        timeout: this.listingTimeoutMs,
        responseType: 'text',
        transformResponse: (x: string) => x,
      });
      return response.data;
    } catch (e) {
      throw toTransferError(url, e);
    }
  }

  public async getBytes(url: string): Promise<Uint8Array> {
    try {
      const response = await this.http.get<ArrayBuffer>(url, {
        timeout: this.downloadTimeoutMs,
        responseType: 'arraybuffer',
      });
      return new Uint8Array(response.data);
    } catch (e) {
      throw toTransferError(url, e);
    }
  }
}

/**
 * Classify an axios failure: network trouble, 5xx and 429 are worth retrying
 */
export function toTransferError(url: string, e: unknown): TransferFailedError {
  if (!axios.isAxiosError(e)) {
    return new TransferFailedError(`GET ${url} failed: ${e}`);
  }

  const status = e.response?.status;
  if (status !== undefined) {
    return new TransferFailedError(`GET ${url} failed: HTTP ${status}`, status >= 500 || status === 429);
  }
  return new TransferFailedError(`GET ${url} failed: ${e.code ?? e.message}`, TRANSIENT_CODES.has(e.code ?? ''));
}

export function isTransient(e: unknown) {
  return e instanceof TransferFailedError && e.transient;
}
