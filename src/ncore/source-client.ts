import axios, { AxiosInstance, AxiosResponse } from 'axios';
import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { Account } from '../types';
import { logger, SourceFetchError, errorMessage } from '../utils';

export const DEFAULT_TIMEOUT_MS = 30000;

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function isTimeout(error: unknown): boolean {
  return axios.isAxiosError(error) && error.code !== undefined && TIMEOUT_CODES.has(error.code);
}

export interface Credentials {
  nick: string;
  pass: string;
}

export interface SourceClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

/**
 * Retrieves one profile page per call. There is no retry here: a failed
 * account simply has no snapshot this cycle and is tried again next cycle.
 */
export class SourceClient {
  private client: AxiosInstance;
  private credentials: Credentials;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(credentials: Credentials, options: SourceClientOptions) {
    this.credentials = credentials;
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.client = options.http ?? axios.create({
      headers: { 'User-Agent': 'ncore-stats' },
    });
  }

  profileUrl(remoteId: string): string {
    return this.baseUrl + encodeURIComponent(remoteId);
  }

  async fetch(account: Pick<Account, 'displayName' | 'remoteId'>): Promise<CheerioAPI> {
    const url = this.profileUrl(account.remoteId);
    const start = Date.now();

    let response: AxiosResponse<string>;
    try {
      response = await this.client.get<string>(url, {
        timeout: this.timeoutMs,
        responseType: 'text',
        headers: { Cookie: `nick=${this.credentials.nick}; pass=${this.credentials.pass}` },
        // Status handling happens below so every failure carries the account name
        validateStatus: () => true,
      });
    } catch (error) {
      logger.warn('SourceClient', 'Profile request failed', {
        owner: account.displayName,
        latencyMs: Date.now() - start,
        error: errorMessage(error),
      });
      throw new SourceFetchError(account.displayName, `Error performing request: ${errorMessage(error)}`, {
        timedOut: isTimeout(error),
      });
    }

    logger.debug('SourceClient', 'Profile request completed', {
      owner: account.displayName,
      status: response.status,
      latencyMs: Date.now() - start,
    });

    if (response.status !== 200) {
      throw new SourceFetchError(
        account.displayName,
        `Received non-200 status code for ${account.displayName}: ${response.status}`,
        { status: response.status }
      );
    }

    return cheerio.load(String(response.data));
  }
}
