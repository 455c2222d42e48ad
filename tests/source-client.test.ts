import { describe, it, expect } from 'vitest';
import axios, { AxiosError, InternalAxiosRequestConfig } from 'axios';
import { SourceClient, DEFAULT_TIMEOUT_MS } from '../src/ncore/source-client';
import { ErrorCode, SourceFetchError } from '../src/utils/errors';
import { FULL_PROFILE, profilePage } from './helpers/profile-page';

const BASE_URL = 'https://tracker.test/profile.php?id=';
const CREDENTIALS = { nick: 'test-nick', pass: 'test-pass' };
const ALICE = { displayName: 'Alice', remoteId: '12345' };

// In-process transport: records each request and answers with a fixed response
function stubHttp(respond: (config: InternalAxiosRequestConfig) => { status: number; body: string }) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const { status, body } = respond(config);
      return { data: body, status, statusText: String(status), headers: {}, config };
    },
  });
  return { http, requests };
}

describe('SourceClient', () => {
  it('should request the profile url with the credential cookie', async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, body: profilePage(FULL_PROFILE) }));
    const client = new SourceClient(CREDENTIALS, { baseUrl: BASE_URL, http });

    await client.fetch(ALICE);

    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('get');
    expect(requests[0].url).toBe('https://tracker.test/profile.php?id=12345');
    expect(requests[0].headers.get('Cookie')).toBe('nick=test-nick; pass=test-pass');
  });

  it('should bound every request with a timeout', async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, body: '<html></html>' }));

    await new SourceClient(CREDENTIALS, { baseUrl: BASE_URL, http }).fetch(ALICE);
    await new SourceClient(CREDENTIALS, { baseUrl: BASE_URL, http, timeoutMs: 5000 }).fetch(ALICE);

    expect(requests[0].timeout).toBe(DEFAULT_TIMEOUT_MS);
    expect(requests[1].timeout).toBe(5000);
  });

  it('should return the parsed document', async () => {
    const { http } = stubHttp(() => ({ status: 200, body: profilePage(FULL_PROFILE) }));
    const client = new SourceClient(CREDENTIALS, { baseUrl: BASE_URL, http });

    const $ = await client.fetch(ALICE);

    expect($('title').text()).toBe('Profil');
    expect($('.userbox_tartalom_mini .profil_jobb_elso2')).toHaveLength(5);
  });

  it('should reject non-200 responses with the account name and status', async () => {
    const { http } = stubHttp(() => ({ status: 403, body: 'Forbidden' }));
    const client = new SourceClient(CREDENTIALS, { baseUrl: BASE_URL, http });

    const error = await client.fetch(ALICE).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceFetchError);
    expect(error).toMatchObject({
      owner: 'Alice',
      status: 403,
      message: 'Received non-200 status code for Alice: 403',
    });
  });

  it('should treat redirects and server errors alike', async () => {
    const { http } = stubHttp((config) => ({ status: config.url?.endsWith('=1') ? 302 : 500, body: '' }));
    const client = new SourceClient(CREDENTIALS, { baseUrl: BASE_URL, http });

    await expect(client.fetch({ displayName: 'A', remoteId: '1' })).rejects.toMatchObject({ status: 302 });
    await expect(client.fetch({ displayName: 'B', remoteId: '2' })).rejects.toMatchObject({ status: 500 });
  });

  it('should wrap transport failures in a SourceFetchError', async () => {
    const http = axios.create({
      adapter: async () => {
        throw new Error('socket hang up');
      },
    });
    const client = new SourceClient(CREDENTIALS, { baseUrl: BASE_URL, http });

    const error = await client.fetch(ALICE).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceFetchError);
    expect(error).toMatchObject({ owner: 'Alice', message: 'Error performing request: socket hang up' });
    expect(error).toHaveProperty('status', undefined);
    expect(error).toHaveProperty('code', ErrorCode.SOURCE_FETCH_ERROR);
  });

  it('should mark a timed-out request as a timeout', async () => {
    const http = axios.create({
      adapter: async () => {
        throw new AxiosError('timeout of 5ms exceeded', 'ECONNABORTED');
      },
    });
    const client = new SourceClient(CREDENTIALS, { baseUrl: BASE_URL, http, timeoutMs: 5 });

    const error = await client.fetch(ALICE).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceFetchError);
    expect(error).toMatchObject({
      owner: 'Alice',
      code: ErrorCode.SOURCE_TIMEOUT,
      message: 'Error performing request: timeout of 5ms exceeded',
    });
  });

  it('should encode the remote id into the url', () => {
    const client = new SourceClient(CREDENTIALS, { baseUrl: BASE_URL });

    expect(client.profileUrl('12 34&x')).toBe('https://tracker.test/profile.php?id=12%2034%26x');
  });
});
