import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AbortError } from '../error/abortError.js';
import { FetchClient } from './client.js';

const fetchMock = vi.fn<typeof fetch>();

function sentHeaders(call = 0): Headers {
  return new Headers(fetchMock.mock.calls[call]?.[1]?.headers);
}

describe('FetchClient', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  describe('GET', () => {
    it('returns status and raw text without parsing', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{"status":"success"}', { status: 200 }));

      const client = new FetchClient({ headers: { Authorization: 'test-key' } });
      const [err, response] = await client.get('https://api.example.com/v0/users/me', {});

      expect(err).toBeNull();
      expect(response).toEqual({ status: 200, text: '{"status":"success"}' });
      expect(fetchMock).toHaveBeenCalledWith('https://api.example.com/v0/users/me', {
        method: 'GET',
        headers: expect.any(Headers),
      });
      expect(sentHeaders().get('authorization')).toBe('test-key');
      expect(sentHeaders().get('content-type')).toBeNull();
    });

    it('appends query parameters', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      const client = new FetchClient();
      await client.get('https://api.example.com/v0/teams', { query: { limit: 10, after: 't-1' } });

      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.example.com/v0/teams?limit=10&after=t-1');
    });

    it('does not treat non-2xx statuses as errors', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{"message":"Not found"}', { status: 404 }));

      const client = new FetchClient();
      const [err, response] = await client.get('https://api.example.com/v0/items/x', {});

      expect(err).toBeNull();
      expect(response?.status).toBe(404);
      expect(response?.text).toBe('{"message":"Not found"}');
    });

    it('merges per-request headers over the defaults', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      const client = new FetchClient({ headers: { Accept: 'application/json', 'X-Base': '1' } });
      await client.get('https://api.example.com/v0/data', { headers: { 'X-Base': undefined, 'X-Extra': '2' } });

      expect(sentHeaders().get('accept')).toBe('application/json');
      expect(sentHeaders().get('x-base')).toBeNull();
      expect(sentHeaders().get('x-extra')).toBe('2');
    });
  });

  describe('POST and PUT', () => {
    it('encodes the body as JSON with a content type', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      const client = new FetchClient();
      const body = { workspaceId: 'ws-1', title: 'Notes' };
      await client.post('https://api.example.com/v0/items', { body });

      expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
      expect(fetchMock.mock.calls[0]?.[1]?.body).toBe(JSON.stringify(body));
      expect(sentHeaders().get('content-type')).toBe('application/json');
    });

    it('sends PUT requests', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      const client = new FetchClient();
      await client.put('https://api.example.com/v0/items/i-1', { body: { title: 'Renamed' } });

      expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('PUT');
      expect(fetchMock.mock.calls[0]?.[1]?.body).toBe('{"title":"Renamed"}');
    });
  });

  describe('DELETE', () => {
    it('sends no body', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{"status":"success","data":{"id":"i-1"}}', { status: 200 }));

      const client = new FetchClient();
      const [err, response] = await client.delete('https://api.example.com/v0/items/i-1', {});

      expect(err).toBeNull();
      expect(response?.status).toBe(200);
      expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('DELETE');
      expect(fetchMock.mock.calls[0]?.[1]?.body).toBeUndefined();
    });
  });

  describe('failures', () => {
    it('wraps transport errors with the original as cause', async () => {
      const failure = new TypeError('fetch failed');
      fetchMock.mockRejectedValueOnce(failure);

      const client = new FetchClient();
      const [err, response] = await client.get('https://api.example.com/v0/users/me', {});

      expect(response).toBeNull();
      expect(err?.message).toBe('error wrapping GET request in fetchClient');
      expect(err?.cause).toBe(failure);
    });

    it('passes the signal through and surfaces its abort reason', async () => {
      fetchMock.mockImplementationOnce((_input, init) => Promise.reject(init?.signal?.reason));

      const controller = new AbortController();
      const reason = new AbortError('client was closed');
      controller.abort(reason);

      const client = new FetchClient();
      const [err] = await client.get('https://api.example.com/v0/users/me', { signal: controller.signal });

      expect(fetchMock.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
      expect(err?.cause).toBe(reason);
    });
  });
});
