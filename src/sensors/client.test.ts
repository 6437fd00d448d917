import { afterEach, describe, expect, it, vi } from 'vitest';

import { baseUrl, createSensorClient, dataPath } from '@sensors/client';

function stubFetch(
  impl: (url: string, init?: RequestInit) => Promise<Response>,
) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function json(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('baseUrl', () => {
  it('defaults to https and drops trailing slashes', () => {
    expect(baseUrl('sensor.local')).toBe('https://sensor.local');
    expect(baseUrl('http://10.0.0.5/')).toBe('http://10.0.0.5');
    expect(baseUrl(' HTTPS://sensor.local ')).toBe('HTTPS://sensor.local');
  });
});

describe('dataPath', () => {
  it('appends the data resource', () => {
    expect(dataPath('/livingroom')).toBe('/livingroom/data/');
    expect(dataPath('/livingroom/')).toBe('/livingroom/data/');
    expect(dataPath('office')).toBe('/office/data/');
  });
});

describe('createSensorClient', () => {
  it('returns the envelope from the content field', async () => {
    const fetchMock = stubFetch(async () => json({ content: 'ZW52ZWxvcGU=' }));
    const client = createSensorClient('sensor.local');

    expect(await client.fetchEnvelope('/livingroom')).toEqual({
      ok: true,
      value: 'ZW52ZWxvcGU=',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://sensor.local/livingroom/data/',
    );
  });

  it('reports non-success statuses', async () => {
    stubFetch(async () => new Response('busy', { status: 503 }));
    const result = await createSensorClient('sensor.local').fetchEnvelope('/a');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('http_status');
      expect(result.error.status).toBe(503);
    }
  });

  it('reports bodies without content', async () => {
    stubFetch(async () => json({ id: 'abc' }));
    const result = await createSensorClient('sensor.local').fetchEnvelope('/a');

    expect(result.ok ? 'ok' : result.error.kind).toBe('invalid_body');
  });

  it('reports bodies that are not JSON', async () => {
    stubFetch(async () => new Response('<html></html>', { status: 200 }));
    const result = await createSensorClient('sensor.local').fetchEnvelope('/a');

    expect(result.ok ? 'ok' : result.error.kind).toBe('invalid_body');
  });

  it('reports connection failures with their cause', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed', {
        cause: new Error('connect ECONNREFUSED'),
      });
    });
    const result = await createSensorClient('sensor.local').fetchEnvelope('/a');

    expect(result).toEqual({
      ok: false,
      error: {
        type: 'transport',
        kind: 'connection',
        message: 'fetch failed: connect ECONNREFUSED',
      },
    });
  });

  it('gives up after the timeout', async () => {
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () =>
            reject(new Error('This operation was aborted')),
          );
        }),
    );
    const result = await createSensorClient('sensor.local', 20).fetchEnvelope(
      '/a',
    );

    expect(result).toEqual({
      ok: false,
      error: {
        type: 'transport',
        kind: 'timeout',
        message: 'No response within 20ms',
      },
    });
  });
});
