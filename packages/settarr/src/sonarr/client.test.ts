import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SonarrRequestError } from '../errors.js';
import { SonarrClient } from './client.js';

function stubFetch(respond: () => Response) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond());
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

beforeEach(() => {
  vi.stubEnv('SONARR_URL', '');
  vi.stubEnv('SONARR_API_KEY', '');
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
});

describe('SonarrClient', () => {
  it('sends the api key to the v3 endpoint', async () => {
    const fetchMock = stubFetch(() => new Response('[]', { status: 200 }));
    const client = new SonarrClient({ url: 'sonarr:8989/', apiKey: 'test-secret' });

    expect(await client.getQualityProfiles()).toEqual([]);

    const [input, init] = fetchMock.mock.calls[0] ?? [];
    expect(input).toBe('http://sonarr:8989/api/v3/qualityprofile');
    expect(init?.method).toBe('GET');
    expect(new Headers(init?.headers).get('X-Api-Key')).toBe('test-secret');
  });

  it('puts a quality definition to its id', async () => {
    const definition = {
      id: 2,
      quality: { id: 2, name: 'DVD' },
      title: 'DVD',
      weight: 3,
      minSize: 2,
      preferredSize: 50,
      maxSize: 60,
    };
    const fetchMock = stubFetch(() => new Response(JSON.stringify(definition), { status: 202 }));
    const client = new SonarrClient({ url: 'https://sonarr.example', apiKey: 'test-secret' });

    await client.updateQualityDefinition(definition);

    const [input, init] = fetchMock.mock.calls[0] ?? [];
    expect(input).toBe('https://sonarr.example/api/v3/qualitydefinition/2');
    expect(init?.method).toBe('PUT');
    expect(JSON.parse(String(init?.body))).toEqual(definition);
  });

  it('accepts an empty response body', async () => {
    stubFetch(() => new Response('', { status: 200 }));
    const client = new SonarrClient({ url: 'http://sonarr:8989', apiKey: 'test-secret' });

    await expect(client.deleteQualityProfile(3)).resolves.toBeUndefined();
  });

  it('raises a request error on a failed response', async () => {
    stubFetch(() => new Response('boom', { status: 500, statusText: 'Internal Server Error' }));
    const client = new SonarrClient({ url: 'http://sonarr:8989', apiKey: 'test-secret' });

    const error = await client.listCustomFormats().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SonarrRequestError);
    expect(error).toMatchObject({
      message: 'Sonarr request GET http://sonarr:8989/api/v3/customformat failed: HTTP 500 Internal Server Error',
      status: 500,
      body: 'boom',
    });
  });

  it('falls back to the environment', () => {
    vi.stubEnv('SONARR_URL', 'http://env-sonarr:8989');
    vi.stubEnv('SONARR_API_KEY', 'test-secret');
    expect(() => new SonarrClient()).not.toThrow();
  });

  it('requires a url and an api key', () => {
    expect(() => new SonarrClient({ apiKey: 'test-secret' })).toThrow('Sonarr URL not set');
    expect(() => new SonarrClient({ url: 'http://sonarr:8989' })).toThrow('Sonarr API key not set');
  });
});
