import { describe, it, expect, vi } from 'vitest';
import { createHttpClient, HttpError } from '../../src/shared/api';

describe('createHttpClient', () => {
  it('builds the URL from base, path and defined params', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{"ok":true}'));
    vi.stubGlobal('fetch', fetchMock);
    const http = createHttpClient({ baseUrl: 'https://api.example.test/v3/' });

    const body = await http.get<{ ok: boolean }>('search', {
      params: { q: 'live now', maxResults: 1, skip: undefined },
    });

    expect(body).toEqual({ ok: true });
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.example.test/v3/search?q=live+now&maxResults=1');
  });

  it('only sets a signal when a timeout is configured', async () => {
    const fetchMock = vi.fn().mockImplementation(async () => new Response('{}'));
    vi.stubGlobal('fetch', fetchMock);

    await createHttpClient({ baseUrl: 'https://api.example.test/' }).get('a');
    await createHttpClient({ baseUrl: 'https://api.example.test/', timeout: 1000 }).get('a');

    expect(fetchMock.mock.calls[0][1].signal).toBeUndefined();
    expect(fetchMock.mock.calls[1][1].signal).toBeInstanceOf(AbortSignal);
  });

  it('reads binary bodies with their content type', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        new Response(Uint8Array.from([1, 2, 3]), { headers: { 'Content-Type': 'image/webp' } })
      )
    );

    const image = await createHttpClient().getBinary('https://i.example.test/a.webp');

    expect(image).toEqual({ data: Uint8Array.from([1, 2, 3]), contentType: 'image/webp' });
  });

  it('throws HttpError with status and body', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(new Response('server down', { status: 503, statusText: 'Service Unavailable' }))
    );

    const error = await createHttpClient({ baseUrl: 'https://api.example.test/' })
      .get('a')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 503, body: 'server down' });
  });
});
