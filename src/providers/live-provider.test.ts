import { describe, it, expect, vi, afterEach } from 'vitest';
import { LiveProvider, buildUserAgent } from './live-provider.js';
import { NotFoundError, ProviderUnavailableError } from '../shared/errors.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';

const live = {
  ...DEFAULT_CONFIG.live,
  crossref_url: 'https://crossref.test/',
  opencitations_url: 'https://coci.test/api',
  mailto: 'team@example.org',
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(handler: (url: string) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (input: string | URL | Request) => handler(String(input)));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('buildUserAgent', () => {
  it('adds a contact address when one is configured', () => {
    expect(buildUserAgent('1.2.3', 'me@example.org')).toBe('citegraph/1.2.3 (mailto:me@example.org)');
    expect(buildUserAgent('1.2.3', null)).toBe('citegraph/1.2.3');
  });
});

describe('LiveProvider.fetchForward', () => {
  it('maps a Crossref work to metadata and references', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({
        message: {
          DOI: '10.1000/ABC',
          title: ['A study of things'],
          author: [{ given: 'Ann', family: 'Lee' }, { family: 'Chen' }, { name: 'The Consortium' }],
          issued: { 'date-parts': [[2018, 3]] },
          'published-print': { 'date-parts': [[2019]] },
          'container-title': ['Journal of Things'],
          reference: [{ DOI: '10.1000/r1' }, { key: 'no-doi' }, { DOI: '10.1000/r2' }],
        },
      }),
    );
    const provider = new LiveProvider(live, '0.1.0');

    const outcome = await provider.fetchForward('10.1000/abc');

    expect(outcome).toEqual({
      ok: true,
      metadata: {
        title: 'A study of things',
        authors: ['Ann Lee', 'Chen', 'The Consortium'],
        year: 2019,
        venue: 'Journal of Things',
        rawId: '10.1000/ABC',
      },
      references: ['10.1000/r1', '10.1000/r2'],
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://crossref.test/works/10.1000/abc');
  });

  it('falls back to the issued year and nulls for missing fields', async () => {
    stubFetch(() => jsonResponse({ message: { issued: { 'date-parts': [[2001]] } } }));
    const outcome = await new LiveProvider(live, '0.1.0').fetchForward('10.1/x');
    expect(outcome).toEqual({
      ok: true,
      metadata: { title: null, authors: [], year: 2001, venue: null, rawId: '10.1/x' },
      references: [],
    });
  });

  it('encodes unsafe characters within path segments', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ message: {} }));
    await new LiveProvider(live, '0.1.0').fetchForward('10.1002/(SICI)1097#x');
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://crossref.test/works/10.1002/(SICI)1097%23x');
  });

  it('reports a 404 as not found', async () => {
    stubFetch(() => new Response('Resource not found.', { status: 404 }));
    const outcome = await new LiveProvider(live, '0.1.0').fetchForward('10.1/missing');
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(NotFoundError);
      expect(outcome.error.message).toBe('10.1/missing not found in Crossref');
    }
  });

  it('reports a server error as unavailable', async () => {
    stubFetch(() => new Response('oops', { status: 503 }));
    const outcome = await new LiveProvider(live, '0.1.0').fetchForward('10.1/x');
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(ProviderUnavailableError);
      expect(outcome.error.message).toBe('Provider unavailable for 10.1/x: Crossref: HTTP 503');
    }
  });

  it('reports a network error as unavailable', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });
    const outcome = await new LiveProvider(live, '0.1.0').fetchForward('10.1/x');
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('Provider unavailable for 10.1/x: Crossref: fetch failed');
    }
  });

  it('reports an unexpected body as unavailable', async () => {
    stubFetch(() => jsonResponse({ status: 'ok' }));
    const outcome = await new LiveProvider(live, '0.1.0').fetchForward('10.1/x');
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('Provider unavailable for 10.1/x: Crossref: malformed work record');
    }
  });

  it('sends the user agent', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit) => {
      expect(init?.headers).toMatchObject({ 'User-Agent': 'citegraph/0.1.0 (mailto:team@example.org)' });
      return jsonResponse({ message: {} });
    });
    vi.stubGlobal('fetch', fetchMock);
    await new LiveProvider(live, '0.1.0').fetchForward('10.1/x');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe('LiveProvider.fetchBackward', () => {
  it('lists citing works', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse([{ citing: '10.2/a', cited: '10.1/x' }, { cited: '10.1/x' }, { citing: '10.2/b' }]),
    );
    const outcome = await new LiveProvider(live, '0.1.0').fetchBackward('10.1/x');
    expect(outcome).toEqual({ ok: true, citers: ['10.2/a', '10.2/b'] });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://coci.test/api/citations/10.1/x');
  });

  it('reports an empty body as unavailable', async () => {
    stubFetch(() => new Response('', { status: 200 }));
    const outcome = await new LiveProvider(live, '0.1.0').fetchBackward('10.1/x');
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('Provider unavailable for 10.1/x: OpenCitations: empty response body');
    }
  });

  it('reports a caller abort as unavailable', async () => {
    const controller = new AbortController();
    controller.abort();
    stubFetch(() => {
      throw new DOMException('This operation was aborted', 'AbortError');
    });
    const outcome = await new LiveProvider(live, '0.1.0').fetchBackward('10.1/x', controller.signal);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('Provider unavailable for 10.1/x: OpenCitations: aborted');
    }
  });
});
