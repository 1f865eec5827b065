import { getDefaultLexicon } from '@shared/lexicon';
import { buildBrowseSearchUrl, createEbayBrowseSearch, envCredentialProvider, parseItemSummaries } from './ebay-api';
import { formatCompsLogLine } from './comps-logger';
import { ErrorCode, SearchUnavailableError } from './error-handling';

const lexicon = getDefaultLexicon();

interface RecordedCall {
  url: string;
  headers: Record<string, string>;
}

function fakeFetch(responses: Array<() => Response>): { fetchImpl: typeof fetch; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    calls.push({ url: String(input), headers });
    const next = responses[Math.min(calls.length, responses.length) - 1];
    return next();
  };
  return { fetchImpl, calls };
}

const page = {
  total: 3,
  itemSummaries: [
    {
      itemId: 'v1|111|0',
      title: 'Nike Air Max 90 White',
      price: { value: '89.99', currency: 'USD' },
      image: { imageUrl: 'https://i.ebayimg.com/111.jpg' },
      itemWebUrl: 'https://www.ebay.com/itm/111',
    },
    {
      itemId: 'v1|222|0',
      title: 'Nike Air Max 90',
      thumbnailImages: [{ imageUrl: 'https://i.ebayimg.com/222-thumb.jpg' }],
    },
    { itemId: 'v1|333|0', price: { value: '10.00' } },
  ],
};

describe('parseItemSummaries', () => {
  it('should map items and drop ones missing required fields', () => {
    expect(parseItemSummaries(page)).toEqual([
      {
        id: 'v1|111|0',
        title: 'Nike Air Max 90 White',
        price: 89.99,
        imageUrl: 'https://i.ebayimg.com/111.jpg',
        canonicalUrl: 'https://www.ebay.com/itm/111',
      },
      {
        id: 'v1|222|0',
        title: 'Nike Air Max 90',
        price: undefined,
        imageUrl: 'https://i.ebayimg.com/222-thumb.jpg',
        canonicalUrl: 'https://www.ebay.com/itm/v1%7C222%7C0',
      },
    ]);
  });

  it('should treat a page without items as empty', () => {
    expect(parseItemSummaries({ total: 0 })).toEqual([]);
  });
});

describe('buildBrowseSearchUrl', () => {
  it('should clamp the limit and add the category id', () => {
    const url = buildBrowseSearchUrl('https://api.ebay.com', 'nike air max', { limit: 500, categoryFilter: 'Shoes' }, lexicon);

    expect(url).toBe(
      'https://api.ebay.com/buy/browse/v1/item_summary/search' +
      '?q=nike+air+max&limit=200&filter=buyingOptions%3A%7BFIXED_PRICE%7D&category_ids=93427'
    );
  });

  it('should ignore categories without an id', () => {
    const url = buildBrowseSearchUrl('https://api.ebay.com', 'vase', { limit: 20, categoryFilter: 'Pottery' }, lexicon);

    expect(url).not.toContain('category_ids');
  });
});

describe('createEbayBrowseSearch', () => {
  it('should send the bearer token and marketplace header', async () => {
    const { fetchImpl, calls } = fakeFetch([() => Response.json(page)]);
    const search = createEbayBrowseSearch({
      credentialProvider: envCredentialProvider('test-token'),
      lexicon,
      marketplaceId: 'EBAY_GB',
      fetchImpl,
    });

    const listings = await search('nike air max', { limit: 20 });

    expect(listings).toHaveLength(2);
    expect(calls).toHaveLength(1);
    expect(calls[0].headers['authorization']).toBe('Bearer test-token');
    expect(calls[0].headers['x-ebay-c-marketplace-id']).toBe('EBAY_GB');
  });

  it('should reject with SearchUnavailableError on a 5xx answer', async () => {
    const { fetchImpl } = fakeFetch([() => new Response('Service Unavailable', { status: 503 })]);
    const search = createEbayBrowseSearch({
      credentialProvider: envCredentialProvider('test-token'),
      lexicon,
      fetchImpl,
      retry: { maxRetries: 0 },
    });

    const error = await search('nike air max', { limit: 20 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SearchUnavailableError);
    if (error instanceof SearchUnavailableError) {
      expect(error.code).toBe(ErrorCode.SEARCH_UNAVAILABLE);
      expect(error.status).toBe(503);
      expect(error.message).toBe('Browse API: 503 - Service Unavailable');
    }
  });

  it('should not retry a rejected request', async () => {
    const { fetchImpl, calls } = fakeFetch([() => new Response('bad filter', { status: 400 })]);
    const search = createEbayBrowseSearch({ credentialProvider: envCredentialProvider('test-token'), lexicon, fetchImpl });

    await expect(search('nike', { limit: 20 })).rejects.toMatchObject({ code: ErrorCode.SEARCH_REJECTED });
    expect(calls).toHaveLength(1);
  });

  it('should retry a rate-limited request', async () => {
    const { fetchImpl, calls } = fakeFetch([
      () => new Response('slow down', { status: 429 }),
      () => Response.json(page),
    ]);
    const search = createEbayBrowseSearch({
      credentialProvider: envCredentialProvider('test-token'),
      lexicon,
      fetchImpl,
      retry: { maxRetries: 1, initialDelayMs: 1, jitter: false },
    });

    const listings = await search('nike', { limit: 20 });

    expect(listings).toHaveLength(2);
    expect(calls).toHaveLength(2);
  });

  it('should abort the request when the deadline passes', async () => {
    const signals: AbortSignal[] = [];
    const fetchImpl: typeof fetch = (_input, init) => new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (signal) {
        signals.push(signal);
        signal.addEventListener('abort', () => reject(new Error('socket closed')));
      }
    });
    const search = createEbayBrowseSearch({
      credentialProvider: envCredentialProvider('test-token'),
      lexicon,
      fetchImpl,
      timeoutMs: 30,
      retry: { maxRetries: 2, initialDelayMs: 1 },
    });

    const error = await search('nike', { limit: 20 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SearchUnavailableError);
    expect(error).toMatchObject({ code: ErrorCode.SEARCH_UNAVAILABLE, message: 'Operation timed out after 30ms' });
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });

  it('should not call out without a token', async () => {
    const { fetchImpl, calls } = fakeFetch([() => Response.json(page)]);
    const search = createEbayBrowseSearch({ credentialProvider: envCredentialProvider(undefined), lexicon, fetchImpl });

    await expect(search('nike', { limit: 20 })).rejects.toThrow('EBAY_OAUTH_TOKEN is not configured');
    expect(calls).toHaveLength(0);
  });
});

describe('formatCompsLogLine', () => {
  it('should format a failed request', () => {
    expect(formatCompsLogLine({
      source: 'browse',
      queries: ['nike air max'],
      category: 'Shoes',
      resultsCount: 0,
      error: 'Browse API: 503',
      durationMs: 12,
      apiEndpoint: 'browse/search',
    })).toBe(
      '[COMPS:ERROR] query="nike air max" | category="Shoes" | results=0 | duration=12ms | endpoint=browse/search | error="Browse API: 503"'
    );
  });

  it('should list every query the pipeline tried', () => {
    expect(formatCompsLogLine({
      source: 'pipeline',
      queries: ['Polo Shirt', 'cotton "slim" Polo Shirt'],
      resultsCount: 0,
    })).toBe('[COMPS:PIPELINE] queries=["Polo Shirt", "cotton \\"slim\\" Polo Shirt"] | results=0');
  });
});
