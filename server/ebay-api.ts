/**
 * eBay Browse API Gateway
 *
 * Marketplace search used by the analysis pipeline. Credentials come from a
 * caller-supplied provider; this module never obtains or refreshes OAuth
 * tokens itself.
 *
 * Failure contract: unreachable upstream, missing credentials and non-2xx
 * answers all reject with SearchUnavailableError. Items missing fields are
 * dropped rather than failing the page.
 */

import { z } from 'zod';
import type { CandidateListing, MarketplaceSearchFn, SearchOptions } from '@shared/schema';
import type { Lexicon } from '@shared/lexicon';
import { ErrorCode, SearchUnavailableError, errorMessage } from './error-handling';
import { callEbayWithRetry, withTimeout, type RetryOptions } from './retry-strategy';
import { logCompsRequest } from './comps-logger';

const BROWSE_SEARCH_PATH = '/buy/browse/v1/item_summary/search';
const MAX_LIMIT = 200;

/** Returns a bearer token for the Browse API. */
export type BearerCredentialProvider = () => Promise<string>;

export function envCredentialProvider(token: string | undefined): BearerCredentialProvider {
  return async () => {
    if (!token) {
      throw new SearchUnavailableError('EBAY_OAUTH_TOKEN is not configured');
    }
    return token;
  };
}

const itemSummarySchema = z.object({
  itemId: z.string(),
  title: z.string(),
  price: z.object({ value: z.string(), currency: z.string().optional() }).optional(),
  image: z.object({ imageUrl: z.string() }).optional(),
  thumbnailImages: z.array(z.object({ imageUrl: z.string() })).optional(),
  itemWebUrl: z.string().optional(),
});

const searchResponseSchema = z.object({
  total: z.number().optional(),
  itemSummaries: z.array(z.unknown()).optional(),
});

export function parseItemSummaries(payload: unknown): CandidateListing[] {
  const parsed = searchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SearchUnavailableError('Unexpected Browse API payload');
  }

  const listings: CandidateListing[] = [];
  for (const raw of parsed.data.itemSummaries ?? []) {
    const item = itemSummarySchema.safeParse(raw);
    if (!item.success) continue;

    const price = item.data.price ? Number.parseFloat(item.data.price.value) : undefined;
    listings.push({
      id: item.data.itemId,
      title: item.data.title,
      price: price !== undefined && Number.isFinite(price) ? price : undefined,
      imageUrl: item.data.image?.imageUrl ?? item.data.thumbnailImages?.[0]?.imageUrl ?? '',
      canonicalUrl: item.data.itemWebUrl ?? `https://www.ebay.com/itm/${encodeURIComponent(item.data.itemId)}`,
    });
  }
  return listings;
}

export interface EbayBrowseSearchOptions {
  credentialProvider: BearerCredentialProvider;
  lexicon: Lexicon;
  marketplaceId?: string;
  apiBase?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  retry?: RetryOptions;
}

export function buildBrowseSearchUrl(
  apiBase: string,
  queryText: string,
  options: SearchOptions,
  lexicon: Lexicon
): string {
  const params = new URLSearchParams({
    q: queryText,
    limit: String(Math.min(MAX_LIMIT, Math.max(1, options.limit))),
    filter: 'buyingOptions:{FIXED_PRICE}',
  });

  const categoryId = options.categoryFilter ? lexicon.categoryIds[options.categoryFilter] : undefined;
  if (categoryId) {
    params.set('category_ids', categoryId);
  }

  return `${apiBase}${BROWSE_SEARCH_PATH}?${params.toString()}`;
}

export function createEbayBrowseSearch(options: EbayBrowseSearchOptions): MarketplaceSearchFn {
  const fetchImpl = options.fetchImpl ?? fetch;
  const apiBase = options.apiBase ?? 'https://api.ebay.com';
  const marketplaceId = options.marketplaceId ?? 'EBAY_US';
  const timeoutMs = options.timeoutMs ?? 10000;

  return async (queryText, searchOptions) => {
    const startTime = Date.now();
    const category = searchOptions.categoryFilter ?? '';
    const url = buildBrowseSearchUrl(apiBase, queryText, searchOptions, options.lexicon);
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    searchOptions.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const token = await options.credentialProvider();

      const listings = await withTimeout(
        callEbayWithRetry(async () => {
          const response = await fetchImpl(url, {
            headers: {
              'Authorization': `Bearer ${token}`,
              'X-EBAY-C-MARKETPLACE-ID': marketplaceId,
              'Accept': 'application/json',
            },
            signal: controller.signal,
          });

          if (!response.ok) {
            const errorText = await response.text();
            // 429 and 5xx are retried; other 4xx are final
            throw new SearchUnavailableError(
              `Browse API: ${response.status} - ${errorText.slice(0, 100)}`,
              response.status
            );
          }

          return parseItemSummaries(await response.json());
        }, { ...options.retry, signal: controller.signal }),
        timeoutMs,
        ErrorCode.SEARCH_UNAVAILABLE
      );

      logCompsRequest({
        source: 'browse',
        queries: [queryText],
        category,
        resultsCount: listings.length,
        durationMs: Date.now() - startTime,
        apiEndpoint: 'browse/search',
      });
      return listings;
    } catch (error) {
      controller.abort();
      const message = errorMessage(error);
      logCompsRequest({
        source: 'browse',
        queries: [queryText],
        category,
        resultsCount: 0,
        error: message,
        durationMs: Date.now() - startTime,
        apiEndpoint: 'browse/search',
      });
      throw error instanceof SearchUnavailableError ? error : new SearchUnavailableError(message);
    } finally {
      searchOptions.signal?.removeEventListener('abort', onAbort);
    }
  };
}
