/**
 * Visual Re-ranker
 *
 * Orders candidate listings by how much their photo looks like the source
 * photo. Every candidate comes back: ones whose image cannot be fetched,
 * decoded or embedded score 0 and sink to the bottom.
 */

import sharp from 'sharp';
import type { CandidateListing, RankedComp, RawImage } from '@shared/schema';
import { ErrorCode, errorMessage } from './error-handling';
import { withTimeout } from './retry-strategy';
import { cosineSimilarity, type ImageEmbedder } from './embedding-service';

const MAX_CANDIDATE_IMAGE_BYTES = 10 * 1024 * 1024;
// Candidate images fetched at once
const FETCH_CONCURRENCY = 6;

export interface RerankOptions {
  imageFetchTimeoutMs: number;
  embeddingTimeoutMs: number;
  fetchImpl?: typeof fetch;
}

export interface RerankOutcome {
  comps: RankedComp[];
  scoredCount: number;
  sourceEmbeddingFailed: boolean;
}

export function clampSimilarity(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

async function mapWithConcurrency<T, R>(items: T[], limit: number, fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const workers = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  });
  await Promise.all(workers);
  return results;
}

export class VisualReranker {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly embedder: ImageEmbedder, private readonly options: RerankOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async rank(source: RawImage, candidates: CandidateListing[], signal?: AbortSignal): Promise<RankedComp[]> {
    return (await this.rankWithStats(source, candidates, signal)).comps;
  }

  async rankWithStats(source: RawImage, candidates: CandidateListing[], signal?: AbortSignal): Promise<RerankOutcome> {
    if (candidates.length === 0) {
      return { comps: [], scoredCount: 0, sourceEmbeddingFailed: false };
    }

    let sourceEmbedding: number[];
    try {
      sourceEmbedding = await this.embed(source.data, signal);
    } catch (error) {
      console.warn(`[Reranker] Source embedding failed with ${this.embedder.name}: ${errorMessage(error)}`);
      return {
        comps: candidates.map(c => ({ ...c, visualSimilarityScore: 0 })),
        scoredCount: 0,
        sourceEmbeddingFailed: true,
      };
    }

    let scoredCount = 0;
    const scored = await mapWithConcurrency(candidates, FETCH_CONCURRENCY, async (candidate): Promise<RankedComp> => {
      const score = await this.scoreCandidate(sourceEmbedding, candidate, signal);
      if (score !== null) scoredCount++;
      return { ...candidate, visualSimilarityScore: score ?? 0 };
    });

    // Array.prototype.sort is stable, so ties keep marketplace order
    const comps = [...scored].sort((a, b) => b.visualSimilarityScore - a.visualSimilarityScore);
    console.log(`[Reranker] Scored ${scoredCount}/${candidates.length} candidates with ${this.embedder.name}`);
    return { comps, scoredCount, sourceEmbeddingFailed: false };
  }

  private async scoreCandidate(sourceEmbedding: number[], candidate: CandidateListing, signal?: AbortSignal): Promise<number | null> {
    if (!candidate.imageUrl) return null;
    try {
      const bytes = await this.fetchImage(candidate.imageUrl, signal);
      await sharp(bytes).metadata();
      const embedding = await this.embed(bytes, signal);
      return clampSimilarity(cosineSimilarity(sourceEmbedding, embedding));
    } catch (error) {
      console.warn(`[Reranker] Candidate ${candidate.id} unscored: ${errorMessage(error)}`);
      return null;
    }
  }

  private embed(image: Buffer, signal?: AbortSignal): Promise<number[]> {
    return withTimeout(this.embedder.embedImage(image, signal), this.options.embeddingTimeoutMs, ErrorCode.EMBEDDING_FAILED);
  }

  private async fetchImage(url: string, signal?: AbortSignal): Promise<Buffer> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      // The deadline covers the body as well as the headers
      return await withTimeout(
        this.download(url, controller.signal),
        this.options.imageFetchTimeoutMs,
        ErrorCode.UPSTREAM_TIMEOUT
      );
    } catch (error) {
      controller.abort();
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async download(url: string, signal: AbortSignal): Promise<Buffer> {
    const response = await this.fetchImpl(url, { signal });
    if (!response.ok) {
      throw new Error(`Image fetch failed: ${response.status}`);
    }
    const bytes = Buffer.from(await response.arrayBuffer());
    if (bytes.length === 0 || bytes.length > MAX_CANDIDATE_IMAGE_BYTES) {
      throw new Error(`Image size ${bytes.length} out of range`);
    }
    return bytes;
  }
}
