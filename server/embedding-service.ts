import sharp from 'sharp';
import { z } from 'zod';
import { callJinaWithRetry, withTimeout } from './retry-strategy';
import { AppError, ErrorCode } from './error-handling';
import type { LazyHandle } from './lazy-handle';

const JINA_API_URL = 'https://api.jina.ai/v1/embeddings';
const EMBEDDING_MODEL = 'jina-clip-v1';

// 4 bins per channel -> 64-dim histogram
const HISTOGRAM_BINS = 4;
const HISTOGRAM_SAMPLE_SIZE = 64;

export interface ImageEmbedder {
  readonly name: string;
  embedImage(image: Buffer, signal?: AbortSignal): Promise<number[]>;
}

export interface MultimodalEmbedder extends ImageEmbedder {
  embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

const jinaResponseSchema = z.object({
  data: z.array(z.object({
    index: z.number().optional(),
    embedding: z.array(z.number()).min(1),
  })).min(1),
});

export interface JinaClipEmbedderOptions {
  apiKey: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class JinaClipEmbedder implements MultimodalEmbedder {
  readonly name = 'jina-clip';
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: JinaClipEmbedderOptions) {
    if (!options.apiKey) {
      throw new Error('JINA_API_KEY is required for image embeddings');
    }
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async embedImage(image: Buffer, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.request([{ image: `data:image/jpeg;base64,${image.toString('base64')}` }], signal);
    return embedding;
  }

  async embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    return this.request(texts.map(text => ({ text })), signal);
  }

  private async request(input: Array<{ image: string } | { text: string }>, signal?: AbortSignal): Promise<number[][]> {
    const call = async () => {
      const response = await this.fetchImpl(JINA_API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({ model: EMBEDDING_MODEL, input }),
        signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        // Sanitize HTML error pages from response
        const cleanError = errorText.includes('<!DOCTYPE') || errorText.includes('<html')
          ? response.statusText || 'API error'
          : errorText.slice(0, 200);
        // 429 and 5xx are retried; other 4xx are final
        const code = response.status >= 400 && response.status < 500 && response.status !== 429
          ? ErrorCode.EMBEDDING_REJECTED
          : ErrorCode.EMBEDDING_FAILED;
        throw new AppError(code, new Error(`Jina API error: ${response.status} - ${cleanError}`), { status: response.status });
      }

      const parsed = jinaResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('Invalid response from Jina API: missing embedding');
      }
      return [...parsed.data.data]
        .sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
        .map(item => item.embedding);
    };

    const embeddings = await withTimeout(callJinaWithRetry(call), this.options.timeoutMs, ErrorCode.UPSTREAM_TIMEOUT);
    if (embeddings.length !== input.length) {
      throw new Error(`Jina API returned ${embeddings.length} embeddings for ${input.length} inputs`);
    }
    return embeddings;
  }
}

/**
 * Local fallback embedder: a normalized RGB color histogram over a
 * downsampled copy of the image. Coarse, but needs no network.
 */
export class ColorHistogramEmbedder implements ImageEmbedder {
  readonly name = 'color-histogram';

  async embedImage(image: Buffer): Promise<number[]> {
    const { data, info } = await sharp(image)
      .rotate()
      .resize(HISTOGRAM_SAMPLE_SIZE, HISTOGRAM_SAMPLE_SIZE, { fit: 'fill' })
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    const histogram = new Array<number>(HISTOGRAM_BINS ** 3).fill(0);
    const binWidth = 256 / HISTOGRAM_BINS;
    for (let i = 0; i + 2 < data.length; i += info.channels) {
      const r = Math.floor(data[i] / binWidth);
      const g = Math.floor(data[i + 1] / binWidth);
      const b = Math.floor(data[i + 2] / binWidth);
      histogram[r * HISTOGRAM_BINS * HISTOGRAM_BINS + g * HISTOGRAM_BINS + b] += 1;
    }

    const total = histogram.reduce((sum, v) => sum + v, 0);
    return total > 0 ? histogram.map(v => v / total) : histogram;
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) return 0;

  return dotProduct / magnitude;
}

/**
 * Uses the primary embedder when its client could be built, the local
 * histogram otherwise. The choice is made once per process.
 */
export class PreferredImageEmbedder implements ImageEmbedder {
  constructor(
    private readonly primary: LazyHandle<ImageEmbedder>,
    private readonly fallback: ImageEmbedder
  ) {}

  get name(): string {
    return this.selected().name;
  }

  embedImage(image: Buffer, signal?: AbortSignal): Promise<number[]> {
    return this.selected().embedImage(image, signal);
  }

  private selected(): ImageEmbedder {
    const acquired = this.primary.get();
    return acquired.ok ? acquired.value : this.fallback;
  }
}
