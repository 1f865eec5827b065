/**
 * Vision Expert Adapters
 *
 * One adapter per independent vision service. invoke() always resolves:
 * missing clients, timeouts, transport failures and unparseable payloads all
 * come back as a typed ExpertOutput error. Adapters never see each other's
 * output.
 */

import { ZodError } from 'zod';
import type {
  ClipEncoderFindings,
  ExpertErrorKind,
  ExpertFindings,
  ExpertId,
  ExpertOutput,
  GoogleVisionFindings,
  LabelSignal,
  ObjectSignal,
  RawImage,
  RekognitionFindings,
} from '@shared/schema';
import { AppError, ErrorCode, errorMessage } from './error-handling';
import { withTimeout } from './retry-strategy';
import { cosineSimilarity, type MultimodalEmbedder } from './embedding-service';
import { VisionResponseError } from './google-vision-api';
import type { LazyHandle } from './lazy-handle';

export interface ExpertAdapter {
  readonly id: ExpertId;
  readonly timeoutMs: number;
  invoke(image: RawImage, signal?: AbortSignal): Promise<ExpertOutput>;
}

export interface GoogleVisionApi {
  analyze(image: Buffer, signal?: AbortSignal): Promise<GoogleVisionFindings>;
  localizeObjects(image: Buffer, signal?: AbortSignal): Promise<ObjectSignal[]>;
}

export interface RekognitionApi {
  analyze(image: Buffer, signal?: AbortSignal): Promise<RekognitionFindings>;
  localizeObjects(image: Buffer, signal?: AbortSignal): Promise<ObjectSignal[]>;
}

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export function classifyExpertError(error: unknown): ExpertErrorKind {
  if (error instanceof AppError &&
    (error.code === ErrorCode.EXPERT_TIMEOUT || error.code === ErrorCode.UPSTREAM_TIMEOUT)) {
    return 'timeout';
  }
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return 'timeout';
  }
  if (error instanceof ZodError || error instanceof VisionResponseError ||
    error instanceof MalformedResponseError || error instanceof SyntaxError) {
    return 'malformed_response';
  }
  return 'transport';
}

/**
 * Shared invoke(): acquire the lazy client, run the call under the adapter's
 * own deadline, and fold every failure into an ExpertOutput.
 */
abstract class BaseExpertAdapter<TClient> implements ExpertAdapter {
  constructor(
    readonly id: ExpertId,
    private readonly handle: LazyHandle<TClient>,
    readonly timeoutMs: number
  ) {}

  protected abstract analyze(client: TClient, image: RawImage, signal: AbortSignal): Promise<ExpertFindings>;

  async invoke(image: RawImage, signal?: AbortSignal): Promise<ExpertOutput> {
    const startedAt = Date.now();
    const acquired = this.handle.get();
    if (!acquired.ok) {
      return {
        expert: this.id,
        status: 'error',
        error: { kind: 'unavailable', message: acquired.reason },
        latencyMs: 0,
      };
    }

    // Cancel the upstream call when we give up on it
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const findings = await withTimeout(
        this.analyze(acquired.value, image, controller.signal),
        this.timeoutMs,
        ErrorCode.EXPERT_TIMEOUT
      );
      return { expert: this.id, status: 'success', findings, latencyMs: Date.now() - startedAt };
    } catch (error) {
      controller.abort();
      const kind = classifyExpertError(error);
      console.warn(`[Experts] ${this.id} failed (${kind}): ${errorMessage(error)}`);
      return {
        expert: this.id,
        status: 'error',
        error: { kind, message: errorMessage(error) },
        latencyMs: Date.now() - startedAt,
      };
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

export class GoogleVisionExpert extends BaseExpertAdapter<GoogleVisionApi> {
  constructor(handle: LazyHandle<GoogleVisionApi>, timeoutMs: number) {
    super('google_vision', handle, timeoutMs);
  }

  protected analyze(client: GoogleVisionApi, image: RawImage, signal: AbortSignal): Promise<ExpertFindings> {
    return client.analyze(image.data, signal);
  }
}

export class RekognitionExpert extends BaseExpertAdapter<RekognitionApi> {
  constructor(handle: LazyHandle<RekognitionApi>, timeoutMs: number) {
    super('aws_rekognition', handle, timeoutMs);
  }

  protected analyze(client: RekognitionApi, image: RawImage, signal: AbortSignal): Promise<ExpertFindings> {
    return client.analyze(image.data, signal);
  }
}

const ZERO_SHOT_TOP_K = 5;
// CLIP's learned logit scale
const CLIP_LOGIT_SCALE = 100;

export function zeroShotPrompt(label: string): string {
  return `a photo of a ${label}`;
}

/** Softmax over scaled cosine similarities, best first. */
export function rankZeroShotLabels(imageEmbedding: number[], labelEmbeddings: number[][], labels: string[]): LabelSignal[] {
  const logits = labelEmbeddings.map(e => cosineSimilarity(imageEmbedding, e) * CLIP_LOGIT_SCALE);
  const maxLogit = Math.max(...logits);
  const exps = logits.map(l => Math.exp(l - maxLogit));
  const total = exps.reduce((sum, v) => sum + v, 0);

  return labels
    .map((name, i) => ({ name, confidence: total > 0 ? exps[i] / total : 0 }))
    .sort((a, b) => b.confidence - a.confidence);
}

/**
 * Zero-shot labelling with a multimodal embedder: the image and one prompt
 * per candidate label share an embedding space.
 */
export class ClipEncoderExpert extends BaseExpertAdapter<MultimodalEmbedder> {
  constructor(handle: LazyHandle<MultimodalEmbedder>, timeoutMs: number, private readonly labels: string[]) {
    super('clip_encoder', handle, timeoutMs);
  }

  protected async analyze(embedder: MultimodalEmbedder, image: RawImage, signal: AbortSignal): Promise<ExpertFindings> {
    if (this.labels.length === 0) {
      const findings: ClipEncoderFindings = { expert: 'clip_encoder' };
      return findings;
    }

    const [imageEmbedding, labelEmbeddings] = await Promise.all([
      embedder.embedImage(image.data, signal),
      embedder.embedTexts(this.labels.map(zeroShotPrompt), signal),
    ]);

    if (labelEmbeddings.some(e => e.length !== imageEmbedding.length)) {
      throw new MalformedResponseError('Image and text embeddings differ in dimension');
    }

    const ranked = rankZeroShotLabels(imageEmbedding, labelEmbeddings, this.labels).slice(0, ZERO_SHOT_TOP_K);
    const findings: ClipEncoderFindings = {
      expert: 'clip_encoder',
      labels: ranked,
      description: ranked.length > 0 ? zeroShotPrompt(ranked[0].name) : undefined,
    };
    return findings;
  }
}
