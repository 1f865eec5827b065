/**
 * Market Analysis Pipeline
 *
 * Photo in, identification + priced comps out:
 *
 *   Received -> Cropped -> ExpertsDispatched -> Synthesized -> QueryBuilt
 *            -> Searched -> Reranked -> Priced -> Complete
 *
 * Only an absent or undecodable image fails the run (INVALID_INPUT), and
 * only a caller abort cancels it (REQUEST_ABORTED). Every other stage
 * degrades and records what went wrong in analysisSummary.stageErrors.
 *
 * The pipeline holds no per-request state between calls; everything it
 * shares is the read-only service set it was built with.
 */

import type {
  AnalysisResult,
  CandidateListing,
  CropPreview,
  CropResult,
  ExpertErrorKind,
  ExpertId,
  ExpertOutput,
  MarketplaceSearchFn,
  QueryVariant,
  RawImage,
  StageError,
  StageTiming,
} from '@shared/schema';
import { DetectorId, PipelineStage } from '@shared/schema';
import type { QueryBuilder } from '@shared/queryBuilder';
import { analyzePrices } from '@shared/priceAnalyzer';
import { AppError, ErrorCode, errorMessage } from './error-handling';
import { withTimeout } from './retry-strategy';
import { validateImage } from './image-input';
import { logCompsRequest } from './comps-logger';
import type { ExpertAdapter } from './expert-adapters';
import type { ImageCropper } from './image-cropper';
import type { Synthesizer } from './synthesizer';
import type { VisualReranker } from './visual-reranker';

export interface AnalysisOptions {
  intelligentCrop?: boolean;
  categoryFilter?: string;
  limit?: number;
  maxQueryAttempts?: number;
  signal?: AbortSignal;
}

export interface PipelineServices {
  cropper: Pick<ImageCropper, 'crop' | 'intelligentCropPreview'>;
  experts: ExpertAdapter[];
  synthesizer: Pick<Synthesizer, 'synthesize'>;
  queryBuilder: Pick<QueryBuilder, 'buildVariants'>;
  reranker: Pick<VisualReranker, 'rankWithStats'>;
  /** Extra time past the slowest expert timeout before the panel gives up. */
  expertGraceMs: number;
  /** Deadline for each marketplace query, whoever supplied the search. */
  marketplaceTimeoutMs: number;
  defaultLimit: number;
  defaultMaxQueryAttempts: number;
}

const EXPERT_ERROR_CODES: Record<ExpertErrorKind, ErrorCode> = {
  unavailable: ErrorCode.EXPERT_UNAVAILABLE,
  timeout: ErrorCode.EXPERT_TIMEOUT,
  transport: ErrorCode.EXPERT_UNAVAILABLE,
  malformed_response: ErrorCode.EXPERT_UNAVAILABLE,
};

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AppError(ErrorCode.REQUEST_ABORTED, new Error('Analysis aborted by caller'));
  }
}

class StageClock {
  readonly stages: StageTiming[] = [];
  readonly errors: StageError[] = [];
  private readonly startedAt = Date.now();

  async run<T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    try {
      return await fn();
    } finally {
      this.stages.push({ stage, durationMs: Date.now() - start });
    }
  }

  fail(stage: PipelineStage, code: string, message: string): void {
    this.errors.push({ stage, code, message });
  }

  get elapsedMs(): number {
    return Date.now() - this.startedAt;
  }
}

export class MarketAnalysisPipeline {
  constructor(private readonly services: PipelineServices) {}

  async runCompleteAnalysis(
    imageBytes: Buffer | null | undefined,
    marketplaceSearch: MarketplaceSearchFn,
    options: AnalysisOptions = {}
  ): Promise<AnalysisResult> {
    const { signal } = options;
    const clock = new StageClock();
    const limit = options.limit ?? this.services.defaultLimit;
    const maxQueryAttempts = options.maxQueryAttempts ?? this.services.defaultMaxQueryAttempts;

    // Received: the only stage allowed to fail the run
    const image = await clock.run(PipelineStage.RECEIVED, () => validateImage(imageBytes));
    console.log(`[Pipeline] Received ${image.width}x${image.height} ${image.contentType} (${image.data.length} bytes)`);
    throwIfAborted(signal);

    const crop = await clock.run(PipelineStage.CROPPED, async (): Promise<CropResult> => {
      if (options.intelligentCrop === false) {
        return { croppedImage: image, sourceDetector: DetectorId.NONE };
      }
      return this.services.cropper.crop(image, signal);
    });
    throwIfAborted(signal);

    const outputs = await clock.run(PipelineStage.EXPERTS_DISPATCHED, () => this.dispatchExperts(crop.croppedImage, signal));
    // In-flight results are discarded once the caller has gone
    throwIfAborted(signal);
    for (const output of outputs) {
      if (output.status === 'error') {
        clock.fail(PipelineStage.EXPERTS_DISPATCHED, EXPERT_ERROR_CODES[output.error.kind], `${output.expert}: ${output.error.message}`);
      }
    }

    const synthesis = await clock.run(PipelineStage.SYNTHESIZED, () => this.services.synthesizer.synthesize(outputs, signal));
    throwIfAborted(signal);
    const attrs = synthesis.attributes;
    if (synthesis.degraded) {
      clock.fail(PipelineStage.SYNTHESIZED, ErrorCode.SYNTHESIS_DEGRADED, synthesis.degradedReason ?? 'heuristic fallback');
    }

    const variants = await clock.run(PipelineStage.QUERY_BUILT, async () => Array.from(this.services.queryBuilder.buildVariants(attrs)));

    const search = await clock.run(PipelineStage.SEARCHED, () =>
      this.searchVariants(variants, marketplaceSearch, { categoryFilter: options.categoryFilter, limit, maxQueryAttempts, signal }, clock)
    );
    throwIfAborted(signal);

    const rerank = await clock.run(PipelineStage.RERANKED, async () => {
      try {
        return await this.services.reranker.rankWithStats(crop.croppedImage, search.candidates, signal);
      } catch (error) {
        console.warn(`[Pipeline] Re-rank failed, keeping marketplace order: ${errorMessage(error)}`);
        return {
          comps: search.candidates.map(c => ({ ...c, visualSimilarityScore: 0 })),
          scoredCount: 0,
          sourceEmbeddingFailed: true,
        };
      }
    });
    throwIfAborted(signal);
    if (rerank.sourceEmbeddingFailed && search.candidates.length > 0) {
      clock.fail(PipelineStage.RERANKED, ErrorCode.EMBEDDING_FAILED, 'source image could not be embedded; comps left unranked');
    }

    const priceAnalysis = await clock.run(PipelineStage.PRICED, async () => analyzePrices(rerank.comps));

    const expertStatus: Partial<Record<ExpertId, 'success' | ExpertErrorKind>> = {};
    const expertLatencyMs: Partial<Record<ExpertId, number>> = {};
    for (const output of outputs) {
      expertStatus[output.expert] = output.status === 'success' ? 'success' : output.error.kind;
      expertLatencyMs[output.expert] = output.latencyMs;
    }

    const result: AnalysisResult = {
      identifiedAttributes: attrs,
      marketQueryUsed: search.queryUsed,
      queryVariants: variants,
      visuallyRankedComps: rerank.comps,
      searchSuccess: search.candidates.length > 0,
      priceAnalysis,
      cropResult: { sourceDetector: crop.sourceDetector, boundingBox: crop.boundingBox },
      analysisSummary: {
        totalCompsFound: search.candidates.length,
        compsWithVisualScores: rerank.scoredCount,
        confidenceScore: attrs.confidenceScore,
        expertAgreement: attrs.expertAgreement,
        expertStatus,
        expertLatencyMs,
        synthesisStrategy: attrs.strategy,
        synthesisDegraded: synthesis.degraded,
        synthesisDegradedReason: synthesis.degradedReason,
        queriesAttempted: search.attempted,
        stageErrors: clock.errors,
        stages: [...clock.stages, { stage: PipelineStage.COMPLETE, durationMs: 0 }],
        totalDurationMs: clock.elapsedMs,
      },
    };

    console.log(
      `[Pipeline] Complete in ${result.analysisSummary.totalDurationMs}ms: ` +
      `"${attrs.productName || attrs.category || 'unidentified'}" (${attrs.strategy}, confidence ${attrs.confidenceScore}), ` +
      `${rerank.comps.length} comps, suggested $${priceAnalysis.suggestedPrice} (${priceAnalysis.confidenceLabel})`
    );
    return result;
  }

  intelligentCropPreview(imageBytes: Buffer): Promise<CropPreview> {
    return this.services.cropper.intelligentCropPreview(imageBytes);
  }

  /**
   * Runs every adapter at once. Outputs come back in registry order no matter
   * which expert finishes first.
   */
  private async dispatchExperts(image: RawImage, signal?: AbortSignal): Promise<ExpertOutput[]> {
    const { experts, expertGraceMs } = this.services;
    if (experts.length === 0) return [];

    const panelDeadlineMs = Math.max(...experts.map(e => e.timeoutMs)) + expertGraceMs;
    return Promise.all(experts.map(async (expert): Promise<ExpertOutput> => {
      const startedAt = Date.now();
      try {
        return await withTimeout(expert.invoke(image, signal), panelDeadlineMs, ErrorCode.EXPERT_TIMEOUT);
      } catch (error) {
        return {
          expert: expert.id,
          status: 'error',
          error: { kind: 'timeout', message: errorMessage(error) },
          latencyMs: Date.now() - startedAt,
        };
      }
    }));
  }

  private async searchVariants(
    variants: QueryVariant[],
    marketplaceSearch: MarketplaceSearchFn,
    options: { categoryFilter?: string; limit: number; maxQueryAttempts: number; signal?: AbortSignal },
    clock: StageClock
  ): Promise<{ candidates: CandidateListing[]; queryUsed: string; attempted: string[] }> {
    const attempted: string[] = [];

    for (const variant of variants.slice(0, options.maxQueryAttempts)) {
      throwIfAborted(options.signal);
      attempted.push(variant.queryText);
      try {
        const candidates = await this.searchOnce(marketplaceSearch, variant.queryText, options);
        if (candidates.length > 0) {
          return { candidates: candidates.slice(0, options.limit), queryUsed: variant.queryText, attempted };
        }
      } catch (error) {
        const code = error instanceof AppError ? error.code : ErrorCode.SEARCH_UNAVAILABLE;
        clock.fail(PipelineStage.SEARCHED, code, errorMessage(error));
        // Unavailable stays unavailable for the rest of this request
        break;
      }
    }

    logCompsRequest({
      source: 'pipeline',
      queries: attempted,
      category: options.categoryFilter,
      resultsCount: 0,
      error: `no comps after ${attempted.length} quer${attempted.length === 1 ? 'y' : 'ies'}`,
    });
    return { candidates: [], queryUsed: variants[0]?.queryText ?? '', attempted };
  }

  private async searchOnce(
    marketplaceSearch: MarketplaceSearchFn,
    queryText: string,
    options: { categoryFilter?: string; limit: number; signal?: AbortSignal }
  ): Promise<CandidateListing[]> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await withTimeout(
        marketplaceSearch(queryText, { categoryFilter: options.categoryFilter, limit: options.limit, signal: controller.signal }),
        this.services.marketplaceTimeoutMs,
        ErrorCode.SEARCH_UNAVAILABLE
      );
    } catch (error) {
      controller.abort();
      throw error;
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
