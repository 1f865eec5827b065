/**
 * Market Analysis Pipeline Tests
 *
 * RULES:
 * 1. The result has the same shape whether 0, 1 or every expert answered
 * 2. Only an unreadable image (INVALID_INPUT) or a caller abort (REQUEST_ABORTED) rejects
 * 3. Search stops at the first variant with results, after maxQueryAttempts,
 *    or at the first search error
 * 4. An expert or a search that never answers is cut off by its deadline
 */

import sharp from 'sharp';
import type {
  CandidateListing,
  ExpertOutput,
  GoogleVisionFindings,
  MarketplaceSearchFn,
  RawImage,
  RekognitionFindings,
} from '@shared/schema';
import { getDefaultLexicon } from '@shared/lexicon';
import { QueryBuilder } from '@shared/queryBuilder';
import { AppError, ErrorCode, SearchUnavailableError } from './error-handling';
import { GoogleVisionExpert, RekognitionExpert, type ExpertAdapter } from './expert-adapters';
import { ImageCropper } from './image-cropper';
import { LazyHandle } from './lazy-handle';
import { MarketAnalysisPipeline, type PipelineServices } from './market-analysis-pipeline';
import { Synthesizer, type GenerativeReasoner } from './synthesizer';

const lexicon = getDefaultLexicon();

const googleFindings: GoogleVisionFindings = {
  expert: 'google_vision',
  labels: [
    { name: 'polo shirt', confidence: 0.9 },
    { name: 'cotton', confidence: 0.8 },
  ],
};

const rekognitionFindings: RekognitionFindings = {
  expert: 'aws_rekognition',
  labels: [{ name: 'long sleeve', confidence: 0.7 }],
};

function googleExpert(findings: GoogleVisionFindings = googleFindings, timeoutMs = 1000): ExpertAdapter {
  return new GoogleVisionExpert(
    new LazyHandle('Google Vision', () => ({ analyze: async () => findings, localizeObjects: async () => [] })),
    timeoutMs
  );
}

function rekognitionExpert(): ExpertAdapter {
  return new RekognitionExpert(
    new LazyHandle('AWS Rekognition', () => ({ analyze: async () => rekognitionFindings, localizeObjects: async () => [] })),
    1000
  );
}

function buildPipeline(experts: ExpertAdapter[], overrides: Partial<PipelineServices> = {}): MarketAnalysisPipeline {
  return new MarketAnalysisPipeline({
    cropper: new ImageCropper([], 1000),
    experts,
    synthesizer: new Synthesizer(
      LazyHandle.unavailable<GenerativeReasoner>('OpenAI', 'OPENAI_API_KEY is required for generative synthesis'),
      lexicon,
      1000
    ),
    queryBuilder: new QueryBuilder(lexicon),
    reranker: {
      rankWithStats: async (_source, candidates) => ({
        comps: candidates.map(c => ({ ...c, visualSimilarityScore: 0.5 })),
        scoredCount: candidates.length,
        sourceEmbeddingFailed: false,
      }),
    },
    expertGraceMs: 100,
    marketplaceTimeoutMs: 1000,
    defaultLimit: 20,
    defaultMaxQueryAttempts: 3,
    ...overrides,
  });
}

function listing(id: string, price: number): CandidateListing {
  return {
    id,
    title: `Polo Shirt ${id}`,
    price,
    imageUrl: `https://img.test/${id}.jpg`,
    canonicalUrl: `https://www.ebay.com/itm/${id}`,
  };
}

function recordingSearch(results: Record<string, CandidateListing[]>): { search: MarketplaceSearchFn; queries: string[] } {
  const queries: string[] = [];
  const search: MarketplaceSearchFn = async (queryText) => {
    queries.push(queryText);
    return results[queryText] ?? [];
  };
  return { search, queries };
}

describe('MarketAnalysisPipeline', () => {
  let photo: Buffer;

  beforeAll(async () => {
    photo = await sharp({ create: { width: 32, height: 32, channels: 3, background: { r: 20, g: 30, b: 120 } } })
      .png()
      .toBuffer();
  });

  it('should fall through query variants until one returns comps', async () => {
    const pipeline = buildPipeline([googleExpert(), rekognitionExpert()]);
    const { search, queries } = recordingSearch({
      'cotton long sleeve Polo Shirt': [listing('1', 20), listing('2', 30), listing('3', 40)],
    });

    const result = await pipeline.runCompleteAnalysis(photo, search);

    expect(queries).toEqual(['Polo Shirt', 'cotton long sleeve Polo Shirt']);
    expect(result.marketQueryUsed).toBe('cotton long sleeve Polo Shirt');
    expect(result.searchSuccess).toBe(true);
    expect(result.visuallyRankedComps.map(c => c.id)).toEqual(['1', '2', '3']);
    expect(result.priceAnalysis.suggestedPrice).toBe(30);
    expect(result.priceAnalysis.sampleSize).toBe(3);
    expect(result.priceAnalysis.confidenceLabel).toBe('Medium');
    expect(result.identifiedAttributes.subCategory).toBe('Polo Shirt');
    expect(result.analysisSummary.queriesAttempted).toEqual(['Polo Shirt', 'cotton long sleeve Polo Shirt']);
    expect(result.analysisSummary.totalCompsFound).toBe(3);
    expect(result.analysisSummary.compsWithVisualScores).toBe(3);
    expect(result.analysisSummary.synthesisStrategy).toBe('heuristic');
    expect(result.analysisSummary.expertStatus).toEqual({ google_vision: 'success', aws_rekognition: 'success' });
    expect(result.analysisSummary.stages.map(s => s.stage)).toEqual([
      'Received', 'Cropped', 'ExpertsDispatched', 'Synthesized', 'QueryBuilt', 'Searched', 'Reranked', 'Priced', 'Complete',
    ]);
    expect(result.analysisSummary.stageErrors).toEqual([
      {
        stage: 'Synthesized',
        code: 'SYNTHESIS_DEGRADED',
        message: 'generative synthesis unavailable: OPENAI_API_KEY is required for generative synthesis',
      },
    ]);
  });

  it('should return the same shape for 0, 1 and N experts', async () => {
    const { search } = recordingSearch({});
    const unavailable = new GoogleVisionExpert(LazyHandle.unavailable('Google Vision', 'GOOGLE_API_KEY is not set'), 1000);

    const none = await buildPipeline([unavailable]).runCompleteAnalysis(photo, search);
    const one = await buildPipeline([googleExpert()]).runCompleteAnalysis(photo, search);
    const all = await buildPipeline([googleExpert(), rekognitionExpert()]).runCompleteAnalysis(photo, search);

    const shape = (value: object) => Object.keys(value).sort();
    expect(shape(none)).toEqual(shape(all));
    expect(shape(one)).toEqual(shape(all));
    expect(shape(none.identifiedAttributes)).toEqual(shape(all.identifiedAttributes));
    expect(shape(none.analysisSummary)).toEqual(shape(all.analysisSummary));

    expect(none.identifiedAttributes.strategy).toBe('none');
    expect(none.identifiedAttributes.confidenceScore).toBe(0.1);
    expect(none.queryVariants.map(v => v.queryText)).toEqual(['clothing']);
    expect(none.analysisSummary.expertStatus).toEqual({ google_vision: 'unavailable' });
    expect(none.analysisSummary.stageErrors[0]).toEqual({
      stage: 'ExpertsDispatched',
      code: 'EXPERT_UNAVAILABLE',
      message: 'google_vision: GOOGLE_API_KEY is not set',
    });
  });

  it('should reject an undecodable image with INVALID_INPUT', async () => {
    const pipeline = buildPipeline([googleExpert()]);
    const { search, queries } = recordingSearch({});

    await expect(pipeline.runCompleteAnalysis(Buffer.from('not an image'), search))
      .rejects.toMatchObject({ code: ErrorCode.INVALID_INPUT });
    await expect(pipeline.runCompleteAnalysis(null, search))
      .rejects.toMatchObject({ code: ErrorCode.INVALID_INPUT });
    expect(queries).toEqual([]);
  });

  it('should return an empty comp set when the marketplace is down', async () => {
    const pipeline = buildPipeline([googleExpert(), rekognitionExpert()]);
    let calls = 0;
    const search: MarketplaceSearchFn = async () => {
      calls++;
      throw new SearchUnavailableError('Browse API: 503 - down', 503);
    };

    const result = await pipeline.runCompleteAnalysis(photo, search);

    expect(calls).toBe(1);
    expect(result.searchSuccess).toBe(false);
    expect(result.visuallyRankedComps).toEqual([]);
    expect(result.marketQueryUsed).toBe('Polo Shirt');
    expect(result.priceAnalysis.sampleSize).toBe(0);
    expect(result.priceAnalysis.suggestedPrice).toBe(0);
    expect(result.analysisSummary.stageErrors).toContainEqual({
      stage: 'Searched',
      code: 'SEARCH_UNAVAILABLE',
      message: 'Browse API: 503 - down',
    });
  });

  it('should stop after maxQueryAttempts variants', async () => {
    const findings: GoogleVisionFindings = {
      ...googleFindings,
      webEntities: [{ description: 'Custom Fit Polo', score: 0.9 }],
      texts: [{ text: 'RALPH LAUREN', confidence: 0.95 }],
    };
    const pipeline = buildPipeline([googleExpert(findings), rekognitionExpert()]);
    const { search, queries } = recordingSearch({});

    const result = await pipeline.runCompleteAnalysis(photo, search);

    expect(result.queryVariants).toHaveLength(4);
    expect(queries).toEqual(['Custom Fit Polo', 'Ralph Lauren Polo Shirt', 'cotton long sleeve Polo Shirt']);
    expect(result.marketQueryUsed).toBe('Custom Fit Polo');
    expect(result.searchSuccess).toBe(false);

    const { search: search2, queries: queries2 } = recordingSearch({});
    await pipeline.runCompleteAnalysis(photo, search2, { maxQueryAttempts: 1 });
    expect(queries2).toEqual(['Custom Fit Polo']);
  });

  it('should reject with REQUEST_ABORTED when the caller aborts mid-run', async () => {
    const controller = new AbortController();
    const aborting: ExpertAdapter = {
      id: 'clip_encoder',
      timeoutMs: 1000,
      invoke: async (_image: RawImage): Promise<ExpertOutput> => {
        controller.abort();
        return { expert: 'clip_encoder', status: 'success', findings: { expert: 'clip_encoder' }, latencyMs: 1 };
      },
    };
    const pipeline = buildPipeline([googleExpert(), aborting]);
    const { search, queries } = recordingSearch({});

    const error = await pipeline.runCompleteAnalysis(photo, search, { signal: controller.signal }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: ErrorCode.REQUEST_ABORTED });
    expect(queries).toEqual([]);
  });

  it('should report an expert that never settles as a timeout', async () => {
    const silent: ExpertAdapter = {
      id: 'clip_encoder',
      timeoutMs: 20,
      invoke: () => new Promise<ExpertOutput>(() => {}),
    };
    const pipeline = buildPipeline([googleExpert(googleFindings, 20), silent], { expertGraceMs: 30 });

    const result = await pipeline.runCompleteAnalysis(photo, recordingSearch({}).search);

    expect(result.analysisSummary.expertStatus).toEqual({ google_vision: 'success', clip_encoder: 'timeout' });
    expect(result.analysisSummary.stageErrors).toContainEqual({
      stage: 'ExpertsDispatched',
      code: 'EXPERT_TIMEOUT',
      message: 'clip_encoder: Operation timed out after 50ms',
    });
    expect(result.identifiedAttributes.subCategory).toBe('Polo Shirt');
  });

  it('should keep registry order when experts finish in reverse', async () => {
    const finished: string[] = [];
    const delayed = (findings: GoogleVisionFindings | RekognitionFindings, delayMs: number): ExpertAdapter => ({
      id: findings.expert,
      timeoutMs: 1000,
      invoke: async (): Promise<ExpertOutput> => {
        await new Promise(resolve => setTimeout(resolve, delayMs));
        finished.push(findings.expert);
        return { expert: findings.expert, status: 'success', findings, latencyMs: delayMs };
      },
    });
    const pipeline = buildPipeline([delayed(googleFindings, 40), delayed(rekognitionFindings, 1)]);

    const result = await pipeline.runCompleteAnalysis(photo, recordingSearch({}).search);

    expect(finished).toEqual(['aws_rekognition', 'google_vision']);
    expect(Object.keys(result.analysisSummary.expertStatus)).toEqual(['google_vision', 'aws_rekognition']);
    expect(result.analysisSummary.expertLatencyMs).toEqual({ google_vision: 40, aws_rekognition: 1 });
  });

  it('should stop searching when a query outlives the marketplace deadline', async () => {
    const pipeline = buildPipeline([googleExpert(), rekognitionExpert()], { marketplaceTimeoutMs: 50 });
    const signals: AbortSignal[] = [];
    const hung: MarketplaceSearchFn = (_queryText, options) => {
      if (options.signal) signals.push(options.signal);
      return new Promise<CandidateListing[]>(() => {});
    };

    const result = await pipeline.runCompleteAnalysis(photo, hung);

    expect(result.searchSuccess).toBe(false);
    expect(result.analysisSummary.queriesAttempted).toEqual(['Polo Shirt']);
    expect(result.analysisSummary.stageErrors).toContainEqual({
      stage: 'Searched',
      code: 'SEARCH_UNAVAILABLE',
      message: 'Operation timed out after 50ms',
    });
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });

  it('should skip cropping when intelligentCrop is off', async () => {
    const crop = jest.fn();
    const pipeline = new MarketAnalysisPipeline({
      cropper: { crop, intelligentCropPreview: jest.fn() },
      experts: [],
      synthesizer: new Synthesizer(LazyHandle.unavailable('OpenAI', 'no key'), lexicon, 1000),
      queryBuilder: new QueryBuilder(lexicon),
      reranker: { rankWithStats: async () => ({ comps: [], scoredCount: 0, sourceEmbeddingFailed: false }) },
      expertGraceMs: 100,
      marketplaceTimeoutMs: 1000,
      defaultLimit: 20,
      defaultMaxQueryAttempts: 3,
    });

    const result = await pipeline.runCompleteAnalysis(photo, recordingSearch({}).search, { intelligentCrop: false });

    expect(crop).not.toHaveBeenCalled();
    expect(result.cropResult).toEqual({ sourceDetector: 'none', boundingBox: undefined });
  });
});
