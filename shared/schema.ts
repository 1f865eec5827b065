import { z } from 'zod';

// ============================================================
// IMAGES & GEOMETRY
// ============================================================

export interface RawImage {
  readonly data: Buffer;
  readonly contentType: string;
}

export const rectSchema = z.object({
  x: z.number().int().nonnegative(),
  y: z.number().int().nonnegative(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});
export type Rect = z.infer<typeof rectSchema>;

/** Box in [0,1] image-relative coordinates, as vision services report it. */
export interface NormalizedBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export const DetectorId = {
  NONE: 'none',
  GOOGLE_VISION: 'google_vision',
  AWS_REKOGNITION: 'aws_rekognition',
} as const;
export type DetectorId = typeof DetectorId[keyof typeof DetectorId];

export interface CropResult {
  croppedImage: RawImage;
  sourceDetector: DetectorId;
  boundingBox?: Rect;
}

// ============================================================
// EXPERT OUTPUTS
// ============================================================

export const EXPERT_IDS = ['google_vision', 'aws_rekognition', 'clip_encoder'] as const;
export type ExpertId = typeof EXPERT_IDS[number];

export interface LabelSignal {
  name: string;
  confidence: number; // 0-1
}

export interface WebEntitySignal {
  description: string;
  score: number;
}

export interface ObjectSignal {
  name: string;
  confidence: number;
  box?: NormalizedBox;
}

export interface TextSignal {
  text: string;
  confidence: number;
}

export interface ColorSignal {
  red: number;
  green: number;
  blue: number;
  score: number;
  pixelFraction: number;
}

export interface GoogleVisionFindings {
  expert: 'google_vision';
  webEntities?: WebEntitySignal[];
  labels?: LabelSignal[];
  objects?: ObjectSignal[];
  texts?: TextSignal[];
  colors?: ColorSignal[];
}

export interface RekognitionFindings {
  expert: 'aws_rekognition';
  labels?: LabelSignal[];
  objects?: ObjectSignal[];
  texts?: TextSignal[];
}

export interface ClipEncoderFindings {
  expert: 'clip_encoder';
  description?: string;
  labels?: LabelSignal[];
}

export type ExpertFindings = GoogleVisionFindings | RekognitionFindings | ClipEncoderFindings;

export type ExpertErrorKind = 'unavailable' | 'timeout' | 'transport' | 'malformed_response';

export interface ExpertError {
  kind: ExpertErrorKind;
  message: string;
}

export type ExpertOutput =
  | { expert: ExpertId; status: 'success'; findings: ExpertFindings; latencyMs: number }
  | { expert: ExpertId; status: 'error'; error: ExpertError; latencyMs: number };

// ============================================================
// SYNTHESIS
// ============================================================

export type SynthesisStrategy = 'generative' | 'heuristic' | 'none';

export interface SynthesizedAttributes {
  productName: string;
  brand: string;
  category: string;
  subCategory: string;
  attributes: string[];
  colors: string[];
  confidenceScore: number; // 0-1
  aiSummary: string;
  expertAgreement: Partial<Record<ExpertId, number>>;
  suggestedQuery: string | null;
  rawLabels: string[];
  strategy: SynthesisStrategy;
}

// Reported when every expert failed; never zero so downstream ratios stay defined
export const MIN_CONFIDENCE = 0.1;

// ============================================================
// QUERIES, LISTINGS, COMPS
// ============================================================

export type QuerySource = 'synthesizer' | 'brand-heuristic' | 'feature-heuristic' | 'generic-fallback';

export interface QueryVariant {
  queryText: string;
  confidence: number; // 0-100
  source: QuerySource;
}

export const candidateListingSchema = z.object({
  id: z.string(),
  title: z.string(),
  price: z.number().optional(),
  imageUrl: z.string(),
  canonicalUrl: z.string(),
});
export type CandidateListing = z.infer<typeof candidateListingSchema>;

export interface RankedComp extends CandidateListing {
  visualSimilarityScore: number; // 0-1
}

export interface SearchOptions {
  categoryFilter?: string;
  limit: number;
  /** Aborted when the caller's deadline for this search passes. */
  signal?: AbortSignal;
}

/** Caller-supplied marketplace search; rejects with SearchUnavailableError when the upstream is down. */
export type MarketplaceSearchFn = (queryText: string, options: SearchOptions) => Promise<CandidateListing[]>;

// ============================================================
// PRICING
// ============================================================

export type PriceConfidenceLabel = 'Low' | 'Medium' | 'High';

export interface PriceAnalysis {
  priceRange: { low: number; high: number };
  suggestedPrice: number;
  mean: number;
  median: number;
  standardDeviation: number;
  coefficientOfVariation: number;
  confidenceLabel: PriceConfidenceLabel;
  sampleSize: number;
}

// ============================================================
// PIPELINE
// ============================================================

export const PipelineStage = {
  RECEIVED: 'Received',
  CROPPED: 'Cropped',
  EXPERTS_DISPATCHED: 'ExpertsDispatched',
  SYNTHESIZED: 'Synthesized',
  QUERY_BUILT: 'QueryBuilt',
  SEARCHED: 'Searched',
  RERANKED: 'Reranked',
  PRICED: 'Priced',
  COMPLETE: 'Complete',
  FAILED: 'Failed',
} as const;
export type PipelineStage = typeof PipelineStage[keyof typeof PipelineStage];

export interface StageTiming {
  stage: PipelineStage;
  durationMs: number;
}

export interface StageError {
  stage: PipelineStage;
  code: string;
  message: string;
}

export interface AnalysisSummary {
  totalCompsFound: number;
  compsWithVisualScores: number;
  confidenceScore: number;
  expertAgreement: Partial<Record<ExpertId, number>>;
  expertStatus: Partial<Record<ExpertId, 'success' | ExpertErrorKind>>;
  expertLatencyMs: Partial<Record<ExpertId, number>>;
  synthesisStrategy: SynthesisStrategy;
  synthesisDegraded: boolean;
  synthesisDegradedReason?: string;
  queriesAttempted: string[];
  stageErrors: StageError[];
  stages: StageTiming[];
  totalDurationMs: number;
}

export interface AnalysisResult {
  identifiedAttributes: SynthesizedAttributes;
  marketQueryUsed: string;
  queryVariants: QueryVariant[];
  visuallyRankedComps: RankedComp[];
  searchSuccess: boolean;
  priceAnalysis: PriceAnalysis;
  cropResult: { sourceDetector: DetectorId; boundingBox?: Rect };
  analysisSummary: AnalysisSummary;
}

export interface CropPreview {
  croppedImage: string; // base64
  service: DetectorId;
  boundingBox?: Rect;
}
