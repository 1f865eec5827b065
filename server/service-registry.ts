/**
 * Service Registry
 *
 * Builds every upstream client handle and pipeline component once per
 * process and wires them together. Handles construct their client on first
 * use; preWarmServices() forces that at startup so the first request does
 * not pay for it.
 */

import type { MarketplaceSearchFn } from '@shared/schema';
import { QueryBuilder } from '@shared/queryBuilder';
import { getDefaultLexicon, type Lexicon } from '@shared/lexicon';
import { getConfig, type AppConfig } from './config';
import { LazyHandle } from './lazy-handle';
import { GoogleVisionClient } from './google-vision-api';
import { RekognitionVisionClient, createSdkTransport } from './rekognition-api';
import {
  ColorHistogramEmbedder,
  JinaClipEmbedder,
  PreferredImageEmbedder,
  type MultimodalEmbedder,
} from './embedding-service';
import {
  ClipEncoderExpert,
  GoogleVisionExpert,
  RekognitionExpert,
  type ExpertAdapter,
  type GoogleVisionApi,
  type RekognitionApi,
} from './expert-adapters';
import { ImageCropper } from './image-cropper';
import { OpenAIReasoner, Synthesizer, type GenerativeReasoner } from './synthesizer';
import { VisualReranker } from './visual-reranker';
import { createEbayBrowseSearch, envCredentialProvider } from './ebay-api';
import { MarketAnalysisPipeline } from './market-analysis-pipeline';

const EXPERT_GRACE_MS = 1000;

export interface ServiceHandles {
  googleVision: LazyHandle<GoogleVisionApi>;
  rekognition: LazyHandle<RekognitionApi>;
  clipEmbedder: LazyHandle<MultimodalEmbedder>;
  reasoner: LazyHandle<GenerativeReasoner>;
}

export interface ServiceRegistry {
  config: AppConfig;
  lexicon: Lexicon;
  handles: ServiceHandles;
  experts: ExpertAdapter[];
  pipeline: MarketAnalysisPipeline;
  marketplaceSearch: MarketplaceSearchFn;
}

export function createServiceRegistry(config: AppConfig, lexicon: Lexicon = getDefaultLexicon()): ServiceRegistry {
  const handles: ServiceHandles = {
    googleVision: new LazyHandle('Google Vision', () =>
      new GoogleVisionClient({ apiKey: config.GOOGLE_API_KEY ?? '' })),
    rekognition: new LazyHandle('AWS Rekognition', () =>
      new RekognitionVisionClient(createSdkTransport({
        accessKeyId: config.AWS_ACCESS_KEY_ID ?? '',
        secretAccessKey: config.AWS_SECRET_ACCESS_KEY ?? '',
        region: config.AWS_REGION,
      }))),
    clipEmbedder: new LazyHandle('Jina CLIP', () =>
      new JinaClipEmbedder({ apiKey: config.JINA_API_KEY ?? '', timeoutMs: config.EMBEDDING_TIMEOUT_MS })),
    reasoner: new LazyHandle('OpenAI', () => new OpenAIReasoner(config.OPENAI_API_KEY, config.OPENAI_MODEL)),
  };

  // Registry order is the order outputs are reported in
  const experts: ExpertAdapter[] = [
    new GoogleVisionExpert(handles.googleVision, config.EXPERT_TIMEOUT_MS),
    new RekognitionExpert(handles.rekognition, config.EXPERT_TIMEOUT_MS),
    new ClipEncoderExpert(handles.clipEmbedder, config.EXPERT_TIMEOUT_MS, lexicon.zeroShotLabels),
  ];

  const cropper = new ImageCropper(
    [
      { id: 'google_vision', handle: handles.googleVision },
      { id: 'aws_rekognition', handle: handles.rekognition },
    ],
    config.LOCALIZATION_TIMEOUT_MS
  );

  const reranker = new VisualReranker(
    new PreferredImageEmbedder(handles.clipEmbedder, new ColorHistogramEmbedder()),
    {
      imageFetchTimeoutMs: config.IMAGE_FETCH_TIMEOUT_MS,
      embeddingTimeoutMs: config.EMBEDDING_TIMEOUT_MS,
    }
  );

  const pipeline = new MarketAnalysisPipeline({
    cropper,
    experts,
    synthesizer: new Synthesizer(handles.reasoner, lexicon, config.SYNTHESIS_TIMEOUT_MS),
    queryBuilder: new QueryBuilder(lexicon),
    reranker,
    expertGraceMs: EXPERT_GRACE_MS,
    marketplaceTimeoutMs: config.MARKETPLACE_TIMEOUT_MS,
    defaultLimit: config.SEARCH_LIMIT,
    defaultMaxQueryAttempts: config.MAX_QUERY_ATTEMPTS,
  });

  const marketplaceSearch = createEbayBrowseSearch({
    credentialProvider: envCredentialProvider(config.EBAY_OAUTH_TOKEN),
    lexicon,
    marketplaceId: config.EBAY_MARKETPLACE_ID,
    apiBase: config.EBAY_API_BASE,
    timeoutMs: config.MARKETPLACE_TIMEOUT_MS,
  });

  return { config, lexicon, handles, experts, pipeline, marketplaceSearch };
}

let registry: ServiceRegistry | null = null;

export function getServiceRegistry(): ServiceRegistry {
  if (!registry) {
    registry = createServiceRegistry(getConfig());
  }
  return registry;
}

export function preWarmServices(target: ServiceRegistry = getServiceRegistry()): void {
  for (const handle of Object.values(target.handles)) {
    handle.get();
  }
  const ready = Object.values(target.handles).filter(h => h.status === 'ready').map(h => h.name);
  console.log(`[Services] Pre-warmed: ${ready.length > 0 ? ready.join(', ') : 'none'}`);
}

export function getServiceAvailability(target: ServiceRegistry = getServiceRegistry()): Record<keyof ServiceHandles, boolean> {
  return {
    googleVision: target.handles.googleVision.get().ok,
    rekognition: target.handles.rekognition.get().ok,
    clipEmbedder: target.handles.clipEmbedder.get().ok,
    reasoner: target.handles.reasoner.get().ok,
  };
}
