/**
 * Google Cloud Vision API Integration
 * REST client for images:annotate (API key auth).
 *
 * Docs: https://cloud.google.com/vision/docs/reference/rest/v1/images/annotate
 */

import { z } from 'zod';
import type {
  ColorSignal,
  GoogleVisionFindings,
  LabelSignal,
  NormalizedBox,
  ObjectSignal,
  TextSignal,
  WebEntitySignal,
} from '@shared/schema';

const VISION_API_URL = 'https://vision.googleapis.com/v1/images:annotate';

export type VisionFeature =
  | 'WEB_DETECTION'
  | 'LABEL_DETECTION'
  | 'OBJECT_LOCALIZATION'
  | 'TEXT_DETECTION'
  | 'IMAGE_PROPERTIES';

export const FULL_ANALYSIS_FEATURES: VisionFeature[] = [
  'WEB_DETECTION',
  'LABEL_DETECTION',
  'OBJECT_LOCALIZATION',
  'TEXT_DETECTION',
  'IMAGE_PROPERTIES',
];

const MAX_WEB_ENTITIES = 10;
const MAX_LABELS = 10;
const MAX_OBJECTS = 5;
const MAX_TEXTS = 10;
const MAX_COLORS = 5;
const MIN_TEXT_SCORE = 0.8;

const vertexSchema = z.object({ x: z.number().optional(), y: z.number().optional() });

const annotateResponseSchema = z.object({
  responses: z.array(z.object({
    error: z.object({ code: z.number().optional(), message: z.string().optional() }).optional(),
    webDetection: z.object({
      webEntities: z.array(z.object({
        description: z.string().optional(),
        score: z.number().optional(),
      })).optional(),
    }).optional(),
    labelAnnotations: z.array(z.object({
      description: z.string(),
      score: z.number().optional(),
    })).optional(),
    localizedObjectAnnotations: z.array(z.object({
      name: z.string(),
      score: z.number().optional(),
      boundingPoly: z.object({ normalizedVertices: z.array(vertexSchema).optional() }).optional(),
    })).optional(),
    textAnnotations: z.array(z.object({
      description: z.string(),
      score: z.number().optional(),
    })).optional(),
    imagePropertiesAnnotation: z.object({
      dominantColors: z.object({
        colors: z.array(z.object({
          color: z.object({
            red: z.number().optional(),
            green: z.number().optional(),
            blue: z.number().optional(),
          }),
          score: z.number().optional(),
          pixelFraction: z.number().optional(),
        })).optional(),
      }).optional(),
    }).optional(),
  })).default([]),
});

export type AnnotateResponse = z.infer<typeof annotateResponseSchema>['responses'][number];

export class VisionApiError extends Error {
  constructor(message: string, public status?: number) {
    super(message);
    this.name = 'VisionApiError';
  }
}

export class VisionResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VisionResponseError';
  }
}

export interface GoogleVisionClientOptions {
  apiKey: string;
  fetchImpl?: typeof fetch;
}

/** Vertices -> [0,1] box. Missing coordinates are 0, as the API omits zeros. */
export function verticesToBox(vertices: Array<{ x?: number; y?: number }>): NormalizedBox | undefined {
  if (vertices.length === 0) return undefined;
  const xs = vertices.map(v => v.x ?? 0);
  const ys = vertices.map(v => v.y ?? 0);
  const left = Math.max(0, Math.min(...xs));
  const top = Math.max(0, Math.min(...ys));
  const right = Math.min(1, Math.max(...xs));
  const bottom = Math.min(1, Math.max(...ys));
  if (right <= left || bottom <= top) return undefined;
  return { left, top, width: right - left, height: bottom - top };
}

export class GoogleVisionClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GoogleVisionClientOptions) {
    if (!options.apiKey) {
      throw new Error('GOOGLE_API_KEY is required for Google Vision');
    }
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async annotate(image: Buffer, features: VisionFeature[], signal?: AbortSignal): Promise<AnnotateResponse> {
    const body = {
      requests: [{
        image: { content: image.toString('base64') },
        features: features.map(type => ({
          type,
          maxResults: type === 'OBJECT_LOCALIZATION' ? MAX_OBJECTS : MAX_WEB_ENTITIES,
        })),
      }],
    };

    const response = await this.fetchImpl(`${VISION_API_URL}?key=${encodeURIComponent(this.options.apiKey)}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new VisionApiError(`Google Vision error: ${response.status} - ${errorText.slice(0, 200)}`, response.status);
    }

    const parsed = annotateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new VisionResponseError(`Unexpected Google Vision payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const first = parsed.data.responses[0];
    if (!first) {
      throw new VisionResponseError('Google Vision returned no responses');
    }
    if (first.error?.message) {
      throw new VisionApiError(`Google Vision error: ${first.error.message}`, first.error.code);
    }
    return first;
  }

  async analyze(image: Buffer, signal?: AbortSignal): Promise<GoogleVisionFindings> {
    return toFindings(await this.annotate(image, FULL_ANALYSIS_FEATURES, signal));
  }

  /** Object localization alone, for cropping. */
  async localizeObjects(image: Buffer, signal?: AbortSignal): Promise<ObjectSignal[]> {
    const response = await this.annotate(image, ['OBJECT_LOCALIZATION'], signal);
    return mapObjects(response);
  }
}

function mapObjects(response: AnnotateResponse): ObjectSignal[] {
  return (response.localizedObjectAnnotations ?? []).slice(0, MAX_OBJECTS).map(obj => ({
    name: obj.name,
    confidence: obj.score ?? 0,
    box: verticesToBox(obj.boundingPoly?.normalizedVertices ?? []),
  }));
}

export function toFindings(response: AnnotateResponse): GoogleVisionFindings {
  const findings: GoogleVisionFindings = { expert: 'google_vision' };

  if (response.webDetection?.webEntities) {
    const entities: WebEntitySignal[] = [];
    for (const entity of response.webDetection.webEntities.slice(0, MAX_WEB_ENTITIES)) {
      if (entity.description) {
        entities.push({ description: entity.description, score: entity.score ?? 0 });
      }
    }
    findings.webEntities = entities;
  }

  if (response.labelAnnotations) {
    findings.labels = response.labelAnnotations.slice(0, MAX_LABELS).map((label): LabelSignal => ({
      name: label.description,
      confidence: label.score ?? 0,
    }));
  }

  if (response.localizedObjectAnnotations) {
    findings.objects = mapObjects(response);
  }

  if (response.textAnnotations) {
    // Text annotations usually omit score; absent means the OCR was certain
    findings.texts = response.textAnnotations
      .slice(0, MAX_TEXTS)
      .filter(text => (text.score ?? 1) >= MIN_TEXT_SCORE)
      .map((text): TextSignal => ({ text: text.description, confidence: text.score ?? 1 }));
  }

  const colors = response.imagePropertiesAnnotation?.dominantColors?.colors;
  if (colors) {
    findings.colors = colors.slice(0, MAX_COLORS).map((c): ColorSignal => ({
      red: c.color.red ?? 0,
      green: c.color.green ?? 0,
      blue: c.color.blue ?? 0,
      score: c.score ?? 0,
      pixelFraction: c.pixelFraction ?? 0,
    }));
  }

  return findings;
}
