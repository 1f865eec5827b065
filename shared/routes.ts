import { z } from 'zod';
import type { AnalysisResult, CropPreview } from './schema';

export const errorSchemas = {
  validation: z.object({
    message: z.string(),
    field: z.string().optional(),
  }),
  app: z.object({
    code: z.string(),
    title: z.string(),
    message: z.string(),
    action: z.string().optional(),
    retryAfterSeconds: z.number().optional(),
    statusCode: z.number(),
    isRetryable: z.boolean(),
  }),
  internal: z.object({
    message: z.string(),
  }),
};

// Base64 or data URL
const imagePayload = z.string().min(1, 'image is required');

export const api = {
  analysis: {
    analyze: {
      method: 'POST' as const,
      path: '/api/analyze',
      input: z.object({
        image: imagePayload,
        intelligentCrop: z.boolean().optional().default(true),
        categoryFilter: z.string().min(1).optional(),
        limit: z.number().int().min(1).max(200).optional(),
      }),
      responses: {
        200: z.custom<AnalysisResult>(),
        400: errorSchemas.validation,
      },
    },
    cropPreview: {
      method: 'POST' as const,
      path: '/api/crop-preview',
      input: z.object({
        image: imagePayload,
      }),
      responses: {
        200: z.custom<CropPreview>(),
        400: errorSchemas.validation,
      },
    },
  },
  system: {
    aiStatus: {
      method: 'GET' as const,
      path: '/api/ai-status',
      responses: {
        200: z.object({
          services: z.record(z.boolean()),
          health: z.record(z.object({
            status: z.enum(['healthy', 'degraded', 'down']),
            failureRate: z.string(),
            avgLatencyMs: z.number(),
            totalRequests: z.number(),
          })),
        }),
      },
    },
    health: {
      method: 'GET' as const,
      path: '/api/health',
      responses: {
        200: z.object({ status: z.literal('ok') }),
      },
    },
  },
};

export type AnalyzeRequest = z.infer<typeof api.analysis.analyze.input>;
export type CropPreviewRequest = z.infer<typeof api.analysis.cropPreview.input>;
