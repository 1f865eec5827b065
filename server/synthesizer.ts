/**
 * Attribute Synthesizer
 *
 * Fuses the panel's findings into one SynthesizedAttributes record.
 *
 * STRATEGIES:
 * 1. generative - an LLM reads every successful finding and resolves the
 *                 conflicts into a fixed JSON schema
 * 2. heuristic  - lexicon rules over the raw signals (see heuristic-synthesis)
 * 3. none       - no expert reported a usable signal; minimal record at MIN_CONFIDENCE
 *
 * The generative answer always wins over raw evidence. Any generative
 * failure falls back to the heuristic and is reported as degraded.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import type { ExpertFindings, ExpertOutput, SynthesizedAttributes } from '@shared/schema';
import { MIN_CONFIDENCE } from '@shared/schema';
import type { Lexicon } from '@shared/lexicon';
import { ErrorCode, errorMessage } from './error-handling';
import { withTimeout } from './retry-strategy';
import { collectEvidence, computeExpertAgreement, hasSignals, heuristicSynthesis } from './heuristic-synthesis';
import type { LazyHandle } from './lazy-handle';

export interface GenerativeReasoner {
  /** Returns the model's raw text reply. */
  complete(prompt: string, signal?: AbortSignal): Promise<string>;
}

export interface SynthesisOutcome {
  attributes: SynthesizedAttributes;
  degraded: boolean;
  degradedReason?: string;
}

export const generativeAnswerSchema = z.object({
  productName: z.string().default(''),
  brand: z.string().nullable().default(''),
  category: z.string().default(''),
  subCategory: z.string().nullable().default(''),
  attributes: z.array(z.string()).default([]),
  colors: z.array(z.string()).default([]),
  certainty: z.coerce.number().min(0).max(1),
  summary: z.string().default(''),
  searchQuery: z.string().nullable().default(null),
});

export type GenerativeAnswer = z.infer<typeof generativeAnswerSchema>;

// Keyed by the number of experts that contributed at least one signal
export function corroborationMultiplier(contributingExperts: number): number {
  if (contributingExperts >= 3) return 1.0;
  if (contributingExperts === 2) return 0.9;
  return 0.8;
}

export class OpenAIReasoner implements GenerativeReasoner {
  private readonly client: OpenAI;

  constructor(apiKey: string | undefined, private readonly model: string) {
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for generative synthesis');
    }
    this.client = new OpenAI({ apiKey });
  }

  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: 0.1,
        response_format: { type: 'json_object' },
        messages: [{ role: 'user', content: prompt }],
      },
      { signal }
    );
    return response.choices[0]?.message?.content ?? '';
  }
}

function describeFindings(findings: ExpertFindings): Record<string, unknown> {
  // Round confidences so the prompt stays compact
  const round = (n: number) => Math.round(n * 100) / 100;
  switch (findings.expert) {
    case 'google_vision':
      return {
        webEntities: findings.webEntities?.map(w => ({ description: w.description, score: round(w.score) })),
        labels: findings.labels?.map(l => ({ name: l.name, confidence: round(l.confidence) })),
        objects: findings.objects?.map(o => ({ name: o.name, confidence: round(o.confidence) })),
        text: findings.texts?.map(t => t.text),
        dominantColors: findings.colors?.map(c => ({ rgb: [c.red, c.green, c.blue], score: round(c.score) })),
      };
    case 'aws_rekognition':
      return {
        labels: findings.labels?.map(l => ({ name: l.name, confidence: round(l.confidence) })),
        objects: findings.objects?.map(o => ({ name: o.name, confidence: round(o.confidence) })),
        text: findings.texts?.map(t => t.text),
      };
    case 'clip_encoder':
      return {
        description: findings.description,
        zeroShotLabels: findings.labels?.map(l => ({ name: l.name, confidence: round(l.confidence) })),
      };
  }
}

export function buildSynthesisPrompt(outputs: ExpertOutput[], lexicon: Lexicon): string {
  const panel: Record<string, unknown> = {};
  for (const output of outputs) {
    if (output.status === 'success') {
      panel[output.expert] = describeFindings(output.findings);
    }
  }

  return `You identify second-hand items for resale. Several independent vision services looked at the same photo.
Their raw findings are below; they may be partial or contradict each other.

Resolve conflicts (prefer brand names read from text, then specific labels over generic ones) and answer with ONE JSON object:
{
  "productName": "short human-readable product name",
  "brand": "brand or empty string",
  "category": "one of: ${Object.keys(lexicon.categories).join(', ')}",
  "subCategory": "specific item type, e.g. Polo Shirt",
  "attributes": ["style features, materials, fit"],
  "colors": ["color names"],
  "certainty": 0.0-1.0,
  "summary": "one sentence",
  "searchQuery": "the marketplace search an expert reseller would type"
}

FINDINGS:
${JSON.stringify(panel, null, 2)}`;
}

/** First JSON object in the reply; models sometimes wrap it in prose or fences. */
export function extractJsonObject(content: string): unknown {
  const match = content.match(/\{[\s\S]*\}/);
  if (!match) {
    throw new Error('No JSON object in model reply');
  }
  return JSON.parse(match[0]);
}

function dedupe(values: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of values) {
    const value = raw.trim();
    const key = value.toLowerCase();
    if (!value || seen.has(key)) continue;
    seen.add(key);
    result.push(value);
  }
  return result;
}

export function minimalAttributes(): SynthesizedAttributes {
  return {
    productName: '',
    brand: '',
    category: '',
    subCategory: '',
    attributes: [],
    colors: [],
    confidenceScore: MIN_CONFIDENCE,
    aiSummary: 'No vision expert returned a usable result.',
    expertAgreement: {},
    suggestedQuery: null,
    rawLabels: [],
    strategy: 'none',
  };
}

export class Synthesizer {
  constructor(
    private readonly reasoner: LazyHandle<GenerativeReasoner>,
    private readonly lexicon: Lexicon,
    private readonly timeoutMs: number
  ) {}

  async synthesize(outputs: ExpertOutput[], signal?: AbortSignal): Promise<SynthesisOutcome> {
    const contributing = collectEvidence(outputs).filter(hasSignals).length;
    // An expert that succeeded with nothing to say counts as no evidence
    if (contributing === 0) {
      const attributes = minimalAttributes();
      for (const output of outputs) attributes.expertAgreement[output.expert] = 0;
      return { attributes, degraded: false };
    }

    const acquired = this.reasoner.get();
    if (!acquired.ok) {
      return this.fallback(outputs, `generative synthesis unavailable: ${acquired.reason}`);
    }

    try {
      const reply = await withTimeout(
        acquired.value.complete(buildSynthesisPrompt(outputs, this.lexicon), signal),
        this.timeoutMs,
        ErrorCode.UPSTREAM_TIMEOUT
      );
      const answer = generativeAnswerSchema.parse(extractJsonObject(reply));
      return { attributes: this.fromAnswer(answer, outputs, contributing), degraded: false };
    } catch (error) {
      return this.fallback(outputs, `generative synthesis failed: ${errorMessage(error)}`);
    }
  }

  private fromAnswer(answer: GenerativeAnswer, outputs: ExpertOutput[], contributing: number): SynthesizedAttributes {
    const heuristic = heuristicSynthesis(outputs, this.lexicon);
    const identified = {
      brand: (answer.brand ?? '').trim(),
      category: answer.category.trim(),
      subCategory: (answer.subCategory ?? '').trim(),
      attributes: dedupe(answer.attributes),
      colors: dedupe(answer.colors),
    };
    const confidence = answer.certainty * corroborationMultiplier(contributing);

    return {
      productName: answer.productName.trim(),
      ...identified,
      confidenceScore: Math.min(1, Math.max(0, Math.round(confidence * 1000) / 1000)),
      aiSummary: answer.summary.trim(),
      expertAgreement: computeExpertAgreement(identified, outputs),
      suggestedQuery: answer.searchQuery?.trim() || null,
      rawLabels: heuristic.rawLabels,
      strategy: 'generative',
    };
  }

  private fallback(outputs: ExpertOutput[], reason: string): SynthesisOutcome {
    console.warn(`[Synthesizer] Falling back to heuristic synthesis (${reason})`);
    return {
      attributes: heuristicSynthesis(outputs, this.lexicon),
      degraded: true,
      degradedReason: reason,
    };
  }
}
