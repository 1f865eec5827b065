/**
 * Marketplace Query Builder
 *
 * Turns synthesized attributes into ordered search query variants.
 *
 * PRIORITY (fixed):
 * 1. synthesizer        - the generative expert's own search string, else the product name
 * 2. brand-heuristic    - recognized brand missing from variant 1
 * 3. feature-heuristic  - color + detected feature terms + garment type
 * 4. generic-fallback   - top raw labels, else category, else the lexicon default
 *
 * Building is pure: the returned iterable restarts on every iteration and
 * always yields the same sequence for the same input.
 */

import type { QuerySource, QueryVariant, SynthesizedAttributes } from './schema';
import { containsTerm, isKnownBrand, type Lexicon } from './lexicon';

const SOURCE_BASE_CONFIDENCE: Record<QuerySource, number> = {
  'synthesizer': 100,
  'brand-heuristic': 85,
  'feature-heuristic': 70,
  'generic-fallback': 45,
};

const MAX_FEATURE_TERMS = 3;
const GENERIC_LABEL_COUNT = 3;

function normalizeQuery(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function joinTerms(terms: Array<string | null | undefined>): string {
  return normalizeQuery(terms.filter((t): t is string => !!t && t.trim().length > 0).join(' '));
}

function scaleConfidence(source: QuerySource, confidenceScore: number): number {
  const clamped = Math.min(1, Math.max(0, confidenceScore));
  const value = SOURCE_BASE_CONFIDENCE[source] * (0.5 + 0.5 * clamped);
  return Math.round(value * 10) / 10;
}

export class QueryBuilder {
  constructor(private readonly lexicon: Lexicon) {}

  buildVariants(attrs: SynthesizedAttributes): Iterable<QueryVariant> {
    return {
      [Symbol.iterator]: () => this.generate(attrs),
    };
  }

  /** Eager convenience over buildVariants. */
  buildVariantList(attrs: SynthesizedAttributes): QueryVariant[] {
    return Array.from(this.buildVariants(attrs));
  }

  private *generate(attrs: SynthesizedAttributes): Generator<QueryVariant> {
    const seen = new Set<string>();
    const garmentType = attrs.subCategory || attrs.category;
    const primaryColor = attrs.colors[0];

    const candidates: Array<{ source: QuerySource; text: () => string }> = [
      {
        source: 'synthesizer',
        text: () => normalizeQuery(attrs.suggestedQuery || attrs.productName || ''),
      },
      {
        source: 'brand-heuristic',
        text: () => {
          const brand = attrs.brand.trim();
          if (!brand || !isKnownBrand(this.lexicon, brand)) return '';
          const primary = normalizeQuery(attrs.suggestedQuery || attrs.productName || '');
          if (containsTerm(primary, brand)) return '';
          return joinTerms([brand, garmentType, primaryColor]);
        },
      },
      {
        source: 'feature-heuristic',
        text: () => {
          const features = attrs.attributes.slice(0, MAX_FEATURE_TERMS);
          if (features.length === 0 && !garmentType) return '';
          return joinTerms([primaryColor, ...features, garmentType]);
        },
      },
      {
        source: 'generic-fallback',
        text: () => {
          const labels = attrs.rawLabels.slice(0, GENERIC_LABEL_COUNT);
          if (labels.length > 0) return joinTerms(labels);
          return joinTerms([attrs.category]) || this.lexicon.defaultQuery;
        },
      },
    ];

    for (const candidate of candidates) {
      const queryText = candidate.text();
      if (!queryText) continue;

      const key = queryText.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);

      yield {
        queryText,
        confidence: scaleConfidence(candidate.source, attrs.confidenceScore),
        source: candidate.source,
      };
    }
  }
}
