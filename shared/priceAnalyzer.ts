/**
 * Comp Price Analyzer
 *
 * Summary statistics over the prices of visually ranked comps.
 *
 * CONFIDENCE LEVELS:
 * - Low:    fewer than 3 priced comps
 * - High:   at least 20 priced comps and coefficient of variation <= 0.25
 * - Medium: everything else
 *
 * Suggested price is the arithmetic mean of the priced comps. An empty set
 * returns the zero state instead of throwing.
 */

import type { CandidateListing, PriceAnalysis, PriceConfidenceLabel } from './schema';

export const MIN_COMPS_FOR_MEDIUM = 3;
export const HIGH_CONFIDENCE_MIN_COMPS = 20;
export const HIGH_CONFIDENCE_MAX_CV = 0.25;

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function roundRatio(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export function emptyPriceAnalysis(): PriceAnalysis {
  return {
    priceRange: { low: 0, high: 0 },
    suggestedPrice: 0,
    mean: 0,
    median: 0,
    standardDeviation: 0,
    coefficientOfVariation: 0,
    confidenceLabel: 'Low',
    sampleSize: 0,
  };
}

export function extractPrices(comps: ReadonlyArray<Pick<CandidateListing, 'price'>>): number[] {
  const prices: number[] = [];
  for (const comp of comps) {
    if (typeof comp.price === 'number' && Number.isFinite(comp.price) && comp.price > 0) {
      prices.push(comp.price);
    }
  }
  return prices;
}

export function median(sorted: number[]): number {
  if (sorted.length === 0) return 0;
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function getPriceConfidenceLabel(sampleSize: number, coefficientOfVariation: number): PriceConfidenceLabel {
  if (sampleSize < MIN_COMPS_FOR_MEDIUM) return 'Low';
  if (sampleSize >= HIGH_CONFIDENCE_MIN_COMPS && coefficientOfVariation <= HIGH_CONFIDENCE_MAX_CV) return 'High';
  return 'Medium';
}

export function analyzePrices(comps: ReadonlyArray<Pick<CandidateListing, 'price'>>): PriceAnalysis {
  const prices = extractPrices(comps);
  if (prices.length === 0) {
    return emptyPriceAnalysis();
  }

  const sorted = [...prices].sort((a, b) => a - b);
  const mean = sorted.reduce((sum, p) => sum + p, 0) / sorted.length;
  const variance = sorted.reduce((sum, p) => sum + (p - mean) ** 2, 0) / sorted.length;
  const standardDeviation = Math.sqrt(variance);
  const coefficientOfVariation = mean > 0 ? standardDeviation / mean : 0;

  return {
    priceRange: { low: roundCents(sorted[0]), high: roundCents(sorted[sorted.length - 1]) },
    suggestedPrice: roundCents(mean),
    mean: roundCents(mean),
    median: roundCents(median(sorted)),
    standardDeviation: roundCents(standardDeviation),
    coefficientOfVariation: roundRatio(coefficientOfVariation),
    confidenceLabel: getPriceConfidenceLabel(sorted.length, coefficientOfVariation),
    sampleSize: sorted.length,
  };
}
