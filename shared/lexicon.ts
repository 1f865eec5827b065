/**
 * Identification Lexicon
 *
 * Keyword tables used by the heuristic synthesizer and the query builder.
 * Loaded from config/lexicon.json so the tables can grow without touching
 * control flow; tests build their own small lexicons.
 */

import { z } from 'zod';
import defaultLexiconJson from '../config/lexicon.json';

export const lexiconSchema = z.object({
  brands: z.array(z.string().min(1)),
  categories: z.record(z.array(z.string().min(1))),
  features: z.array(z.string().min(1)),
  colors: z.array(z.string().min(1)),
  zeroShotLabels: z.array(z.string().min(1)),
  categoryIds: z.record(z.string()).default({}),
  defaultQuery: z.string().min(1),
});

export type Lexicon = z.infer<typeof lexiconSchema>;

export function parseLexicon(input: unknown): Lexicon {
  return lexiconSchema.parse(input);
}

let defaultLexicon: Lexicon | null = null;

export function getDefaultLexicon(): Lexicon {
  if (!defaultLexicon) {
    defaultLexicon = parseLexicon(defaultLexiconJson);
  }
  return defaultLexicon;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case-insensitive containment. "cap" matches "baseball cap"
 * but not "capri".
 */
export function containsTerm(text: string, term: string): boolean {
  const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(term.toLowerCase())}($|[^a-z0-9])`);
  return pattern.test(text.toLowerCase());
}

export function findBrand(lexicon: Lexicon, text: string): string | null {
  // Longest names first so "Polo Ralph Lauren" wins over "Ralph Lauren"
  const ordered = [...lexicon.brands].sort((a, b) => b.length - a.length);
  for (const brand of ordered) {
    if (containsTerm(text, brand)) return brand;
  }
  return null;
}

export function isKnownBrand(lexicon: Lexicon, brand: string): boolean {
  const lower = brand.trim().toLowerCase();
  return lexicon.brands.some(b => b.toLowerCase() === lower);
}

export function findCategory(lexicon: Lexicon, text: string): { category: string; term: string } | null {
  for (const [category, terms] of Object.entries(lexicon.categories)) {
    for (const term of terms) {
      if (containsTerm(text, term)) return { category, term };
    }
  }
  return null;
}

export function findFeatures(lexicon: Lexicon, text: string): string[] {
  return lexicon.features.filter(feature => containsTerm(text, feature));
}

export function findColors(lexicon: Lexicon, text: string): string[] {
  return lexicon.colors.filter(color => containsTerm(text, color));
}

export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
