/**
 * Rule-based synthesis over raw expert findings.
 *
 * Used whenever the generative synthesizer is unavailable or returns
 * something unusable. Evidence precedence for the brand is OCR text, then
 * labels and web entities, then object names.
 */

import type {
  ColorSignal,
  ExpertId,
  ExpertOutput,
  LabelSignal,
  ObjectSignal,
  SynthesizedAttributes,
  TextSignal,
  WebEntitySignal,
} from '@shared/schema';
import { EXPERT_IDS, MIN_CONFIDENCE } from '@shared/schema';
import {
  containsTerm,
  findBrand,
  findCategory,
  findColors,
  findFeatures,
  titleCase,
  type Lexicon,
} from '@shared/lexicon';

// Signal weights, out of 100
const SIGNAL_WEIGHTS = {
  texts: 40,
  labels: 30,
  webEntities: 20,
  objects: 15,
  colors: 10,
} as const;

const MAX_DOMINANT_COLORS = 3;
const MAX_RAW_LABELS = 10;

export interface ExpertEvidence {
  expert: ExpertId;
  labels: LabelSignal[];
  webEntities: WebEntitySignal[];
  objects: ObjectSignal[];
  texts: TextSignal[];
  colors: ColorSignal[];
  description?: string;
}

export function collectEvidence(outputs: ExpertOutput[]): ExpertEvidence[] {
  const evidence: ExpertEvidence[] = [];
  for (const output of outputs) {
    if (output.status !== 'success') continue;
    const findings = output.findings;
    const entry: ExpertEvidence = {
      expert: output.expert,
      labels: findings.labels ?? [],
      webEntities: [],
      objects: [],
      texts: [],
      colors: [],
    };
    switch (findings.expert) {
      case 'google_vision':
        entry.webEntities = findings.webEntities ?? [];
        entry.objects = findings.objects ?? [];
        entry.texts = findings.texts ?? [];
        entry.colors = findings.colors ?? [];
        break;
      case 'aws_rekognition':
        entry.objects = findings.objects ?? [];
        entry.texts = findings.texts ?? [];
        break;
      case 'clip_encoder':
        entry.description = findings.description;
        break;
    }
    evidence.push(entry);
  }
  return evidence;
}

/** True when the expert reported at least one usable signal. */
export function hasSignals(entry: ExpertEvidence): boolean {
  return entry.labels.length > 0 || entry.webEntities.length > 0 || entry.objects.length > 0 ||
    entry.texts.length > 0 || entry.colors.length > 0 || !!entry.description;
}

export function colorName(red: number, green: number, blue: number): string | null {
  if (red > 200 && green < 100 && blue < 100) return 'Red';
  if (red < 100 && green > 200 && blue < 100) return 'Green';
  if (red < 100 && green < 100 && blue > 200) return 'Blue';
  if (red > 200 && green > 200 && blue < 100) return 'Yellow';
  if (red > 200 && green < 100 && blue > 200) return 'Magenta';
  if (red < 100 && green > 200 && blue > 200) return 'Cyan';
  if (red > 200 && green > 200 && blue > 200) return 'White';
  if (red < 50 && green < 50 && blue < 50) return 'Black';
  if (red > 150 && green > 150 && blue > 150) return 'Gray';
  return null;
}

function pushUnique(target: string[], value: string): void {
  const lower = value.toLowerCase();
  if (value && !target.some(v => v.toLowerCase() === lower)) {
    target.push(value);
  }
}

/** Labels across experts, most confident first; ties keep expert order. */
export function rankLabels(evidence: ExpertEvidence[]): LabelSignal[] {
  return evidence.flatMap(e => e.labels).sort((a, b) => b.confidence - a.confidence);
}

export function signalConfidence(evidence: ExpertEvidence[]): number {
  let score = 0;
  if (evidence.some(e => e.texts.length > 0)) score += SIGNAL_WEIGHTS.texts;
  if (evidence.some(e => e.labels.length > 0)) score += SIGNAL_WEIGHTS.labels;
  if (evidence.some(e => e.webEntities.length > 0)) score += SIGNAL_WEIGHTS.webEntities;
  if (evidence.some(e => e.objects.length > 0)) score += SIGNAL_WEIGHTS.objects;
  if (evidence.some(e => e.colors.length > 0)) score += SIGNAL_WEIGHTS.colors;
  return Math.min(score, 100) / 100;
}

function detectBrand(lexicon: Lexicon, evidence: ExpertEvidence[], labels: LabelSignal[]): string {
  for (const text of evidence.flatMap(e => e.texts)) {
    const brand = findBrand(lexicon, text.text);
    if (brand) return brand;
  }
  const labelLike = [
    ...labels.map(l => l.name),
    ...evidence.flatMap(e => e.webEntities).map(w => w.description),
  ];
  for (const name of labelLike) {
    const brand = findBrand(lexicon, name);
    if (brand) return brand;
  }
  for (const obj of evidence.flatMap(e => e.objects)) {
    const brand = findBrand(lexicon, obj.name);
    if (brand) return brand;
  }
  return '';
}

function detectColors(lexicon: Lexicon, evidence: ExpertEvidence[], labels: LabelSignal[]): string[] {
  const colors: string[] = [];
  const dominant = evidence.flatMap(e => e.colors).slice(0, MAX_DOMINANT_COLORS);
  for (const c of dominant) {
    const name = colorName(c.red, c.green, c.blue);
    if (name) pushUnique(colors, name);
  }
  if (colors.length > 0) return colors;

  for (const label of labels) {
    for (const color of findColors(lexicon, label.name)) {
      pushUnique(colors, titleCase(color));
    }
  }
  return colors;
}

/**
 * Every lowercase string an expert produced, joined for whole-word matching.
 */
export function expertVocabulary(entry: ExpertEvidence): string {
  const parts = [
    ...entry.labels.map(l => l.name),
    ...entry.webEntities.map(w => w.description),
    ...entry.objects.map(o => o.name),
    ...entry.texts.map(t => t.text),
    ...entry.colors.map(c => colorName(c.red, c.green, c.blue) ?? ''),
    entry.description ?? '',
  ];
  return parts.filter(Boolean).join(' | ').toLowerCase();
}

/**
 * Share of the final identification terms each expert independently saw.
 * Failed experts, and experts when nothing was identified, score 0.
 */
export function computeExpertAgreement(
  attrs: Pick<SynthesizedAttributes, 'brand' | 'category' | 'subCategory' | 'attributes' | 'colors'>,
  outputs: ExpertOutput[]
): Partial<Record<ExpertId, number>> {
  const terms: string[] = [];
  for (const term of [attrs.brand, attrs.subCategory || attrs.category, ...attrs.attributes, ...attrs.colors]) {
    if (term && term.trim()) pushUnique(terms, term.trim());
  }

  const evidence = collectEvidence(outputs);
  const agreement: Partial<Record<ExpertId, number>> = {};
  for (const output of outputs) {
    const entry = evidence.find(e => e.expert === output.expert);
    if (!entry || terms.length === 0) {
      agreement[output.expert] = 0;
      continue;
    }
    const vocabulary = expertVocabulary(entry);
    const matched = terms.filter(term => containsTerm(vocabulary, term)).length;
    agreement[output.expert] = Math.round((matched / terms.length) * 100) / 100;
  }
  return agreement;
}

export function heuristicSynthesis(outputs: ExpertOutput[], lexicon: Lexicon): SynthesizedAttributes {
  const evidence = collectEvidence(outputs);
  const labels = rankLabels(evidence);

  let category = '';
  let subCategory = '';
  for (const label of labels) {
    const match = findCategory(lexicon, label.name);
    if (match) {
      category = match.category;
      subCategory = titleCase(label.name);
      break;
    }
  }
  if (!category && labels.length > 0) {
    category = labels[0].name;
  }

  const attributes: string[] = [];
  for (const label of labels) {
    for (const feature of findFeatures(lexicon, label.name)) {
      pushUnique(attributes, feature);
    }
  }

  const brand = detectBrand(lexicon, evidence, labels);
  const colors = detectColors(lexicon, evidence, labels);

  const webEntities = evidence.flatMap(e => e.webEntities);
  const productName =
    webEntities[0]?.description ||
    [brand, subCategory].filter(Boolean).join(' ') ||
    labels[0]?.name ||
    '';

  const rawLabels: string[] = [];
  for (const label of labels) {
    if (rawLabels.length >= MAX_RAW_LABELS) break;
    pushUnique(rawLabels, label.name);
  }

  const confidenceScore = Math.max(MIN_CONFIDENCE, signalConfidence(evidence));
  const contributing = EXPERT_IDS.filter(id => evidence.some(e => e.expert === id && hasSignals(e)));

  const identified = { brand, category, subCategory, attributes, colors };
  return {
    productName,
    ...identified,
    confidenceScore,
    aiSummary: `Identified as ${productName || 'item'} in ${category || 'unknown'} category ` +
      `from ${contributing.length} expert${contributing.length === 1 ? '' : 's'} (rule-based).`,
    expertAgreement: computeExpertAgreement(identified, outputs),
    suggestedQuery: null,
    rawLabels,
    strategy: 'heuristic',
  };
}
