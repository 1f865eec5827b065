/**
 * Heuristic Synthesis Tests
 *
 * RULES:
 * 1. Category comes from the most confident label that names a lexicon category
 * 2. Brand evidence: OCR text > labels / web entities > objects
 * 3. Confidence is the weighted sum of signal types present (text 40, labels 30,
 *    web entities 20, objects 15, colors 10), capped at 1.0 and never below MIN_CONFIDENCE
 */

import type { ExpertOutput } from '@shared/schema';
import { getDefaultLexicon } from '@shared/lexicon';
import { colorName, computeExpertAgreement, heuristicSynthesis, signalConfidence, collectEvidence } from './heuristic-synthesis';

const lexicon = getDefaultLexicon();

function failed(expert: ExpertOutput['expert']): ExpertOutput {
  return { expert, status: 'error', error: { kind: 'timeout', message: 'timed out' }, latencyMs: 8000 };
}

describe('heuristicSynthesis', () => {
  const poloPanel: ExpertOutput[] = [
    {
      expert: 'google_vision',
      status: 'success',
      latencyMs: 120,
      findings: {
        expert: 'google_vision',
        labels: [
          { name: 'polo shirt', confidence: 0.9 },
          { name: 'cotton', confidence: 0.8 },
        ],
      },
    },
    {
      expert: 'aws_rekognition',
      status: 'success',
      latencyMs: 150,
      findings: { expert: 'aws_rekognition', labels: [{ name: 'long sleeve', confidence: 0.7 }] },
    },
    {
      expert: 'clip_encoder',
      status: 'success',
      latencyMs: 90,
      findings: { expert: 'clip_encoder' },
    },
  ];

  it('should identify a polo shirt from labels alone', () => {
    const result = heuristicSynthesis(poloPanel, lexicon);

    expect(result.category).toBe('Clothing');
    expect(result.subCategory).toBe('Polo Shirt');
    expect(result.brand).toBe('');
    expect(result.confidenceScore).toBe(0.3);
    expect(result.attributes).toEqual(['cotton', 'long sleeve']);
    expect(result.colors).toEqual([]);
    expect(result.productName).toBe('Polo Shirt');
    expect(result.rawLabels).toEqual(['polo shirt', 'cotton', 'long sleeve']);
    expect(result.strategy).toBe('heuristic');
    expect(result.suggestedQuery).toBeNull();
  });

  it('should score agreement by the share of final terms each expert saw', () => {
    const result = heuristicSynthesis(poloPanel, lexicon);

    expect(result.expertAgreement).toEqual({
      google_vision: 0.67,
      aws_rekognition: 0.33,
      clip_encoder: 0,
    });
  });

  it('should prefer a brand read by OCR over one in the labels', () => {
    const outputs: ExpertOutput[] = [
      {
        expert: 'google_vision',
        status: 'success',
        latencyMs: 100,
        findings: {
          expert: 'google_vision',
          labels: [{ name: 'Nike sneaker', confidence: 0.95 }],
          texts: [{ text: 'ADIDAS ORIGINALS', confidence: 1 }],
        },
      },
    ];

    const result = heuristicSynthesis(outputs, lexicon);

    expect(result.brand).toBe('Adidas');
    expect(result.category).toBe('Shoes');
    expect(result.subCategory).toBe('Nike Sneaker');
    expect(result.confidenceScore).toBe(0.7);
  });

  it('should fall back to object names for the brand', () => {
    const outputs: ExpertOutput[] = [
      {
        expert: 'aws_rekognition',
        status: 'success',
        latencyMs: 100,
        findings: {
          expert: 'aws_rekognition',
          objects: [{ name: 'Lego Brick', confidence: 0.8 }],
        },
      },
    ];

    expect(heuristicSynthesis(outputs, lexicon).brand).toBe('LEGO');
  });

  it('should use the top label as category when no lexicon category matches', () => {
    const outputs: ExpertOutput[] = [
      {
        expert: 'aws_rekognition',
        status: 'success',
        latencyMs: 100,
        findings: {
          expert: 'aws_rekognition',
          labels: [
            { name: 'Pottery', confidence: 0.6 },
            { name: 'Vase', confidence: 0.9 },
          ],
        },
      },
    ];

    const result = heuristicSynthesis(outputs, lexicon);

    expect(result.category).toBe('Vase');
    expect(result.subCategory).toBe('');
    expect(result.productName).toBe('Vase');
  });

  it('should name dominant colors and use the top web entity as product name', () => {
    const outputs: ExpertOutput[] = [
      {
        expert: 'google_vision',
        status: 'success',
        latencyMs: 100,
        findings: {
          expert: 'google_vision',
          webEntities: [{ description: 'Ralph Lauren Custom Fit Polo', score: 0.9 }],
          colors: [
            { red: 20, green: 30, blue: 230, score: 0.6, pixelFraction: 0.5 },
            { red: 250, green: 250, blue: 250, score: 0.3, pixelFraction: 0.3 },
            { red: 120, green: 60, blue: 30, score: 0.1, pixelFraction: 0.2 },
          ],
        },
      },
    ];

    const result = heuristicSynthesis(outputs, lexicon);

    expect(result.productName).toBe('Ralph Lauren Custom Fit Polo');
    expect(result.brand).toBe('Ralph Lauren');
    expect(result.colors).toEqual(['Blue', 'White']);
    expect(result.confidenceScore).toBe(0.3);
  });

  it('should ignore failed experts and give them zero agreement', () => {
    const outputs: ExpertOutput[] = [failed('google_vision'), poloPanel[1]];

    const result = heuristicSynthesis(outputs, lexicon);

    expect(result.attributes).toEqual(['long sleeve']);
    expect(result.expertAgreement.google_vision).toBe(0);
    expect(result.expertAgreement.aws_rekognition).toBe(1);
  });

  it('should not score an expert that answered with nothing below the floor', () => {
    const outputs: ExpertOutput[] = [
      { expert: 'google_vision', status: 'success', latencyMs: 5, findings: { expert: 'google_vision' } },
    ];

    const result = heuristicSynthesis(outputs, lexicon);

    expect(result.confidenceScore).toBe(0.1);
    expect(result.productName).toBe('');
    expect(result.expertAgreement).toEqual({ google_vision: 0 });
  });
});

describe('signalConfidence', () => {
  it('should cap the weighted sum at 1.0', () => {
    const evidence = collectEvidence([
      {
        expert: 'google_vision',
        status: 'success',
        latencyMs: 1,
        findings: {
          expert: 'google_vision',
          texts: [{ text: 'NIKE', confidence: 1 }],
          labels: [{ name: 'shoe', confidence: 0.9 }],
          webEntities: [{ description: 'Nike Air', score: 0.8 }],
          objects: [{ name: 'Shoe', confidence: 0.9 }],
          colors: [{ red: 0, green: 0, blue: 0, score: 1, pixelFraction: 1 }],
        },
      },
    ]);

    expect(signalConfidence(evidence)).toBe(1);
  });
});

describe('colorName', () => {
  it('should map primary and neutral colors', () => {
    expect(colorName(230, 20, 20)).toBe('Red');
    expect(colorName(230, 230, 40)).toBe('Yellow');
    expect(colorName(10, 10, 10)).toBe('Black');
    expect(colorName(180, 180, 180)).toBe('Gray');
    expect(colorName(120, 60, 30)).toBeNull();
  });
});

describe('computeExpertAgreement', () => {
  it('should give every expert zero when nothing was identified', () => {
    const agreement = computeExpertAgreement(
      { brand: '', category: '', subCategory: '', attributes: [], colors: [] },
      [{ expert: 'clip_encoder', status: 'success', latencyMs: 1, findings: { expert: 'clip_encoder', description: 'a photo of a hat' } }]
    );

    expect(agreement).toEqual({ clip_encoder: 0 });
  });
});
