/**
 * AWS Rekognition Integration
 * Label detection (with instance boxes) and LINE-level OCR.
 */

import {
  DetectLabelsCommand,
  DetectTextCommand,
  RekognitionClient,
  type DetectLabelsCommandOutput,
  type DetectTextCommandOutput,
} from '@aws-sdk/client-rekognition';
import type { ObjectSignal, RekognitionFindings } from '@shared/schema';

const MAX_LABELS = 20;
const MIN_LABEL_CONFIDENCE = 50;
const MIN_LINE_CONFIDENCE = 80;

export interface RekognitionCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
}

/** The two Rekognition calls we make, so tests can stand in for the SDK. */
export interface RekognitionTransport {
  detectLabels(image: Uint8Array, signal?: AbortSignal): Promise<DetectLabelsCommandOutput>;
  detectText(image: Uint8Array, signal?: AbortSignal): Promise<DetectTextCommandOutput>;
}

export function createSdkTransport(credentials: RekognitionCredentials): RekognitionTransport {
  if (!credentials.accessKeyId || !credentials.secretAccessKey) {
    throw new Error('AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY are required for Rekognition');
  }

  const client = new RekognitionClient({
    region: credentials.region,
    credentials: {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
    },
  });

  return {
    detectLabels: (image, signal) =>
      client.send(
        new DetectLabelsCommand({
          Image: { Bytes: image },
          MaxLabels: MAX_LABELS,
          MinConfidence: MIN_LABEL_CONFIDENCE,
        }),
        { abortSignal: signal }
      ),
    detectText: (image, signal) =>
      client.send(new DetectTextCommand({ Image: { Bytes: image } }), { abortSignal: signal }),
  };
}

// Rekognition reports 0-100
function toUnit(confidence: number | undefined): number {
  return Math.min(1, Math.max(0, (confidence ?? 0) / 100));
}

export function labelsToObjects(output: DetectLabelsCommandOutput): ObjectSignal[] {
  const objects: ObjectSignal[] = [];
  for (const label of output.Labels ?? []) {
    if (!label.Name) continue;
    for (const instance of label.Instances ?? []) {
      const box = instance.BoundingBox;
      if (!box || box.Width === undefined || box.Height === undefined || box.Width <= 0 || box.Height <= 0) {
        continue;
      }
      objects.push({
        name: label.Name,
        confidence: toUnit(instance.Confidence ?? label.Confidence),
        box: {
          left: box.Left ?? 0,
          top: box.Top ?? 0,
          width: box.Width,
          height: box.Height,
        },
      });
    }
  }
  return objects.sort((a, b) => b.confidence - a.confidence);
}

export function toRekognitionFindings(
  labels: DetectLabelsCommandOutput,
  text: DetectTextCommandOutput
): RekognitionFindings {
  const findings: RekognitionFindings = { expert: 'aws_rekognition' };

  if (labels.Labels) {
    findings.labels = labels.Labels
      .filter(label => !!label.Name)
      .map(label => ({ name: label.Name ?? '', confidence: toUnit(label.Confidence) }));
    findings.objects = labelsToObjects(labels);
  }

  if (text.TextDetections) {
    findings.texts = text.TextDetections
      .filter(d => d.Type === 'LINE' && !!d.DetectedText && (d.Confidence ?? 0) >= MIN_LINE_CONFIDENCE)
      .map(d => ({ text: d.DetectedText ?? '', confidence: toUnit(d.Confidence) }));
  }

  return findings;
}

export class RekognitionVisionClient {
  constructor(private readonly transport: RekognitionTransport) {}

  async analyze(image: Buffer, signal?: AbortSignal): Promise<RekognitionFindings> {
    const bytes = new Uint8Array(image);
    const [labels, text] = await Promise.all([
      this.transport.detectLabels(bytes, signal),
      this.transport.detectText(bytes, signal),
    ]);
    return toRekognitionFindings(labels, text);
  }

  async localizeObjects(image: Buffer, signal?: AbortSignal): Promise<ObjectSignal[]> {
    return labelsToObjects(await this.transport.detectLabels(new Uint8Array(image), signal));
  }
}
