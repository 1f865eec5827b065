/**
 * API Monitoring & Metrics
 *
 * Tracks success rates, failures, and latency for each upstream service.
 * Fed by the HTTP layer from analysis summaries; the pipeline itself keeps
 * no cross-request state.
 */

import { EXPERT_IDS, PipelineStage, type AnalysisSummary } from '@shared/schema';

export const API_NAMES = [...EXPERT_IDS, 'openai', 'marketplace', 'embedding'] as const;
export type ApiName = typeof API_NAMES[number];

interface ApiMetrics {
  success: number;
  failed: number;
  totalLatencyMs: number;
  minLatencyMs: number;
  maxLatencyMs: number;
  lastError?: {
    message: string;
    timestamp: number;
    code?: string;
  };
  lastSuccessTimestamp: number;
  lastFailureTimestamp: number;
}

export interface ApiMetricsSnapshot extends ApiMetrics {
  totalRequests: number;
  successRate: string;
  failureRate: string;
  avgLatencyMs: number;
  isHealthy: boolean;
}

export type ApiHealth = 'healthy' | 'degraded' | 'down';

export interface ApiHealthReport {
  status: ApiHealth;
  failureRate: string;
  avgLatencyMs: number;
  totalRequests: number;
}

function emptyMetrics(): ApiMetrics {
  return {
    success: 0,
    failed: 0,
    totalLatencyMs: 0,
    minLatencyMs: Infinity,
    maxLatencyMs: 0,
    lastSuccessTimestamp: 0,
    lastFailureTimestamp: 0,
  };
}

export class MonitoringService {
  private metrics = new Map<ApiName, ApiMetrics>();
  private thresholds = {
    failureRatePercent: 10, // Alert if >10% of requests fail
    slowLatencyMs: 5000,
  };

  constructor() {
    this.initializeMetrics();
  }

  private initializeMetrics(): void {
    for (const api of API_NAMES) {
      this.metrics.set(api, emptyMetrics());
    }
  }

  private metricFor(api: ApiName): ApiMetrics {
    let metric = this.metrics.get(api);
    if (!metric) {
      metric = emptyMetrics();
      this.metrics.set(api, metric);
    }
    return metric;
  }

  recordSuccess(api: ApiName, latencyMs: number): void {
    const metric = this.metricFor(api);
    metric.success++;
    metric.totalLatencyMs += latencyMs;
    metric.minLatencyMs = Math.min(metric.minLatencyMs, latencyMs);
    metric.maxLatencyMs = Math.max(metric.maxLatencyMs, latencyMs);
    metric.lastSuccessTimestamp = Date.now();
    metric.lastError = undefined;

    this.checkAlerts(api);
  }

  recordFailure(api: ApiName, error: Error | string, code?: string): void {
    const metric = this.metricFor(api);
    metric.failed++;
    metric.lastFailureTimestamp = Date.now();
    metric.lastError = {
      message: error instanceof Error ? error.message : String(error),
      timestamp: Date.now(),
      code,
    };

    this.checkAlerts(api);
  }

  /**
   * Folds one finished analysis into the counters. Latencies come from the
   * summary's stage timings; experts report their own.
   */
  recordAnalysis(summary: AnalysisSummary): void {
    const stageMs = (stage: PipelineStage) => summary.stages.find(s => s.stage === stage)?.durationMs ?? 0;

    for (const expert of EXPERT_IDS) {
      const status = summary.expertStatus[expert];
      if (!status || status === 'unavailable') continue;
      if (status === 'success') {
        this.recordSuccess(expert, summary.expertLatencyMs[expert] ?? 0);
      } else {
        this.recordFailure(expert, `expert ${status}`, status);
      }
    }

    if (summary.synthesisDegraded) {
      this.recordFailure('openai', summary.synthesisDegradedReason ?? 'synthesis degraded');
    } else if (summary.synthesisStrategy === 'generative') {
      this.recordSuccess('openai', stageMs(PipelineStage.SYNTHESIZED));
    }

    const searchError = summary.stageErrors.find(e => e.stage === PipelineStage.SEARCHED);
    if (searchError) {
      this.recordFailure('marketplace', searchError.message, searchError.code);
    } else if (summary.queriesAttempted.length > 0) {
      this.recordSuccess('marketplace', stageMs(PipelineStage.SEARCHED));
    }

    const rerankError = summary.stageErrors.find(e => e.stage === PipelineStage.RERANKED);
    if (rerankError) {
      this.recordFailure('embedding', rerankError.message, rerankError.code);
    } else if (summary.compsWithVisualScores > 0) {
      this.recordSuccess('embedding', stageMs(PipelineStage.RERANKED));
    }
  }

  getMetrics(api: ApiName): ApiMetricsSnapshot {
    const metric = this.metricFor(api);
    const total = metric.success + metric.failed;
    const failureRate = total > 0 ? (metric.failed / total) * 100 : 0;
    const avgLatencyMs = metric.success > 0 ? metric.totalLatencyMs / metric.success : 0;

    return {
      ...metric,
      totalRequests: total,
      successRate: total > 0 ? ((metric.success / total) * 100).toFixed(1) : '100',
      failureRate: failureRate.toFixed(1),
      avgLatencyMs: Math.round(avgLatencyMs),
      isHealthy: failureRate < this.thresholds.failureRatePercent,
    };
  }

  getHealthStatus(): Partial<Record<ApiName, ApiHealthReport>> {
    const result: Partial<Record<ApiName, ApiHealthReport>> = {};
    for (const api of API_NAMES) {
      const metrics = this.getMetrics(api);
      const failureRate = parseFloat(metrics.failureRate);

      let status: ApiHealth = 'healthy';
      if (metrics.totalRequests > 0 && metrics.success === 0) {
        status = 'down';
      } else if (failureRate > this.thresholds.failureRatePercent) {
        status = 'degraded';
      }

      result[api] = {
        status,
        failureRate: failureRate.toFixed(1) + '%',
        avgLatencyMs: metrics.avgLatencyMs,
        totalRequests: metrics.totalRequests,
      };
    }
    return result;
  }

  private checkAlerts(api: ApiName): void {
    const metrics = this.getMetrics(api);

    if (parseFloat(metrics.failureRate) > this.thresholds.failureRatePercent && metrics.totalRequests >= 5) {
      this.sendAlert(
        `${api.toUpperCase()} HIGH FAILURE RATE`,
        `${metrics.failureRate}% of requests are failing (threshold: ${this.thresholds.failureRatePercent}%)`,
        'warning'
      );
    }

    if (metrics.avgLatencyMs > this.thresholds.slowLatencyMs) {
      this.sendAlert(
        `${api.toUpperCase()} SLOW`,
        `Average latency is ${metrics.avgLatencyMs}ms (high threshold)`,
        'warning'
      );
    }
  }

  // TODO: forward warnings to an alerting webhook once one is configured
  private sendAlert(title: string, message: string, severity: 'info' | 'warning'): void {
    const output = `[${new Date().toISOString()}] [${severity.toUpperCase()}] ${title}: ${message}`;

    if (severity === 'warning') {
      console.warn(output);
    } else {
      console.log(output);
    }
  }
}

export const monitoring = new MonitoringService();
