import os from 'os';
import { advancedLogger } from '../utils/AdvancedLogger';
import { errorHandler } from '../utils/ErrorHandler';
import { logger } from '../utils/logger';

export type MetricTags = Record<string, string>;

export interface HistogramSummary {
  count: number;
  avg: number;
  p95: number;
  max: number;
}

export interface ProcessSample {
  timestamp: number;
  memory: {
    rss: number;
    percentage: number;
    heapUsed: number;
    heapTotal: number;
  };
  loadAverage: number[];
  eventLoopLagMs: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  histograms: Record<string, HistogramSummary>;
  process: ProcessSample | null;
}

export interface MetricThreshold {
  metric: 'memory.percentage' | 'eventLoopLagMs';
  warning: number;
  critical: number;
  unit: string;
}

const MAX_HISTOGRAM_SAMPLES = 1000;

export class MetricsCollector {
  private samples: ProcessSample[] = [];
  private collectionInterval?: NodeJS.Timeout;
  private readonly maxSamplesToKeep = 1440;

  private counters = new Map<string, number>();
  private gauges = new Map<string, number>();
  private histograms = new Map<string, number[]>();

  private thresholds: MetricThreshold[] = [
    { metric: 'memory.percentage', warning: 85, critical: 95, unit: '%' },
    { metric: 'eventLoopLagMs', warning: 200, critical: 1000, unit: 'ms' },
  ];

  /**
   * Sample process health at a fixed interval. The timer does not keep the
   * process alive.
   */
  start(intervalMs: number = 60000): void {
    if (this.collectionInterval) {
      logger.warn('Metrics collection is already running');
      return;
    }

    logger.info(`Starting metrics collection with ${intervalMs}ms interval`);
    this.collectionInterval = setInterval(() => {
      this.collectProcessSample().catch(error => {
        errorHandler.handleError(error, { component: 'metrics_collector', operation: 'collect_metrics' });
      });
    }, intervalMs);
    this.collectionInterval.unref();
  }

  stop(): void {
    if (!this.collectionInterval) return;
    clearInterval(this.collectionInterval);
    this.collectionInterval = undefined;
    logger.info('Metrics collection stopped');
  }

  incrementCounter(name: string, value: number = 1, tags?: MetricTags): void {
    const key = this.createMetricKey(name, tags);
    const next = (this.counters.get(key) ?? 0) + value;
    this.counters.set(key, next);

    advancedLogger.recordMetric({ name, value: next, unit: 'count', timestamp: Date.now(), tags });
  }

  setGauge(name: string, value: number, tags?: MetricTags): void {
    this.gauges.set(this.createMetricKey(name, tags), value);
  }

  recordHistogram(name: string, value: number, tags?: MetricTags): void {
    const key = this.createMetricKey(name, tags);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    if (values.length > MAX_HISTOGRAM_SAMPLES) {
      values.splice(0, values.length - MAX_HISTOGRAM_SAMPLES);
    }
    this.histograms.set(key, values);

    advancedLogger.recordMetric({ name, value, unit: 'ms', timestamp: Date.now(), tags });
  }

  getCounter(name: string, tags?: MetricTags): number {
    return this.counters.get(this.createMetricKey(name, tags)) ?? 0;
  }

  getGauge(name: string, tags?: MetricTags): number | undefined {
    return this.gauges.get(this.createMetricKey(name, tags));
  }

  getHistogramSummary(name: string, tags?: MetricTags): HistogramSummary | null {
    const values = this.histograms.get(this.createMetricKey(name, tags));
    return values && values.length > 0 ? summarize(values) : null;
  }

  snapshot(): MetricsSnapshot {
    const histograms: Record<string, HistogramSummary> = {};
    for (const [key, values] of this.histograms) {
      if (values.length > 0) histograms[key] = summarize(values);
    }
    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms,
      process: this.samples.length > 0 ? this.samples[this.samples.length - 1] : null,
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
    this.samples = [];
  }

  private async collectProcessSample(): Promise<void> {
    const memUsage = process.memoryUsage();

    const lagStart = process.hrtime.bigint();
    await new Promise<void>(resolve => setImmediate(resolve));
    const eventLoopLagMs = Number(process.hrtime.bigint() - lagStart) / 1e6;

    const sample: ProcessSample = {
      timestamp: Date.now(),
      memory: {
        rss: memUsage.rss,
        percentage: (memUsage.rss / os.totalmem()) * 100,
        heapUsed: memUsage.heapUsed,
        heapTotal: memUsage.heapTotal,
      },
      loadAverage: os.loadavg(),
      eventLoopLagMs,
    };

    this.samples.push(sample);
    if (this.samples.length > this.maxSamplesToKeep) {
      this.samples = this.samples.slice(-this.maxSamplesToKeep);
    }

    this.checkThresholds(sample);
  }

  private checkThresholds(sample: ProcessSample): void {
    for (const threshold of this.thresholds) {
      const value = threshold.metric === 'memory.percentage' ? sample.memory.percentage : sample.eventLoopLagMs;
      const context = {
        component: 'metrics_collector',
        operation: 'threshold_check',
        metadata: { metric: threshold.metric, value },
      };

      if (value >= threshold.critical) {
        advancedLogger.critical(`Critical threshold exceeded: ${threshold.metric} = ${value.toFixed(1)}${threshold.unit}`, undefined, context);
      } else if (value >= threshold.warning) {
        advancedLogger.warn(`Warning threshold exceeded: ${threshold.metric} = ${value.toFixed(1)}${threshold.unit}`, context);
      }
    }
  }

  private createMetricKey(name: string, tags?: MetricTags): string {
    if (!tags) return name;
    const tagString = Object.entries(tags)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => `${key}=${value}`)
      .join(',');
    return `${name}{${tagString}}`;
  }
}

function summarize(values: number[]): HistogramSummary {
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.min(sorted.length - 1, Math.ceil(sorted.length * 0.95) - 1);
  return {
    count: sorted.length,
    avg: sorted.reduce((sum, value) => sum + value, 0) / sorted.length,
    p95: sorted[Math.max(index, 0)],
    max: sorted[sorted.length - 1],
  };
}

export const metricsCollector = new MetricsCollector();
