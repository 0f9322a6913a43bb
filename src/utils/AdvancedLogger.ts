import { logger as baseLogger } from './logger';
import * as fs from 'fs/promises';
import * as path from 'path';

export interface LogContext {
  component?: string;
  operation?: string;
  marketId?: string;
  ruleName?: string;
  requestId?: string;
  duration?: number;
  status?: string;
  metadata?: Record<string, unknown>;
}

export interface PerformanceMetric {
  name: string;
  value: number;
  unit: 'ms' | 'count' | 'bytes' | 'percent' | 'rate';
  timestamp: number;
  tags?: Record<string, string>;
}

type AlertLevel = 'warn' | 'error' | 'critical';

interface AlertConfig {
  channels: Array<'console' | 'file'>;
  minLevel: AlertLevel;
  rateLimit: { maxAlerts: number; windowMs: number };
  components?: string[];
}

const ALERT_SEVERITY: Record<AlertLevel, number> = { warn: 1, error: 2, critical: 3 };

export class AdvancedLogger {
  private alertConfigs = new Map<string, AlertConfig>();
  private alertCounts = new Map<string, { count: number; resetTime: number }>();
  private contextStack: LogContext[] = [];
  private alertsFilePath: string;

  constructor() {
    this.alertsFilePath = path.join(process.cwd(), 'logs', 'alerts.log');
    this.setupDefaultAlertConfigs();
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
    this.checkAlerts('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const enhancedContext = { ...context, error: describeError(error) };
    this.log('error', message, enhancedContext);
    this.checkAlerts('error', message, context);
  }

  critical(message: string, error?: unknown, context?: LogContext): void {
    const enhancedContext = { ...context, severity: 'critical', error: describeError(error) };
    this.log('error', `CRITICAL: ${message}`, enhancedContext);
    this.checkAlerts('critical', message, context);
  }

  /** Flags slow timings; values themselves are aggregated by MetricsCollector. */
  recordMetric(metric: PerformanceMetric): void {
    if (metric.unit === 'ms' && metric.value > 5000) {
      this.warn(`Slow operation detected: ${metric.name} = ${metric.value}ms`, {
        component: 'performance',
        operation: metric.name
      });
    }
  }

  /**
   * Time an async operation, record its duration and rethrow on failure.
   */
  async timeOperation<T>(
    operation: () => Promise<T>,
    operationName: string,
    context?: LogContext
  ): Promise<T> {
    const startTime = Date.now();
    const requestId = this.generateRequestId();

    this.contextStack.push({ ...context, operation: operationName, requestId });

    try {
      const result = await operation();
      const duration = Date.now() - startTime;

      this.recordMetric({
        name: `operation_duration_${operationName}`,
        value: duration,
        unit: 'ms',
        timestamp: Date.now(),
        tags: { operation: operationName, status: 'success' }
      });
      this.debug(`Completed operation: ${operationName}`, { requestId, duration, status: 'success' });

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;

      this.recordMetric({
        name: `operation_duration_${operationName}`,
        value: duration,
        unit: 'ms',
        timestamp: Date.now(),
        tags: { operation: operationName, status: 'error' }
      });
      this.error(`Failed operation: ${operationName}`, error, { requestId, duration, status: 'error' });

      throw error;
    } finally {
      this.contextStack.pop();
    }
  }

  logSignalEmission(ruleName: string, marketId: string, score: number, metadata?: Record<string, unknown>): void {
    const context: LogContext = {
      component: 'signal_emitter',
      operation: 'signal_emitted',
      marketId,
      ruleName,
      metadata: { score, ...metadata }
    };

    if (score >= 90) {
      this.warn(`High-score signal emitted: ${ruleName}`, context);
    } else {
      this.info(`Signal emitted: ${ruleName}`, context);
    }
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, context?: object): void {
    const current = this.contextStack.length > 0 ? this.contextStack[this.contextStack.length - 1] : {};
    baseLogger[level](message, { ...current, ...context });
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  private checkAlerts(level: AlertLevel, message: string, context?: LogContext): void {
    for (const [name, config] of this.alertConfigs) {
      if (this.shouldTriggerAlert(name, config, level, context)) {
        this.triggerAlert(name, config, level, message, context);
      }
    }
  }

  private shouldTriggerAlert(name: string, config: AlertConfig, level: AlertLevel, context?: LogContext): boolean {
    if (ALERT_SEVERITY[level] < ALERT_SEVERITY[config.minLevel]) {
      return false;
    }
    if (config.components && (!context?.component || !config.components.includes(context.component))) {
      return false;
    }

    const now = Date.now();
    const alertCount = this.alertCounts.get(name);
    if (!alertCount || now >= alertCount.resetTime) {
      this.alertCounts.set(name, { count: 1, resetTime: now + config.rateLimit.windowMs });
      return true;
    }
    if (alertCount.count < config.rateLimit.maxAlerts) {
      alertCount.count++;
      return true;
    }
    return false;
  }

  private triggerAlert(name: string, config: AlertConfig, level: AlertLevel, message: string, context?: LogContext): void {
    const alertData = {
      name,
      level,
      message,
      context,
      timestamp: new Date().toISOString()
    };

    for (const channel of config.channels) {
      if (channel === 'console') {
        baseLogger.warn(`ALERT [${name}]: ${message}`, alertData);
      } else {
        this.saveAlertToFile(alertData).catch(error => {
          baseLogger.error('Failed to save alert to file:', error);
        });
      }
    }
  }

  private async saveAlertToFile(alertData: object): Promise<void> {
    await fs.mkdir(path.dirname(this.alertsFilePath), { recursive: true });
    await fs.appendFile(this.alertsFilePath, JSON.stringify(alertData) + '\n', 'utf8');
  }

  private setupDefaultAlertConfigs(): void {
    this.alertConfigs.set('critical_errors', {
      channels: ['console', 'file'],
      minLevel: 'critical',
      rateLimit: { maxAlerts: 5, windowMs: 5 * 60 * 1000 }
    });

    // Breaker trips and notifier outages
    this.alertConfigs.set('delivery_errors', {
      channels: ['console'],
      minLevel: 'error',
      rateLimit: { maxAlerts: 3, windowMs: 10 * 60 * 1000 },
      components: ['signal_emitter', 'notifier']
    });
  }
}

function describeError(error: unknown): { name: string; message: string; stack?: string } | undefined {
  if (error === undefined || error === null) return undefined;
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}

export const advancedLogger = new AdvancedLogger();
