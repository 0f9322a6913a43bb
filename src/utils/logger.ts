type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class Logger {
  private get logLevel(): string {
    return process.env.LOG_LEVEL || 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevel = LEVELS.findIndex(candidate => candidate === this.logLevel);
    return LEVELS.indexOf(level) >= Math.max(currentLevel, 0);
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.length > 0 ? ` ${args.map(arg => this.formatArg(arg)).join(' ')}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${formattedArgs}`;
  }

  private formatArg(arg: unknown): string {
    if (arg instanceof Error) {
      return `\nError: ${arg.message}\nStack: ${arg.stack}`;
    }

    if (typeof arg === 'object' && arg !== null) {
      try {
        return JSON.stringify(arg, null, 2);
      } catch (e) {
        return `[Object: ${Object.prototype.toString.call(arg)}]`;
      }
    }

    return String(arg);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.log(this.formatMessage('debug', message, ...args));
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage('info', message, ...args));
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, ...args));
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, ...args));
    }
  }

  logApiCall(method: string, url: string, status?: number, duration?: number): void {
    const details: Record<string, string | number> = { method, url };
    if (status !== undefined) details.status = status;
    if (duration !== undefined) details.duration = `${duration}ms`;

    if (status && status >= 400) {
      this.error('API call failed', details);
    } else {
      this.debug('API call', details);
    }
  }

  logSignalEmission(ruleName: string, marketId: string, score: number, transport: string): void {
    this.info('Signal emitted', {
      rule: ruleName,
      marketId,
      score: score.toFixed(2),
      transport,
    });
  }
}

export const logger = new Logger();
