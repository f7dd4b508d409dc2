import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  SILENT = 6
}

export interface LogContext {
  class?: string;
  method?: string;
  traceId?: string;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level?: LogLevel;
  filePath?: string;
  console?: boolean;
  enableTracing?: boolean;
  context?: LogContext;
}

// Survives module registry resets between Jest test files
interface GlobalLoggerRegistry {
  loggerInstance?: Logger;
}

declare global {
  var __MYSQL_CM_LOGGER_REGISTRY__: GlobalLoggerRegistry | undefined;
}

const globalRegistry: GlobalLoggerRegistry = (() => {
  const existing = globalThis.__MYSQL_CM_LOGGER_REGISTRY__;
  if (existing) return existing;
  const registry: GlobalLoggerRegistry = {};
  globalThis.__MYSQL_CM_LOGGER_REGISTRY__ = registry;
  return registry;
})();

const SENSITIVE_KEYS = ['password', 'secret', 'token'];

const LEVEL_BY_NAME: Record<string, LogLevel> = {
  TRACE: LogLevel.TRACE,
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  FATAL: LogLevel.FATAL,
  SILENT: LogLevel.SILENT
};

/**
 * Accepts a level name (`debug`, `WARN`) or its numeric value (`1`).
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const name = value?.trim().toUpperCase();
  if (!name) return fallback;
  if (name in LEVEL_BY_NAME) return LEVEL_BY_NAME[name];
  const numeric = Number(name);
  if (Number.isInteger(numeric) && numeric >= LogLevel.TRACE && numeric <= LogLevel.SILENT) {
    return numeric;
  }
  return fallback;
}

/**
 * Logging settings named in the environment: `LOG_LEVEL`, `LOG_FILE` and
 * `LOG_CONSOLE`. Unset variables are left out.
 */
export function loggerConfigFromEnv(source: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const config: LoggerConfig = {};
  if (source.LOG_LEVEL) config.level = parseLogLevel(source.LOG_LEVEL);
  if (source.LOG_FILE) config.filePath = source.LOG_FILE;
  if (source.LOG_CONSOLE !== undefined) config.console = source.LOG_CONSOLE !== 'false';
  return config;
}

export class Logger {
  private level: LogLevel = LogLevel.INFO;
  private filePath?: string;
  private consoleEnabled = true;
  private tracingEnabled = true;
  private context: LogContext = {};
  private traceStack: Map<string, { start: number; context: LogContext }> = new Map();

  private constructor(config: LoggerConfig = {}) {
    const fromEnv = loggerConfigFromEnv();
    this.level = config.level ?? fromEnv.level ?? LogLevel.INFO;
    this.filePath = config.filePath ?? fromEnv.filePath;
    this.consoleEnabled = config.console ?? fromEnv.console ?? true;
    this.tracingEnabled = config.enableTracing ?? true;
    this.context = config.context ?? {};

    if (this.filePath) {
      this.ensureLogDirectory();
    }
  }

  public static getInstance(config?: LoggerConfig): Logger {
    if (!globalRegistry.loggerInstance) {
      globalRegistry.loggerInstance = new Logger(config);
    } else if (config) {
      globalRegistry.loggerInstance.updateConfig(config);
    }
    return globalRegistry.loggerInstance;
  }

  private updateConfig(config: LoggerConfig): void {
    if (config.level !== undefined) this.level = config.level;
    if (config.filePath !== undefined) this.filePath = config.filePath;
    if (config.console !== undefined) this.consoleEnabled = config.console;
    if (config.enableTracing !== undefined) this.tracingEnabled = config.enableTracing;
    if (config.context !== undefined) this.context = { ...this.context, ...config.context };

    if (this.filePath) {
      this.ensureLogDirectory();
    }
  }

  private ensureLogDirectory(): void {
    if (this.filePath) {
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
  }

  public formatMessage(level: string, message: string, context: LogContext, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const combinedContext: LogContext = { ...this.context, ...context };

    let logLine = `${timestamp} [${level}]`;

    if (combinedContext.class) {
      logLine += ` [${combinedContext.class}`;
      if (combinedContext.method) {
        logLine += `::${combinedContext.method}`;
      }
      logLine += `]`;
    }

    if (combinedContext.traceId) {
      logLine += ` [trace:${combinedContext.traceId}]`;
    }

    logLine += ` ${message}`;

    if (data !== undefined) {
      const sanitized = this.sanitizeForLogging(data);
      if (typeof sanitized === 'object' && sanitized !== null) {
        try {
          logLine += ` ${JSON.stringify(sanitized, (_key, value: unknown) =>
            typeof value === 'bigint' ? value.toString() : value
          )}`;
        } catch {
          logLine += ` [UnserializableObject]`;
        }
      } else {
        logLine += ` ${String(sanitized)}`;
      }
    }

    return logLine;
  }

  private writeLog(level: string, message: string, context: LogContext = {}, data?: unknown): void {
    const formattedMessage = this.formatMessage(level, message, context, data);

    if (this.consoleEnabled) {
      if (level === 'ERROR' || level === 'FATAL') {
        console.error(formattedMessage);
      } else if (level === 'WARN') {
        console.warn(formattedMessage);
      } else {
        console.log(formattedMessage);
      }
    }

    if (this.filePath) {
      try {
        fs.appendFileSync(this.filePath, formattedMessage + '\n');
      } catch (error) {
        if (this.consoleEnabled) {
          console.error(`Failed to write log file ${this.filePath}: ${String(error)}`);
        }
      }
    }
  }

  public trace(message: string, context: LogContext = {}, data?: unknown): void {
    if (this.level <= LogLevel.TRACE) {
      this.writeLog('TRACE', message, context, data);
    }
  }

  public debug(message: string, context: LogContext = {}, data?: unknown): void {
    if (this.level <= LogLevel.DEBUG) {
      this.writeLog('DEBUG', message, context, data);
    }
  }

  public info(message: string, context: LogContext = {}, data?: unknown): void {
    if (this.level <= LogLevel.INFO) {
      this.writeLog('INFO', message, context, data);
    }
  }

  public warn(message: string, context: LogContext = {}, data?: unknown): void {
    if (this.level <= LogLevel.WARN) {
      this.writeLog('WARN', message, context, data);
    }
  }

  public error(message: string, context: LogContext = {}, data?: unknown): void {
    if (this.level <= LogLevel.ERROR) {
      this.writeLog('ERROR', message, context, data);
    }
  }

  public fatal(message: string, context: LogContext = {}, data?: unknown): void {
    if (this.level <= LogLevel.FATAL) {
      this.writeLog('FATAL', message, context, data);
    }
  }

  public startTrace(operation: string, context: LogContext = {}): string {
    if (!this.tracingEnabled) return '';

    const traceId = Math.random().toString(36).substring(2, 10);
    this.traceStack.set(traceId, { start: Date.now(), context });
    this.trace(`Starting ${operation}`, { ...context, traceId });

    return traceId;
  }

  public endTrace(traceId: string, context: LogContext = {}): void {
    if (!this.tracingEnabled || !traceId) return;

    const traceInfo = this.traceStack.get(traceId);
    if (traceInfo) {
      const duration = Date.now() - traceInfo.start;
      this.trace(`Completed operation`, {
        ...traceInfo.context,
        ...context,
        traceId,
        duration: `${duration}ms`
      });
      this.traceStack.delete(traceId);
    }
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  public createChildLogger(context: LogContext): Logger {
    return new Logger({
      level: this.level,
      filePath: this.filePath,
      console: this.consoleEnabled,
      enableTracing: this.tracingEnabled,
      context: { ...this.context, ...context }
    });
  }

  private sanitizeForLogging(obj: unknown): unknown {
    if (obj === null || obj === undefined) return obj;
    if (typeof obj === 'string' || typeof obj === 'number' || typeof obj === 'boolean') return obj;
    if (typeof obj === 'bigint') return obj.toString();
    if (obj instanceof Error) {
      return {
        name: obj.name,
        message: obj.message,
        stack: obj.stack?.split('\n').slice(0, 5).join('\n')
      };
    }
    if (Buffer.isBuffer(obj)) {
      return `<Buffer ${obj.length} bytes>`;
    }
    if (obj instanceof Date) {
      return obj.toISOString();
    }
    if (Array.isArray(obj)) {
      return obj.slice(0, 10).map(item => this.sanitizeForLogging(item));
    }
    if (typeof obj === 'object') {
      const sanitized: Record<string, unknown> = {};
      let count = 0;
      const entries = Object.entries(obj);
      for (const [key, value] of entries) {
        if (count >= 20) {
          sanitized['...'] = `${entries.length - count} more properties`;
          break;
        }
        if (SENSITIVE_KEYS.some(sensitive => key.toLowerCase().includes(sensitive))) {
          sanitized[key] = '[REDACTED]';
        } else {
          sanitized[key] = this.sanitizeForLogging(value);
        }
        count++;
      }
      return sanitized;
    }
    return String(obj);
  }
}
