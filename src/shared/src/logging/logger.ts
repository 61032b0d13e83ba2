import { pino, type Logger, type LoggerOptions } from 'pino';
import { hostname } from 'os';
import {
  LogConfig,
  LogConfigInput,
  LogConfigSchema,
  LogLevel,
  LogMetadata,
  SerializedError,
  StructuredLogData,
} from './types.js';
import { CorrelationManager } from './correlation.js';
import { env } from '../config/environment.js';

function serializeError(error: Error): SerializedError {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    ...(code ? { code } : {}),
  };
}

export class StructuredLogger {
  private readonly pino: Logger;
  private readonly config: LogConfig;
  private readonly serviceName: string;

  constructor(serviceName: string, config: Partial<LogConfigInput> = {}) {
    this.serviceName = serviceName;
    this.config = LogConfigSchema.parse({
      level: env.LOG_LEVEL || 'info',
      format: env.LOG_FORMAT || (env.NODE_ENV === 'development' ? 'pretty' : 'json'),
      service: serviceName,
      version: process.env.npm_package_version || '1.0.0',
      environment: env.NODE_ENV,
      ...config,
    });

    this.pino = this.createPinoLogger();
  }

  private createPinoLogger(): Logger {
    const pinoConfig: LoggerOptions = {
      name: this.serviceName,
      level: this.config.level,

      // Base fields included in every log
      base: {
        service: this.config.service,
        version: this.config.version,
        environment: this.config.environment,
        hostname: process.env.HOSTNAME || hostname(),
        pid: process.pid,
      },

      redact: {
        paths: this.config.redact,
        remove: true,
      },

      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

      ...(this.config.format === 'pretty' && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
            messageFormat: '{service} [{correlationId}] {msg}',
          },
        },
      }),
    };

    if (this.config.file?.enabled && this.config.file.path) {
      pinoConfig.transport = {
        targets: [
          this.config.format === 'pretty'
            ? {
                target: 'pino-pretty',
                level: this.config.level,
                options: {
                  colorize: true,
                  translateTime: 'yyyy-mm-dd HH:MM:ss',
                  ignore: 'pid,hostname',
                },
              }
            : {
                target: 'pino/file',
                level: this.config.level,
                options: { destination: 1 }, // stdout
              },
          {
            target: 'pino/file',
            level: this.config.level,
            options: {
              destination: this.config.file.path,
              mkdir: true,
            },
          },
        ],
      };
    }

    return pino(pinoConfig);
  }

  private enrichLogData(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata,
    error?: Error
  ): StructuredLogData | null {
    // Sampling only ever drops debug lines
    if (level === 'debug' && this.config.sampling?.enabled) {
      if (Math.random() >= this.config.sampling.rate) {
        return null;
      }
    }

    const correlation = CorrelationManager.getLogContext();
    const duration = CorrelationManager.getDuration();

    // pino writes its own numeric level
    const logData: StructuredLogData = {
      msg: message,
      ...correlation,
      ...(duration > 0 && { duration }),
    };

    if (error) {
      logData.error = serializeError(error);
    }

    if (metadata) {
      const { performance, context, ...rest } = metadata;
      if (performance) {
        logData.performance = performance;
      }
      if (context) {
        logData.context = { ...logData.context, ...context };
      }
      if (Object.keys(rest).length > 0) {
        logData.metadata = rest;
      }
    }

    return logData;
  }

  private splitErrorArgs(
    error: unknown,
    metadata?: LogMetadata
  ): { errorObj?: Error; metadataObj?: LogMetadata } {
    if (error instanceof Error) {
      return { errorObj: error, metadataObj: metadata };
    }
    if (error && typeof error === 'object') {
      return { metadataObj: { ...error, ...metadata } };
    }
    if (error !== undefined) {
      return { metadataObj: { detail: error, ...metadata } };
    }
    return { metadataObj: metadata };
  }

  debug(message: string, metadata?: LogMetadata): void {
    const logData = this.enrichLogData('debug', message, metadata);
    if (logData) {
      this.pino.debug(logData);
    }
  }

  info(message: string, metadata?: LogMetadata): void {
    const logData = this.enrichLogData('info', message, metadata);
    if (logData) {
      this.pino.info(logData);
    }
  }

  warn(message: string, metadata?: LogMetadata): void {
    const logData = this.enrichLogData('warn', message, metadata);
    if (logData) {
      this.pino.warn(logData);
    }
  }

  error(message: string, error?: unknown, metadata?: LogMetadata): void {
    const { errorObj, metadataObj } = this.splitErrorArgs(error, metadata);
    const logData = this.enrichLogData('error', message, metadataObj, errorObj);
    if (logData) {
      this.pino.error(logData);
    }
  }

  fatal(message: string, error?: unknown, metadata?: LogMetadata): void {
    const { errorObj, metadataObj } = this.splitErrorArgs(error, metadata);
    const logData = this.enrichLogData('fatal', message, metadataObj, errorObj);
    if (logData) {
      this.pino.fatal(logData);
    }
  }

  log(level: LogLevel, message: string, metadata?: LogMetadata, error?: Error): void {
    switch (level) {
      case 'debug':
        this.debug(message, metadata);
        break;
      case 'info':
        this.info(message, metadata);
        break;
      case 'warn':
        this.warn(message, metadata);
        break;
      case 'error':
        this.error(message, error, metadata);
        break;
      case 'fatal':
        this.fatal(message, error, metadata);
        break;
    }
  }

  /**
   * Time a function execution and log the duration
   */
  async time<T>(
    operation: string,
    fn: () => Promise<T>,
    level: LogLevel = 'debug'
  ): Promise<T> {
    const start = Date.now();
    const operationId = `${this.serviceName}.${operation}`;

    this.debug(`Starting operation: ${operation}`);

    try {
      const result = await fn();
      const duration = Date.now() - start;

      this.log(level, `Operation completed: ${operation}`, {
        performance: { duration, operation: operationId },
      });

      return result;
    } catch (error) {
      const duration = Date.now() - start;

      this.error(`Operation failed: ${operation}`, error, {
        performance: { duration, operation: operationId },
      });

      throw error;
    }
  }

  /**
   * Flush any buffered logs (useful before process exit)
   */
  async flush(): Promise<void> {
    return new Promise((resolve) => {
      this.pino.flush(() => resolve());
    });
  }

  getRawLogger(): Logger {
    return this.pino;
  }
}

// Logger instances keyed by service name and config
const loggerInstances = new Map<string, StructuredLogger>();

/**
 * Create or get a logger instance for a service
 */
export function createLogger(serviceName: string, config?: Partial<LogConfigInput>): StructuredLogger {
  const key = `${serviceName}:${JSON.stringify(config || {})}`;

  const existing = loggerInstances.get(key);
  if (existing) {
    return existing;
  }

  const created = new StructuredLogger(serviceName, config);
  loggerInstances.set(key, created);
  return created;
}
