import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const LogConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('json'),
  service: z.string().optional(),
  version: z.string().optional(),
  environment: z.string().optional(),

  // File logging options
  file: z.object({
    enabled: z.boolean().default(false),
    path: z.string().optional(),
  }).optional(),

  redact: z.array(z.string()).default([
    'password', 'token', 'secret', 'key', 'auth', 'authorization'
  ]),

  // Sampling for high-volume debug logs
  sampling: z.object({
    enabled: z.boolean().default(false),
    rate: z.number().min(0).max(1).default(0.1), // 10% sampling
  }).optional(),
});

export type LogConfig = z.infer<typeof LogConfigSchema>;
export type LogConfigInput = z.input<typeof LogConfigSchema>;

export interface LogContext {
  correlationId?: string;
  operation?: string;
  component?: string;
  [key: string]: unknown;
}

export interface PerformanceData {
  duration?: number;
  operation?: string;
}

/**
 * Free-form fields attached to a log line. `performance` and `context`
 * are lifted to the top level, everything else lands under `metadata`.
 */
export interface LogMetadata {
  performance?: PerformanceData;
  context?: LogContext;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  code?: string;
}

export interface StructuredLogData {
  msg: string;
  duration?: number;
  context?: LogContext;
  error?: SerializedError;
  performance?: PerformanceData;
  metadata?: Record<string, unknown>;
  [key: string]: unknown;
}
