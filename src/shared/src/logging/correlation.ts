import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface CorrelationContext {
  correlationId: string;
  parentId?: string;
  operation?: string;
  startTime: number;
  metadata?: Record<string, unknown>;
}

const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

/**
 * Correlation manager for tracking operation context across async boundaries
 */
export class CorrelationManager {
  static getContext(): CorrelationContext | undefined {
    return correlationStorage.getStore();
  }

  static getId(): string | undefined {
    return correlationStorage.getStore()?.correlationId;
  }

  /**
   * Build a context for a new scope, inheriting from the current one
   */
  static setContext(context: Partial<CorrelationContext>): CorrelationContext {
    const existing = correlationStorage.getStore();
    return {
      correlationId: context.correlationId || existing?.correlationId || randomUUID(),
      parentId: context.parentId || existing?.correlationId,
      operation: context.operation || existing?.operation,
      startTime: context.startTime || existing?.startTime || Date.now(),
      metadata: { ...existing?.metadata, ...context.metadata },
    };
  }

  static async run<T>(
    context: Partial<CorrelationContext>,
    fn: () => Promise<T>
  ): Promise<T> {
    const newContext = this.setContext(context);
    return correlationStorage.run(newContext, fn);
  }

  /**
   * Get formatted context for logging
   */
  static getLogContext(): Record<string, unknown> {
    const context = correlationStorage.getStore();
    if (!context) {
      return {};
    }

    return {
      correlationId: context.correlationId,
      ...(context.parentId ? { parentId: context.parentId } : {}),
      ...(context.operation ? { operation: context.operation } : {}),
      ...(context.metadata || {}),
    };
  }

  /**
   * Milliseconds since the current context started
   */
  static getDuration(): number {
    const context = correlationStorage.getStore();
    if (!context) {
      return 0;
    }

    return Date.now() - context.startTime;
  }
}
