import { describe, it, expect } from 'vitest';
import { CorrelationManager } from './correlation.js';

describe('CorrelationManager', () => {
  it('should expose no context outside a run', () => {
    expect(CorrelationManager.getContext()).toBeUndefined();
    expect(CorrelationManager.getLogContext()).toEqual({});
    expect(CorrelationManager.getDuration()).toBe(0);
  });

  it('should inherit the correlation id in nested scopes', async () => {
    await CorrelationManager.run({ correlationId: 'outer' }, async () => {
      await CorrelationManager.run({ operation: 'dataset.load' }, async () => {
        expect(CorrelationManager.getId()).toBe('outer');
        expect(CorrelationManager.getContext()?.operation).toBe('dataset.load');
      });
    });
  });

  it('should point nested scopes at the outer id and merge metadata', async () => {
    await CorrelationManager.run({ correlationId: 'parent-id', metadata: { source: 'fake' } }, async () => {
      await CorrelationManager.run({ correlationId: 'child-id', metadata: { rows: 12 } }, async () => {
        expect(CorrelationManager.getLogContext()).toEqual({
          correlationId: 'child-id',
          parentId: 'parent-id',
          source: 'fake',
          rows: 12,
        });
      });
    });
  });
});
