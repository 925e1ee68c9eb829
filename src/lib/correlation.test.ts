import { describe, it, expect } from 'vitest';
import {
  generateCorrelationId,
  getCorrelationContext,
  getCorrelationId,
  setProcessingStage,
  runWithCorrelation,
  summarizeCorrelation,
} from './correlation.js';

describe('Correlation Context', () => {
  describe('generateCorrelationId', () => {
    it('should generate a correlation ID with corr- prefix', () => {
      expect(generateCorrelationId()).toMatch(/^corr-[0-9a-f-]{36}$/);
    });

    it('should generate unique IDs on each call', () => {
      expect(generateCorrelationId()).not.toBe(generateCorrelationId());
    });
  });

  describe('outside a context', () => {
    it('should return "none" for the correlation ID', () => {
      expect(getCorrelationId()).toBe('none');
    });

    it('should return undefined for the context', () => {
      expect(getCorrelationContext()).toBeUndefined();
    });

    it('should ignore stage updates', () => {
      expect(() => setProcessingStage('completed')).not.toThrow();
    });
  });

  describe('runWithCorrelation', () => {
    it('should start a request in the received stage', () => {
      runWithCorrelation('corr-probe', () => {
        const ctx = getCorrelationContext();
        expect(ctx?.correlationId).toBe('corr-probe');
        expect(ctx?.stage).toBe('received');
        expect(ctx?.startedAt).toBeGreaterThan(0);
      });
    });

    it('should return the function result', () => {
      expect(runWithCorrelation('corr-test', () => 42)).toBe(42);
    });

    it('should restore the outer context after the callback', () => {
      runWithCorrelation('corr-inner', () => {
        expect(getCorrelationId()).toBe('corr-inner');
      });
      expect(getCorrelationId()).toBe('none');
    });

    it('should keep the ID across awaits', async () => {
      const corrId = generateCorrelationId();
      const seen = await runWithCorrelation(corrId, async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return getCorrelationId();
      });
      expect(seen).toBe(corrId);
    });

    it('should isolate concurrent contexts', async () => {
      const results: string[] = [];
      const first = runWithCorrelation('corr-1', async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        results.push(getCorrelationId());
      });
      const second = runWithCorrelation('corr-2', async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        results.push(getCorrelationId());
      });
      await Promise.all([first, second]);
      expect(results).toEqual(['corr-2', 'corr-1']);
    });
  });

  describe('setProcessingStage', () => {
    it('should advance the stage of the active context', () => {
      runWithCorrelation('corr-stage', () => {
        setProcessingStage('registration-probe');
        expect(getCorrelationContext()?.stage).toBe('registration-probe');
        setProcessingStage('scoring');
        expect(getCorrelationContext()?.stage).toBe('scoring');
      });
    });

    it('should record each stage once', () => {
      runWithCorrelation('corr-stages', () => {
        setProcessingStage('validation');
        setProcessingStage('validation');
        setProcessingStage('completed');
        expect(getCorrelationContext()?.transitions.map((t) => t.stage)).toEqual([
          'received',
          'validation',
          'completed',
        ]);
      });
    });
  });

  describe('summarizeCorrelation', () => {
    it('should report the stages and elapsed time', () => {
      const summary = summarizeCorrelation(
        {
          correlationId: 'corr-summary',
          startedAt: 1000,
          stage: 'completed',
          transitions: [
            { stage: 'received', atMs: 0 },
            { stage: 'scoring', atMs: 4 },
            { stage: 'completed', atMs: 9 },
          ],
        },
        1250
      );

      expect(summary).toEqual({
        correlationId: 'corr-summary',
        stage: 'completed',
        elapsedMs: 250,
        stages: ['received', 'scoring', 'completed'],
      });
    });
  });
});
