import { describe, it, expect } from 'vitest';
import { syncRequestSchema, envConfigSchema, parseOrThrow } from '../src/utils/validation';
import { InvalidConfigurationError } from '../src/utils/errors';

describe('Validation Schemas', () => {
  describe('syncRequestSchema', () => {
    it('should apply defaults', () => {
      const result = syncRequestSchema.safeParse({ type: 'daily' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.symbol).toBe('BTCUSDT');
        expect(result.data.incremental).toBe(false);
        expect(result.data.intervals).toBeUndefined();
        expect(result.data.startDate).toBeUndefined();
      }
    });

    it('should normalise the symbol to upper case', () => {
      const result = syncRequestSchema.safeParse({ type: 'monthly', symbol: ' ethusdt ' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.symbol).toBe('ETHUSDT');
      }
    });

    it('should parse dates as UTC days', () => {
      const result = syncRequestSchema.safeParse({ type: 'daily', startDate: '2024-02-28', endDate: '2024-03-01' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.startDate?.toISOString()).toBe('2024-02-28T00:00:00.000Z');
        expect(result.data.endDate?.toISOString()).toBe('2024-03-01T00:00:00.000Z');
      }
    });

    it('should reject a missing type', () => {
      expect(syncRequestSchema.safeParse({ symbol: 'BTCUSDT' }).success).toBe(false);
    });

    it('should reject an unknown type', () => {
      expect(syncRequestSchema.safeParse({ type: 'weekly' }).success).toBe(false);
    });

    it('should reject symbols with separators', () => {
      expect(syncRequestSchema.safeParse({ type: 'daily', symbol: 'BTC-USDT' }).success).toBe(false);
    });

    it('should reject impossible dates', () => {
      expect(syncRequestSchema.safeParse({ type: 'daily', startDate: '2023-02-30' }).success).toBe(false);
      expect(syncRequestSchema.safeParse({ type: 'daily', startDate: '2023/02/01' }).success).toBe(false);
    });

    it('should reject a reversed date range', () => {
      const result = syncRequestSchema.safeParse({ type: 'daily', startDate: '2024-03-02', endDate: '2024-03-01' });

      expect(result.success).toBe(false);
    });

    it('should reject unknown options', () => {
      expect(syncRequestSchema.safeParse({ type: 'daily', incr: true }).success).toBe(false);
    });
  });

  describe('envConfigSchema', () => {
    const base = {
      archiveBaseUrl: 'https://archive.test',
      dataRoot: 'data',
      logDir: 'logs',
      logLevel: 'info',
      nodeEnv: 'test',
      concurrency: '5',
      maxAttempts: '3',
      retryDelayMs: '0',
      httpTimeoutMs: '30000',
      localIoErrorLimit: '5',
      dailyCron: '30 1 * * *',
      monthlyCron: '30 2 1 * *',
    };

    it('should coerce numeric strings', () => {
      const result = envConfigSchema.safeParse(base);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.concurrency).toBe(5);
        expect(result.data.retryDelayMs).toBe(0);
      }
    });

    it('should reject a zero concurrency', () => {
      expect(envConfigSchema.safeParse({ ...base, concurrency: '0' }).success).toBe(false);
    });
  });

  describe('parseOrThrow', () => {
    it('should return parsed data', () => {
      const request = parseOrThrow(syncRequestSchema, { type: 'daily', incremental: true }, 'sync request');

      expect(request.type).toBe('daily');
      expect(request.incremental).toBe(true);
    });

    it('should throw InvalidConfigurationError naming the field', () => {
      let caught: unknown;
      try {
        parseOrThrow(syncRequestSchema, { type: 'daily', symbol: 'btc/usdt' }, 'sync request');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidConfigurationError);
      if (caught instanceof InvalidConfigurationError) {
        expect(caught.field).toBe('symbol');
        expect(caught.message).toBe('symbol: Symbol must contain only letters and digits');
      }
    });
  });
});
