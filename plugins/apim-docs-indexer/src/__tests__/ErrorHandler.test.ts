import { ConfigError, ErrorHandler, ExtractionError, StageError, type Result } from '../services/ErrorHandler';

describe('ErrorHandler', () => {
  describe('describe', () => {
    it('reduces thrown values to a message', () => {
      expect(ErrorHandler.describe(new Error('boom'))).toBe('boom');
      expect(ErrorHandler.describe('plain')).toBe('plain');
      expect(ErrorHandler.describe({ code: 42 })).toBe('{"code":42}');
    });
  });

  describe('attempt', () => {
    it('wraps a value', async () => {
      await expect(ErrorHandler.attempt('a', async () => 1)).resolves.toEqual({ ok: true, value: 1 });
    });

    it('turns a rejection into a failure for the item', async () => {
      const result = await ErrorHandler.attempt('orders.json', async () => {
        throw new Error('bad file');
      });
      expect(result).toEqual({ ok: false, error: { item: 'orders.json', reason: 'bad file' } });
    });

    it('marks extraction errors as fatal', async () => {
      const result = await ErrorHandler.attempt('orders.json', async () => {
        throw new ExtractionError('orders.json');
      });
      expect(result).toEqual({
        ok: false,
        error: {
          item: 'orders.json',
          reason: 'Failed to extract API information using LLM from orders.json',
          fatal: true,
        },
      });
    });
  });

  describe('collect and merge', () => {
    it('splits results into succeeded and failed', () => {
      const results: Result<number>[] = [
        { ok: true, value: 1 },
        { ok: false, error: { item: 'b', reason: 'x' } },
        { ok: true, value: 3 },
      ];
      expect(ErrorHandler.collect(results)).toEqual({ succeeded: [1, 3], failed: [{ item: 'b', reason: 'x' }] });
    });

    it('concatenates batches in order', () => {
      const merged = ErrorHandler.merge(
        { succeeded: ['a'], failed: [] },
        { succeeded: ['b'], failed: [{ item: 'c', reason: 'y' }] },
      );
      expect(merged).toEqual({ succeeded: ['a', 'b'], failed: [{ item: 'c', reason: 'y' }] });
    });
  });
});

describe('error types', () => {
  it('keeps the stage on StageError', () => {
    const cause = new Error('ECONNREFUSED');
    const error = new StageError('index', 'cannot reach search', { cause });
    expect(error.stage).toBe('index');
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('StageError');
  });

  it('lists validation issues in the ConfigError message', () => {
    expect(new ConfigError('Invalid configuration', ['a: x', 'b: y']).message).toBe('Invalid configuration: a: x; b: y');
    expect(new ConfigError('Missing').message).toBe('Missing');
  });
});
