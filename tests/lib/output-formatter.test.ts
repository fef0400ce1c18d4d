import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { outputData, isValidFormat } from '../../src/lib/output-formatter.js';

describe('Output Formatter', () => {
  let consoleSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  describe('isValidFormat', () => {
    it('should accept valid formats', () => {
      expect(isValidFormat('json')).toBe(true);
      expect(isValidFormat('table')).toBe(true);
    });

    it('should reject invalid formats', () => {
      expect(isValidFormat('csv')).toBe(false);
      expect(isValidFormat('xml')).toBe(false);
      expect(isValidFormat('')).toBe(false);
    });
  });

  describe('outputData', () => {
    it('should print JSON by default', () => {
      outputData({ ok: true });
      expect(consoleSpy).toHaveBeenCalledWith('{\n  "ok": true\n}');
    });

    it('should use the table renderer for table format', () => {
      const renderer = vi.fn();
      outputData({ ok: true }, 'table', renderer);
      expect(renderer).toHaveBeenCalledOnce();
      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it('should ignore the table renderer for json format', () => {
      const renderer = vi.fn();
      outputData({ ok: true }, 'json', renderer);
      expect(renderer).not.toHaveBeenCalled();
      expect(consoleSpy).toHaveBeenCalledOnce();
    });

    it('should fall back to JSON when table has no renderer', () => {
      outputData([1, 2], 'table');
      expect(consoleSpy).toHaveBeenCalledWith('[\n  1,\n  2\n]');
    });
  });
});
