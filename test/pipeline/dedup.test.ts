import { describe, it, expect } from 'vitest';
import { ledgerKey } from '../../src/pipeline/dedup.js';

describe('ledgerKey', () => {
  it('should produce consistent keys for same input', () => {
    const input = { date: '2025-12-11', gameId: 'BOS@MIL', pickType: 'spread_big_edge' };
    expect(ledgerKey(input)).toBe(ledgerKey(input));
  });

  it('should produce different keys for different pick types on one game', () => {
    const key1 = ledgerKey({ date: '2025-12-11', gameId: 'BOS@MIL', pickType: 'spread_big_edge' });
    const key2 = ledgerKey({ date: '2025-12-11', gameId: 'BOS@MIL', pickType: 'total_over_value' });
    expect(key1).not.toBe(key2);
  });

  it('should produce different keys for different dates', () => {
    const key1 = ledgerKey({ date: '2025-12-11', gameId: 'BOS@MIL', pickType: 'spread_big_edge' });
    const key2 = ledgerKey({ date: '2025-12-12', gameId: 'BOS@MIL', pickType: 'spread_big_edge' });
    expect(key1).not.toBe(key2);
  });

  it('should normalize game ID case and whitespace', () => {
    const key1 = ledgerKey({ date: '2025-12-11', gameId: 'BOS@MIL', pickType: 'spread_big_edge' });
    const key2 = ledgerKey({ date: '2025-12-11', gameId: ' bos@mil ', pickType: 'spread_big_edge' });
    expect(key1).toBe(key2);
  });

  it('should join the parts with pipes', () => {
    expect(ledgerKey({ date: '2025-12-11', gameId: 'BOS@MIL', pickType: 'spread_big_edge' })).toBe(
      '2025-12-11|BOS@MIL|spread_big_edge',
    );
  });
});
