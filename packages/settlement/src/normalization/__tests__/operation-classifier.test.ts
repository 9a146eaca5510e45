import { describe, expect, it } from 'vitest';

import { createTestConfig } from '../../__tests__/test-utils.js';
import { classifyOperation, labelHasToken } from '../operation-classifier.js';

const { lexicon } = createTestConfig();

describe('classifyOperation', () => {
  it.each([
    ['Покупка', 'buy'],
    ['Продажа', 'sell'],
    ['BUY', 'buy'],
    ['Sell to close', 'sell'],
    ['Swap opening. Purchase.', 'buy'],
    ['  куплено  ', 'buy'],
  ] as const)('classifies %s as %s', (label, expected) => {
    expect(classifyOperation(label, lexicon)).toBe(expected);
  });

  it('leaves unknown and empty labels unresolved', () => {
    expect(classifyOperation('Dividend', lexicon)).toBe('unresolved');
    expect(classifyOperation('   ', lexicon)).toBe('unresolved');
    expect(classifyOperation(undefined, lexicon)).toBe('unresolved');
  });

  it('checks buy tokens before sell tokens', () => {
    expect(classifyOperation('buy / sell', lexicon)).toBe('buy');
  });

  it('honours a custom lexicon', () => {
    const custom = createTestConfig({ lexicon: { buy: ['ACHAT'], sell: ['vente'] } }).lexicon;
    expect(classifyOperation('Achat titres', custom)).toBe('buy');
    expect(classifyOperation('Vente', custom)).toBe('sell');
    expect(classifyOperation('Покупка', custom)).toBe('unresolved');
  });
});

describe('labelHasToken', () => {
  it('matches case-insensitively', () => {
    expect(labelHasToken('Открытие позиции', ['открытие'])).toBe(true);
    expect(labelHasToken('Closing', ['opening'])).toBe(false);
  });
});
