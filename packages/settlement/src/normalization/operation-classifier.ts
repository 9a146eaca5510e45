import type { TradeOperation } from '@fxledger/core';

import type { OperationLexicon } from '../config/settlement-config.js';

function containsAny(label: string, tokens: readonly string[]): boolean {
  return tokens.some((token) => label.includes(token));
}

/**
 * Classify a broker operation label by case-insensitive substring containment.
 *
 * Composite labels ("swap opening. purchase.") match as long as one token is present.
 * Buy tokens are checked first.
 */
export function classifyOperation(rawLabel: string | null | undefined, lexicon: OperationLexicon): TradeOperation {
  const label = (rawLabel ?? '').trim().toLowerCase();
  if (label === '') return 'unresolved';

  if (containsAny(label, lexicon.buy)) return 'buy';
  if (containsAny(label, lexicon.sell)) return 'sell';

  return 'unresolved';
}

/**
 * True when the label carries one of the given tokens, case-insensitively
 */
export function labelHasToken(rawLabel: string, tokens: readonly string[]): boolean {
  return containsAny(rawLabel.trim().toLowerCase(), tokens);
}
