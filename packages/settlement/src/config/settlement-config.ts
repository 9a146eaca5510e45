import { ValidationError } from '@fxledger/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const CurrencyCodeSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z]{3}$/, { message: 'Must be a three-letter currency code' });

const LexiconSchema = z
  .array(z.string().trim().min(1))
  .min(1)
  .transform((tokens) => tokens.map((token) => token.toLowerCase()));

export const OperationLexiconSchema = z.object({
  buy: LexiconSchema,
  sell: LexiconSchema,
});

export const SettlementConfigSchema = z
  .object({
    /** Currency the broker trades in; rows in other currencies are excluded */
    tradingCurrency: CurrencyCodeSchema.default('USD'),
    /** Currency results are reported in */
    domesticCurrency: CurrencyCodeSchema.default('RUB'),
    lexicon: OperationLexiconSchema.default({
      buy: ['покуп', 'купл', 'buy', 'purchase'],
      sell: ['продаж', 'sell'],
    }),
    /** Extra label tokens that qualify a prior-period row as a purchase lot (position openings) */
    priorPeriodLotTokens: LexiconSchema.default(['открытие', 'opening']),
    borrowedTradeLabel: z.string().trim().min(1).default('Buy (prior period)'),
    totalRowLabel: z.string().trim().min(1).default('Total'),
    /** Clock used for date columns missing from the whole table */
    now: z.function().returns(z.date()).default(() => () => new Date()),
  })
  .refine((config) => config.tradingCurrency !== config.domesticCurrency, {
    message: 'Trading and domestic currency must differ',
    path: ['domesticCurrency'],
  });

export type SettlementConfig = z.infer<typeof SettlementConfigSchema>;
export type SettlementConfigInput = z.input<typeof SettlementConfigSchema>;
export type OperationLexicon = z.infer<typeof OperationLexiconSchema>;

/**
 * Build a validated configuration from partial overrides
 */
export function createSettlementConfig(
  overrides: SettlementConfigInput = {}
): Result<SettlementConfig, ValidationError> {
  const parsed = SettlementConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return err(
      new ValidationError(`Invalid settlement configuration: ${details}`, {
        additionalContext: { issues: parsed.error.issues },
      })
    );
  }
  return ok(parsed.data);
}
