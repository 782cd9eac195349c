export * from './currencies';

export const LEDGER_CONFIG = {
  DEFAULT_REFERENCE_CURRENCY: 'USD' as const,
  RATE_SCALE: 12, // Decimal places kept when parsing rate strings
  PERCENT_TOTAL_BASIS_POINTS: 10_000, // 100% in hundredths of a percent
  UNKNOWN_GUEST_NAME: 'Unknown',
} as const;
