// backend/src/shared/types/common.types.ts

/** ISO 4217 code such as "USD" or "RUB". */
export type CurrencyCode = string;

/**
 * Units of each currency per one unit of the base currency the table was fetched for.
 */
export type RateTable = Record<CurrencyCode, number>;

export const ROUND_UP_LIMITS = [10, 50, 100] as const;

export type RoundUpLimit = typeof ROUND_UP_LIMITS[number];
