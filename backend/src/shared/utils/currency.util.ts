// backend/src/shared/utils/currency.util.ts
import { CurrencyCode } from '../types/common.types';

export function normalizeCurrencyCode(code: string): CurrencyCode {
    return code.trim().toUpperCase();
}

export function roundToCents(amount: number): number {
    return Math.round((amount + Number.EPSILON) * 100) / 100;
}
