import { z } from 'zod';
import { HttpClient } from '../../../config/http';
import { RateCache } from '../../../infrastructure/cache/rate-cache';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import {
    MalformedRateResponseException,
    MissingApiKeyException
} from '../../../shared/exceptions/currency-service.exception';
import { ValidationException } from '../../../shared/exceptions/validation.exception';
import { CurrencyCode, RateTable } from '../../../shared/types/common.types';
import { normalizeCurrencyCode } from '../../../shared/utils/currency.util';
import { ValidationUtil } from '../../../shared/utils/validation.util';

const rateResponseSchema = z.object({
    data: z.record(
        z.object({
            value: z.union([z.number(), z.string().trim().min(1)])
        })
    )
});

export interface RateSource {
    getRates(baseCurrency: CurrencyCode): Promise<RateTable>;
}

export interface RateProviderOptions {
    apiKey?: string;
    httpClient: HttpClient;
    cache?: RateCache;
}

/**
 * Loads "units per one base unit" tables from the currency API.
 *
 * Tables are memoized per base currency until {@link RateProvider.clearCache}
 * or {@link RateProvider.invalidate}. Transport and HTTP status errors from the
 * client reach the caller as they were thrown.
 */
export class RateProvider implements RateSource {
    private readonly apiKey?: string;
    private readonly httpClient: HttpClient;
    private readonly cache: RateCache;
    private readonly log = logger.child({ component: 'RateProvider' });

    constructor(options: RateProviderOptions) {
        this.apiKey = options.apiKey?.trim() || undefined;
        this.httpClient = options.httpClient;
        this.cache = options.cache ?? new RateCache();
    }

    async getRates(baseCurrency: CurrencyCode): Promise<RateTable> {
        if (!this.apiKey) {
            throw new MissingApiKeyException();
        }

        const base = normalizeCurrencyCode(baseCurrency);
        if (!base) {
            throw new ValidationException('base currency is required', [
                { field: 'baseCurrency', message: 'must not be empty', value: baseCurrency }
            ]);
        }

        const apiKey = this.apiKey;
        const table = await this.cache.getOrCompute(base, () => this.fetchRates(base, apiKey));
        return { ...table };
    }

    invalidate(baseCurrency: CurrencyCode): boolean {
        return this.cache.delete(normalizeCurrencyCode(baseCurrency));
    }

    clearCache(): void {
        this.cache.clear();
    }

    private async fetchRates(base: CurrencyCode, apiKey: string): Promise<RateTable> {
        this.log.http('Fetching exchange rates', { baseCurrency: base });

        let body: unknown;
        try {
            const response = await this.httpClient.get<unknown>('/latest', {
                params: { apikey: apiKey, base_currency: base }
            });
            body = response.data;
        } catch (error) {
            this.log.error('Exchange rate request failed', error, { baseCurrency: base });
            throw error;
        }

        const rates = this.parseRates(base, body);
        this.log.info('Exchange rates loaded', { baseCurrency: base, currencies: Object.keys(rates).length });
        return rates;
    }

    private parseRates(base: CurrencyCode, body: unknown): RateTable {
        const parsed = rateResponseSchema.safeParse(body);
        if (!parsed.success) {
            const issues = ValidationUtil.toValidationErrors(parsed.error);
            const error = new MalformedRateResponseException(base, issues);
            this.log.error('Unexpected currency API payload', error, { baseCurrency: base });
            throw error;
        }

        const rates: RateTable = {};
        for (const [code, entry] of Object.entries(parsed.data.data)) {
            const value = typeof entry.value === 'number' ? entry.value : Number(entry.value);
            if (!Number.isFinite(value) || value < 0) {
                const error = new MalformedRateResponseException(base, [
                    { field: `data.${code}.value`, message: 'must be a non-negative number', value: entry.value }
                ]);
                this.log.error('Unexpected currency API payload', error, { baseCurrency: base });
                throw error;
            }
            rates[code] = value;
        }

        return rates;
    }
}
