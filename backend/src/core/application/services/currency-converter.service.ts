import { logger } from '../../../infrastructure/monitoring/logger.service';
import { RateNotFoundException } from '../../../shared/exceptions/currency-service.exception';
import { CurrencyCode } from '../../../shared/types/common.types';
import { normalizeCurrencyCode } from '../../../shared/utils/currency.util';
import { RateSource } from './rate-provider.service';

export class CurrencyConverter {
    constructor(private readonly rateSource: RateSource) {}

    /**
     * Converts `amount` of `fromCurrency` into `toCurrency`.
     *
     * Rates are fetched with the target currency as base, so the table says how
     * many units of the source currency one unit of the target is worth. The
     * result is not rounded.
     */
    async convert(amount: number, fromCurrency: CurrencyCode, toCurrency: CurrencyCode): Promise<number> {
        const from = normalizeCurrencyCode(fromCurrency);
        const to = normalizeCurrencyCode(toCurrency);

        const rates = await this.rateSource.getRates(to);
        const rate = Object.hasOwn(rates, from) ? rates[from] : undefined;

        if (rate === undefined || rate === 0) {
            logger.warn('No exchange rate available', { fromCurrency: from, toCurrency: to });
            throw new RateNotFoundException(from, to);
        }

        return amount / rate;
    }
}
