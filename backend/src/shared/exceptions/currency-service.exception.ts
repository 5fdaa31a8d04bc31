// backend/src/shared/exceptions/currency-service.exception.ts
import { BaseException } from './base.exception';
import { HTTP_STATUS } from '../constants/status-codes';

/**
 * Common parent for every failure the currency services raise themselves.
 * Transport errors from the HTTP client are never converted into one of these.
 */
export class CurrencyServiceException extends BaseException {
    constructor(
        message: string,
        code: string = 'CURRENCY_SERVICE_ERROR',
        statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
        details?: unknown
    ) {
        super(message, code, statusCode, details);
    }
}

export class MissingApiKeyException extends CurrencyServiceException {
    constructor() {
        super('Currency API key is not configured', 'CURRENCY_API_KEY_MISSING', HTTP_STATUS.INTERNAL_ERROR);
    }
}

export class MalformedRateResponseException extends CurrencyServiceException {
    constructor(baseCurrency: string, details?: unknown) {
        super(
            `Malformed response from currency API for base ${baseCurrency}`,
            'CURRENCY_RESPONSE_MALFORMED',
            HTTP_STATUS.BAD_GATEWAY,
            details
        );
    }
}

export class RateNotFoundException extends CurrencyServiceException {
    public readonly currency: string;
    public readonly baseCurrency: string;

    constructor(currency: string, baseCurrency: string) {
        super(`no rate for ${currency}`, 'CURRENCY_RATE_NOT_FOUND', HTTP_STATUS.UNPROCESSABLE_ENTITY, {
            currency,
            baseCurrency
        });
        this.currency = currency;
        this.baseCurrency = baseCurrency;
    }
}
