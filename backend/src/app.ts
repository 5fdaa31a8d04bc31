import { ConfigService } from './config/environment';
import { createHttpClient, HttpClient } from './config/http';
import { CsvImportOptions, TransactionCsvReader } from './core/application/services/csv-import.service';
import { CurrencyConverter } from './core/application/services/currency-converter.service';
import { RateProvider } from './core/application/services/rate-provider.service';
import { RoundUpCalculator } from './core/application/services/round-up-calculator.service';
import { TransactionSearchService } from './core/application/services/transaction-search.service';
import { RateCache } from './infrastructure/cache/rate-cache';
import { logger } from './infrastructure/monitoring/logger.service';

export interface FinanceServicesOverrides {
    config?: ConfigService;
    apiKey?: string;
    httpClient?: HttpClient;
    cache?: RateCache;
    csv?: CsvImportOptions;
}

export interface FinanceServices {
    rates: RateProvider;
    converter: CurrencyConverter;
    search: TransactionSearchService;
    roundUp: RoundUpCalculator;
    csvReader: TransactionCsvReader;
}

export function createFinanceServices(overrides: FinanceServicesOverrides = {}): FinanceServices {
    const config = overrides.config ?? ConfigService.getInstance();

    const httpClient = overrides.httpClient ?? createHttpClient({
        baseURL: config.get('CURRENCY_API_URL'),
        timeoutMs: config.get('CURRENCY_API_TIMEOUT_MS')
    });

    const rates = new RateProvider({
        apiKey: overrides.apiKey ?? config.getCurrencyApiKey(),
        httpClient,
        cache: overrides.cache
    });

    logger.debug('Finance services created', {
        currencyApiUrl: config.get('CURRENCY_API_URL'),
        environment: config.get('NODE_ENV')
    });

    return {
        rates,
        converter: new CurrencyConverter(rates),
        search: new TransactionSearchService(),
        roundUp: new RoundUpCalculator(),
        csvReader: new TransactionCsvReader({
            separator: overrides.csv?.separator ?? config.get('CSV_SEPARATOR')
        })
    };
}
