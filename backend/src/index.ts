export { createFinanceServices } from './app';
export type { FinanceServices, FinanceServicesOverrides } from './app';
export { ConfigService, parseEnvironment } from './config/environment';
export type { Environment } from './config/environment';
export { createHttpClient } from './config/http';
export type { HttpClient, HttpClientOptions } from './config/http';
export { TransactionCsvReader } from './core/application/services/csv-import.service';
export type { CsvImportOptions } from './core/application/services/csv-import.service';
export { CurrencyConverter } from './core/application/services/currency-converter.service';
export { RateProvider } from './core/application/services/rate-provider.service';
export type { RateProviderOptions, RateSource } from './core/application/services/rate-provider.service';
export { RoundUpCalculator } from './core/application/services/round-up-calculator.service';
export {
    PERSON_NAME_PATTERN,
    PHONE_PATTERN,
    TransactionSearchService
} from './core/application/services/transaction-search.service';
export { TRANSACTION_FIELDS, TRANSFERS_CATEGORY } from './core/domain/entities/transaction.entity';
export type { TransactionRecord } from './core/domain/entities/transaction.entity';
export { RateCache } from './infrastructure/cache/rate-cache';
export type { CacheStats } from './infrastructure/cache/rate-cache';
export { logger, LoggerService } from './infrastructure/monitoring/logger.service';
export { BaseException } from './shared/exceptions/base.exception';
export {
    CurrencyServiceException,
    MalformedRateResponseException,
    MissingApiKeyException,
    RateNotFoundException
} from './shared/exceptions/currency-service.exception';
export { ValidationException } from './shared/exceptions/validation.exception';
export type { ValidationError } from './shared/exceptions/validation.exception';
export { ROUND_UP_LIMITS } from './shared/types/common.types';
export type { CurrencyCode, RateTable, RoundUpLimit } from './shared/types/common.types';
