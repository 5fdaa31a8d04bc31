import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ValidationUtil } from '../shared/utils/validation.util';

const environmentSchema = z.object({
    // Application
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

    // Logging
    LOG_LEVEL: z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),

    // Currency API
    CURRENCY_API_KEY: z.string().optional(),
    CURRENCY_API_URL: z.string().url().default('https://api.currencyapi.com/v3'),
    CURRENCY_API_TIMEOUT_MS: z.string()
        .regex(/^\d+$/, 'CURRENCY_API_TIMEOUT_MS must be a whole number of milliseconds')
        .transform(val => parseInt(val, 10))
        .default('10000'),

    // Bank statement import
    CSV_SEPARATOR: z.string().length(1, 'CSV_SEPARATOR must be a single character').default(';')
});

export type Environment = z.infer<typeof environmentSchema>;

export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
    return ValidationUtil.validate(environmentSchema, source, 'Invalid environment configuration');
}

class ConfigService {
    private static instance: ConfigService | undefined;
    private readonly config: Environment;

    private constructor(config: Environment) {
        this.config = config;
    }

    static getInstance(): ConfigService {
        if (!ConfigService.instance) {
            loadDotenv();
            ConfigService.instance = new ConfigService(parseEnvironment(process.env));
        }
        return ConfigService.instance;
    }

    static fromEnvironment(source: NodeJS.ProcessEnv): ConfigService {
        return new ConfigService(parseEnvironment(source));
    }

    get<K extends keyof Environment>(key: K): Environment[K] {
        return this.config[key];
    }

    getAll(): Environment {
        return { ...this.config };
    }

    isDevelopment(): boolean {
        return this.config.NODE_ENV === 'development';
    }

    isTest(): boolean {
        return this.config.NODE_ENV === 'test';
    }

    /** Empty strings count as missing, the same as an unset variable. */
    getCurrencyApiKey(): string | undefined {
        const key = this.config.CURRENCY_API_KEY?.trim();
        return key ? key : undefined;
    }
}

export { ConfigService };
