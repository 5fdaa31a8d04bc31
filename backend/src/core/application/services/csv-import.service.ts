// backend/src/core/application/services/csv-import.service.ts
import { Readable } from 'stream';
import csvParser from 'csv-parser';
import { z } from 'zod';
import { TRANSACTION_FIELDS, TransactionRecord } from '../../domain/entities/transaction.entity';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import { ValidationException } from '../../../shared/exceptions/validation.exception';
import { ValidationUtil } from '../../../shared/utils/validation.util';

export interface CsvImportOptions {
    separator?: string;
}

const csvRowSchema = z.record(z.string());

const AMOUNT_PATTERN = /^[+-]?\d+(?:\.\d+)?$/;
const DOTTED_DATE_PATTERN = /^(\d{2})\.(\d{2})\.(\d{4})(?:\s+\d{2}:\d{2}(?::\d{2})?)?$/;

/**
 * Turns a bank statement exported as CSV into transaction records.
 * Columns are kept under their header names; only the amount and the
 * operation date are normalized.
 */
export class TransactionCsvReader {
    private readonly separator: string;

    constructor(options: CsvImportOptions = {}) {
        this.separator = options.separator ?? ';';
    }

    async readTransactions(csvData: string, options: CsvImportOptions = {}): Promise<TransactionRecord[]> {
        const parser = csvParser({
            separator: options.separator ?? this.separator,
            mapHeaders: ({ header }) => header.trim(),
            mapValues: ({ value }) => (typeof value === 'string' ? value.trim() : value)
        });

        const transactions: TransactionRecord[] = [];
        const source = Readable.from([csvData.replace(/^\uFEFF/, '')]);

        for await (const row of source.pipe(parser)) {
            const rowNumber = transactions.length + 1;
            const columns = ValidationUtil.validate(csvRowSchema, row, `Malformed CSV row ${rowNumber}`);
            transactions.push(this.toTransaction(columns, rowNumber));
        }

        logger.info('Bank statement parsed', { rows: transactions.length });
        return transactions;
    }

    private toTransaction(columns: Record<string, string>, rowNumber: number): TransactionRecord {
        const record: TransactionRecord = {};
        for (const [column, value] of Object.entries(columns)) {
            record[column] = value;
        }

        const rawAmount = columns[TRANSACTION_FIELDS.AMOUNT];
        if (rawAmount !== undefined) {
            record[TRANSACTION_FIELDS.AMOUNT] = this.parseAmount(rawAmount, rowNumber);
        }

        const rawDate = columns[TRANSACTION_FIELDS.OPERATION_DATE];
        if (rawDate !== undefined) {
            record[TRANSACTION_FIELDS.OPERATION_DATE] = this.normalizeDate(rawDate);
        }

        return record;
    }

    private parseAmount(raw: string, rowNumber: number): number {
        const normalized = raw.replace(/\s/g, '').replace(',', '.');
        if (!AMOUNT_PATTERN.test(normalized)) {
            throw new ValidationException(`Invalid amount in CSV row ${rowNumber}`, [
                { field: TRANSACTION_FIELDS.AMOUNT, message: 'must be a decimal number', value: raw }
            ]);
        }
        return Number(normalized);
    }

    private normalizeDate(raw: string): string {
        const match = DOTTED_DATE_PATTERN.exec(raw);
        if (!match) {
            return raw;
        }
        const [, day, month, year] = match;
        return `${year}-${month}-${day}`;
    }
}
