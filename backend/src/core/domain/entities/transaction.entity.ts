// backend/src/core/domain/entities/transaction.entity.ts

/**
 * Column names of a bank statement export. Records keep the export's own
 * headers so search results can be shown back to the user unchanged.
 */
export const TRANSACTION_FIELDS = {
    DESCRIPTION: 'Описание',
    CATEGORY: 'Категория',
    OPERATION_DATE: 'Дата операции',
    AMOUNT: 'Сумма операции'
} as const;

export const TRANSFERS_CATEGORY = 'Переводы';

export interface TransactionRecord {
    [column: string]: unknown;
    'Описание'?: string;
    'Категория'?: string;
    'Дата операции'?: string;
    'Сумма операции'?: number;
}

// Spreadsheet exports can hold numeric cells in text columns.
function getText(record: TransactionRecord, column: string): string {
    const value = record[column];
    return typeof value === 'string' ? value : '';
}

export function getDescription(record: TransactionRecord): string {
    return getText(record, TRANSACTION_FIELDS.DESCRIPTION);
}

export function getCategory(record: TransactionRecord): string {
    return getText(record, TRANSACTION_FIELDS.CATEGORY);
}

export function getOperationDate(record: TransactionRecord): string {
    return getText(record, TRANSACTION_FIELDS.OPERATION_DATE);
}

export function getAmount(record: TransactionRecord): number | undefined {
    const value = record[TRANSACTION_FIELDS.AMOUNT];
    return typeof value === 'number' ? value : undefined;
}
