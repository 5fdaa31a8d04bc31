import {
    TransactionRecord,
    TRANSFERS_CATEGORY,
    getCategory,
    getDescription
} from '../../domain/entities/transaction.entity';
import { logger } from '../../../infrastructure/monitoring/logger.service';

const JSON_INDENT = 4;

// +7 or 8, then 3-3-2-2 digits; spaces or hyphens between groups, optional (area code)
export const PHONE_PATTERN = /(?<!\d)(?:\+7|8)[\s-]?\(?\d{3}\)?[\s-]?\d{3}[\s-]?\d{2}[\s-]?\d{2}(?!\d)/;

// Surname followed by one or more initials: "Иванов И.", "Петрова А.В.", "Smith J."
export const PERSON_NAME_PATTERN = /(?<!\p{L})[A-ZА-ЯЁ][a-zа-яё]+(?:-[A-ZА-ЯЁ][a-zа-яё]+)?\s+[A-ZА-ЯЁ]\.(?:\s?[A-ZА-ЯЁ]\.)*/u;

type TransactionPredicate = (transaction: TransactionRecord) => boolean;

/**
 * Read-only searches over a statement. Every operation returns the matching
 * records as pretty-printed JSON, in input order, or `[]` when nothing matches.
 */
export class TransactionSearchService {
    simpleSearch(query: string, transactions: readonly TransactionRecord[]): string {
        const needle = query.toLowerCase();
        return this.search('simple', transactions, transaction =>
            getDescription(transaction).toLowerCase().includes(needle)
            || getCategory(transaction).toLowerCase().includes(needle)
        );
    }

    phoneSearch(transactions: readonly TransactionRecord[]): string {
        return this.search('phone', transactions, transaction =>
            PHONE_PATTERN.test(getDescription(transaction))
        );
    }

    peopleTransferSearch(transactions: readonly TransactionRecord[]): string {
        const transfers = TRANSFERS_CATEGORY.toLowerCase();
        return this.search('people-transfer', transactions, transaction =>
            getCategory(transaction).trim().toLowerCase() === transfers
            && PERSON_NAME_PATTERN.test(getDescription(transaction))
        );
    }

    private search(
        kind: string,
        transactions: readonly TransactionRecord[],
        predicate: TransactionPredicate
    ): string {
        const matches = transactions.filter(predicate);

        logger.debug('Transaction search completed', {
            search: kind,
            scanned: transactions.length,
            matched: matches.length
        });

        return JSON.stringify(matches, null, JSON_INDENT);
    }
}
