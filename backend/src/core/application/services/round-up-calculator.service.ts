import { z } from 'zod';
import { TransactionRecord, getAmount, getOperationDate } from '../../domain/entities/transaction.entity';
import { logger } from '../../../infrastructure/monitoring/logger.service';
import { ROUND_UP_LIMITS, RoundUpLimit } from '../../../shared/types/common.types';
import { roundToCents } from '../../../shared/utils/currency.util';
import { ValidationUtil } from '../../../shared/utils/validation.util';

const isRoundUpLimit = (value: number): value is RoundUpLimit =>
    ROUND_UP_LIMITS.some(limit => limit === value);

const MONTH_FORMAT_MESSAGE = "month must be in 'YYYY-MM' format";
const LIMIT_MESSAGE = 'limit must be 10, 50 or 100';

const roundUpQuerySchema = z.object({
    month: z.string({ invalid_type_error: MONTH_FORMAT_MESSAGE }).regex(/^\d{4}-\d{2}$/, MONTH_FORMAT_MESSAGE),
    limit: z.number({ invalid_type_error: LIMIT_MESSAGE }).refine(isRoundUpLimit, LIMIT_MESSAGE)
});

/**
 * "Investment bank" projection: how much would have been saved in a month if
 * every purchase had been rounded up to the next multiple of `limit`.
 */
export class RoundUpCalculator {
    investmentBank(month: string, transactions: readonly TransactionRecord[], limit: number): number {
        ValidationUtil.validate(roundUpQuerySchema, { month, limit });

        let spare = 0;
        let counted = 0;

        for (const transaction of transactions) {
            if (!getOperationDate(transaction).startsWith(month)) {
                continue;
            }

            const amount = getAmount(transaction);
            // refunds, zero rows and unparsed amounts are not rounded
            if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0) {
                continue;
            }

            spare += Math.ceil(amount / limit) * limit - amount;
            counted++;
        }

        const total = roundToCents(spare);
        logger.debug('Round-up savings calculated', { month, limit, transactions: counted, total });
        return total;
    }
}
