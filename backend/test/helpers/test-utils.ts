// Test utilities and helpers
import { TransactionRecord } from '../../src/core/domain/entities/transaction.entity';

export interface MockHttpClient {
  get: jest.Mock;
}

export class TestUtils {
  // Currency API stand-in: resolves every GET with the given body
  static createMockHttpClient(body?: unknown): MockHttpClient {
    return {
      get: jest.fn().mockResolvedValue({ status: 200, data: body })
    };
  }

  static rateResponse(rates: Record<string, string | number>): { data: Record<string, { code: string; value: string | number }> } {
    const data: Record<string, { code: string; value: string | number }> = {};
    for (const [code, value] of Object.entries(rates)) {
      data[code] = { code, value };
    }
    return { data };
  }

  static generateTransaction(overrides: TransactionRecord = {}): TransactionRecord {
    return {
      'Дата операции': '2024-05-15',
      'Сумма операции': 100.1,
      'Категория': 'Супермаркеты',
      'Описание': 'Покупка продуктов',
      ...overrides
    };
  }

  // Sets a cell through the untyped column index, the way a spreadsheet loader can
  static withCell(record: TransactionRecord, column: string, value: unknown): TransactionRecord {
    const copy: TransactionRecord = { ...record };
    copy[column] = value;
    return copy;
  }
}
