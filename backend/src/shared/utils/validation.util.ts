// backend/src/shared/utils/validation.util.ts

import { z } from 'zod';
import { ValidationException, ValidationError } from '../exceptions/validation.exception';

export class ValidationUtil {
    /**
     * Validates data against a Zod schema.
     * Without an explicit message the issue messages are joined into the exception message.
     */
    static validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, message?: string): T {
        const result = schema.safeParse(data);
        if (result.success) {
            return result.data;
        }

        const validationErrors = ValidationUtil.toValidationErrors(result.error);
        throw new ValidationException(
            message ?? validationErrors.map(err => err.message).join('; '),
            validationErrors
        );
    }

    static toValidationErrors(error: z.ZodError): ValidationError[] {
        return error.errors.map(err => ({
            field: err.path.join('.'),
            message: err.message
        }));
    }
}
