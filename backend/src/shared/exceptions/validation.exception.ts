// backend/src/shared/exceptions/validation.exception.ts
import { BaseException } from './base.exception';
import { HTTP_STATUS } from '../constants/status-codes';

export interface ValidationError {
    field: string;
    message: string;
    value?: unknown;
}

export class ValidationException extends BaseException {
    public readonly validationErrors: ValidationError[];

    constructor(message: string, validationErrors: ValidationError[] = []) {
        super(message, 'VALIDATION_ERROR', HTTP_STATUS.BAD_REQUEST, validationErrors);
        this.validationErrors = validationErrors;
    }
}
