// backend/src/shared/constants/status-codes.ts
export const HTTP_STATUS = {
    // Client Errors
    BAD_REQUEST: 400,
    UNPROCESSABLE_ENTITY: 422,

    // Server Errors
    INTERNAL_ERROR: 500,
    BAD_GATEWAY: 502
} as const;
