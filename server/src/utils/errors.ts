/**
 * Custom error classes for the sheet sync engine
 * Use these instead of generic Error for specific failure kinds
 */

/**
 * Base interface for custom errors with HTTP-style status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/**
 * Validation error - thrown when operation input fails schema checks
 *
 * @example
 * throw new ValidationError('Invalid write-back input', zodError.issues);
 */
export class ValidationError extends Error implements CustomError {
    readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * Configuration error - required setting (spreadsheet URL, credentials,
 * database URL) is missing or unusable
 */
export class ConfigurationError extends Error implements CustomError {
    readonly name = 'ConfigurationError' as const;
    readonly statusCode = 500 as const;
    readonly setting: string | null;

    constructor(message: string, setting: string | null = null) {
        super(message);
        this.setting = setting;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

/**
 * External service error - a spreadsheet API call failed
 *
 * @example
 * throw new ExternalServiceError('values.get failed', 'google-sheets', originalError);
 */
export class ExternalServiceError extends Error implements CustomError {
    readonly name = 'ExternalServiceError' as const;
    readonly statusCode = 502 as const;
    readonly serviceName: string | null;
    readonly originalError: Error | null;

    constructor(
        message: string,
        serviceName: string | null = null,
        originalError: Error | null = null
    ) {
        super(message);
        this.serviceName = serviceName;
        this.originalError = originalError;
        Object.setPrototypeOf(this, ExternalServiceError.prototype);
    }
}

/**
 * Malformed response error - the spreadsheet API answered with a shape
 * that cannot be used (missing sheet properties, unparseable ranges)
 */
export class MalformedResponseError extends Error implements CustomError {
    readonly name = 'MalformedResponseError' as const;
    readonly statusCode = 502 as const;
    readonly operation: string;

    constructor(message: string, operation: string) {
        super(message);
        this.operation = operation;
        Object.setPrototypeOf(this, MalformedResponseError.prototype);
    }
}

/**
 * Database error - thrown when a query or transaction fails
 */
export class DatabaseError extends Error implements CustomError {
    readonly name = 'DatabaseError' as const;
    readonly statusCode = 500 as const;
    readonly originalError: Error | null;

    constructor(message: string, originalError: Error | null = null) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, DatabaseError.prototype);
    }
}

/**
 * Type guard to check if an error is a custom error with statusCode
 */
export function isCustomError(error: unknown): error is CustomError {
    return (
        error instanceof Error &&
        'statusCode' in error &&
        typeof error.statusCode === 'number'
    );
}

/** Message of any thrown value */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** Coerce any thrown value to an Error */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
