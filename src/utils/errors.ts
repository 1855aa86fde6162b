export type ErrorCode =
    | 'validation_error'
    | 'capacity_error'
    | 'not_found'
    | 'corrupt_record'
    | 'dependency_unavailable'
    | 'conflict'
    | 'internal_error';

export class AppError extends Error {
    public readonly code: ErrorCode;
    public readonly statusCode: number;
    public readonly meta: Record<string, unknown>;

    constructor(message: string, code: ErrorCode = 'internal_error', statusCode = 500, meta: Record<string, unknown> = {}) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.statusCode = statusCode;
        this.meta = meta;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ValidationError extends AppError {
    constructor(message: string, meta: Record<string, unknown> = {}) {
        super(message, 'validation_error', 422, meta);
    }
}

export class CapacityError extends AppError {
    constructor(message: string, meta: Record<string, unknown> = {}) {
        super(message, 'capacity_error', 409, meta);
    }
}

export class NotFoundError extends AppError {
    constructor(message: string, meta: Record<string, unknown> = {}) {
        super(message, 'not_found', 404, meta);
    }
}

export class CorruptRecordError extends AppError {
    constructor(message: string, meta: Record<string, unknown> = {}) {
        super(message, 'corrupt_record', 500, meta);
    }
}

export class DependencyUnavailableError extends AppError {
    constructor(message: string, meta: Record<string, unknown> = {}) {
        super(message, 'dependency_unavailable', 503, meta);
    }
}

export class ConflictError extends AppError {
    constructor(message: string, meta: Record<string, unknown> = {}) {
        super(message, 'conflict', 409, meta);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
