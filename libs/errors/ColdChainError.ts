/**
 * ColdChainError
 * Canonical error for every rejected ledger operation.
 * Callers branch on `code`; `retryable` marks the kinds a later call can clear.
 */

export type ColdChainErrorCode =
    | 'NotFound'
    | 'AlreadyExists'
    | 'Unauthorized'
    | 'InvalidState'
    | 'InvalidInput'
    | 'LimitExceeded'
    | 'PreconditionFailed'
    | 'InsufficientFunds'
    | 'TransferFailed';

const STATUS_CODES: Record<ColdChainErrorCode, number> = {
    NotFound: 404,
    AlreadyExists: 409,
    Unauthorized: 403,
    InvalidState: 409,
    InvalidInput: 400,
    LimitExceeded: 422,
    PreconditionFailed: 412,
    InsufficientFunds: 402,
    TransferFailed: 502
};

const RETRYABLE_CODES: ReadonlySet<ColdChainErrorCode> = new Set<ColdChainErrorCode>([
    'InsufficientFunds',
    'TransferFailed'
]);

export class ColdChainError extends Error {
    readonly code: ColdChainErrorCode;
    readonly statusCode: number;
    readonly retryable: boolean;
    readonly details?: Readonly<Record<string, unknown>>;

    constructor(code: ColdChainErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'ColdChainError';
        this.code = code;
        this.statusCode = STATUS_CODES[code];
        this.retryable = RETRYABLE_CODES.has(code);
        this.details = details ? Object.freeze({ ...details }) : undefined;
        Object.setPrototypeOf(this, ColdChainError.prototype);
    }
}

export function isColdChainError(err: unknown, code?: ColdChainErrorCode): err is ColdChainError {
    return err instanceof ColdChainError && (code === undefined || err.code === code);
}
