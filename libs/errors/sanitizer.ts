import { logger } from '../logging/logger.js';
import { ColdChainError } from './ColdChainError.js';
import crypto from 'crypto';

/**
 * Wraps infrastructure failures in a generic message and an incident id for
 * log correlation. Domain errors are passed through untouched.
 */

export class SanitizedError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: 'SEC' | 'OPS' | 'FIN' = 'OPS',
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage);
        this.name = 'SanitizedError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.sqlState = options?.sqlState;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Returns domain and already-sanitized errors as-is, wraps anything else.
     */
    sanitize: (err: unknown, contextLabel: string): ColdChainError | SanitizedError => {
        if (err instanceof ColdChainError || err instanceof SanitizedError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let sqlState: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
            const code: unknown = Reflect.get(err, 'code');
            sqlState = typeof code === 'string' ? code : undefined;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        return new SanitizedError(
            `An internal system error occurred. Please contact support with ID: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            'OPS',
            { cause: err, contextLabel, sqlState }
        );
    }
};
