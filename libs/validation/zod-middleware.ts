import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { ColdChainError } from '../errors/ColdChainError.js';

/**
 * Parses `data` against `schema` and fails closed with `InvalidInput`.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input validation failure");

        throw new ColdChainError('InvalidInput', `Validation violation in ${context}: ${JSON.stringify(errorDetails)}`, {
            context,
            issues: errorDetails
        });
    }

    return result.data;
}
