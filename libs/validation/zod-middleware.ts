import type { ZodSchema } from 'zod';
import { logger } from '../logging/logger.js';
import { ValidationError } from '../errors/appErrors.js';

/**
 * Fail-closed input validation.
 * Returns the parsed value or throws a ValidationError listing every issue.
 */
export function validate<T>(schema: ZodSchema<T>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Input values are not logged; request bodies may carry names chosen by users.
        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new ValidationError(`Validation Violation in ${context}: ${JSON.stringify(errorDetails)}`, errorDetails);
    }

    return result.data;
}

/**
 * Factory for reusable validators bound to one schema.
 */
export const createValidator = <T>(schema: ZodSchema<T>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
