import { z, ZodTypeAny } from 'zod';
import { logger } from '../logging/logger.js';

/**
 * Fail-closed validation.
 * Returns the parsed value or throws an error listing every issue by path.
 */
export function validate<S extends ZodTypeAny>(schema: S, data: unknown, context: string): z.output<S> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Values are not logged: configuration may carry credentials.
        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new Error(`Validation Violation in ${context}: ${JSON.stringify(errorDetails)}`);
    }

    return result.data;
}
