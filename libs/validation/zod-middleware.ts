import type { ZodTypeAny, output } from 'zod';
import { logger } from '../logging/logger.js';
import { ValidationError } from '../errors/sequenceErrors.js';

/**
 * Parses `data` against `schema`, logging and throwing ValidationError on failure.
 */
export function validate<S extends ZodTypeAny>(schema: S, data: unknown, context: string): output<S> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new ValidationError(context, errorDetails);
    }

    return result.data;
}

