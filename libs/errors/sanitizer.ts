import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Base error of the sequencer.
 * Carries an incidentId so a reported failure can be matched to its log line.
 */

export type ErrorCategory = 'CONFIG' | 'VENUE' | 'OPS';

export type ErrorLogLevel = 'error' | 'warn' | 'debug';

export class SequenceError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: ErrorCategory = 'OPS',
        options?: { cause?: unknown; contextLabel?: string; logLevel?: ErrorLogLevel }
    ) {
        super(publicMessage);
        this.name = new.target.name;
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        logger[options?.logLevel ?? 'error']({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a SequenceError.
     */
    sanitize: (err: unknown, contextLabel: string): SequenceError => {
        if (err instanceof SequenceError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let code: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
            code = readErrorCode(err);
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object' && 'message' in err) {
            if (typeof err.message === 'string') {
                originalErrorMessage = err.message;
            }
            code = readErrorCode(err);
        } else {
            originalErrorMessage = String(err);
        }

        return new SequenceError(
            `An internal error occurred in ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, code, context: contextLabel },
            'OPS',
            { cause: err, contextLabel }
        );
    }
};

/**
 * Reads a string `code` property (Node system errors, venue client errors).
 */
export function readErrorCode(err: unknown): string | undefined {
    if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === 'string') return err;
    return 'Unknown error';
}
