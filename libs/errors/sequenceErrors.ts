/**
 * Error taxonomy of the escalation sequencer.
 *
 * SubmissionError  venue rejected the action; fatal for the sequence, never retried
 * PollError        transient failure while checking an outcome; retried until the timeout
 * ScheduleError    malformed configuration; raised before anything is submitted
 * ValidationError  input failed schema validation
 */

import { SequenceError } from './sanitizer.js';

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

export class ValidationError extends SequenceError {
    constructor(
        public readonly context: string,
        public readonly issues: readonly ValidationIssue[]
    ) {
        super(`Validation Violation in ${context}`, { issues }, 'CONFIG', { contextLabel: context, logLevel: 'warn' });
    }
}

export class ScheduleError extends SequenceError {
    constructor(message: string, public readonly issues: readonly ValidationIssue[] = [], cause?: unknown) {
        super(message, { issues }, 'CONFIG', { cause, contextLabel: 'schedule' });
    }
}

export class SubmissionError extends SequenceError {
    readonly retryable = false;

    constructor(
        public readonly code: string,
        message: string,
        cause?: unknown
    ) {
        super(message, { code }, 'VENUE', { cause, contextLabel: 'submit' });
    }
}

export class PollError extends SequenceError {
    constructor(
        public readonly code: string,
        message: string,
        cause?: unknown
    ) {
        // Absorbed by the polling loop; only worth a debug line on its own
        super(message, { code }, 'VENUE', { cause, contextLabel: 'poll', logLevel: 'debug' });
    }
}
