/**
 * Attempt records.
 *
 * Records are frozen. Resolving returns a new record which replaces the
 * submitted one; an already resolved record cannot be resolved again.
 */

import type { ActionHandle } from '../venue/types.js';
import type { AttemptOutcome, AttemptRecord } from './types.js';

export interface CreateAttemptInput {
    readonly level: number;
    readonly stake: number;
    readonly submittedAt: Date;
    readonly expiresAt: Date;
    readonly actionId?: ActionHandle;
}

export function createAttempt(input: CreateAttemptInput): AttemptRecord {
    const record: AttemptRecord = input.actionId === undefined
        ? {
            level: input.level,
            stake: input.stake,
            outcome: 'UNKNOWN',
            submittedAt: input.submittedAt,
            expiresAt: input.expiresAt
        }
        : {
            level: input.level,
            stake: input.stake,
            actionId: input.actionId,
            outcome: 'UNKNOWN',
            submittedAt: input.submittedAt,
            expiresAt: input.expiresAt
        };
    return Object.freeze(record);
}

export function isResolved(record: AttemptRecord): boolean {
    return record.resolvedAt !== undefined;
}

export function resolveAttempt(record: AttemptRecord, outcome: AttemptOutcome, resolvedAt: Date): AttemptRecord {
    if (isResolved(record)) {
        throw new Error(`Attempt at level ${record.level} is already resolved as ${record.outcome}`);
    }
    return Object.freeze({ ...record, outcome, resolvedAt });
}

export function totalStake(records: readonly AttemptRecord[]): number {
    return records
        .filter(record => record.actionId !== undefined)
        .reduce((sum, record) => sum + record.stake, 0);
}
