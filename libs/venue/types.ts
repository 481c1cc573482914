/**
 * Venue collaborator contracts.
 *
 * The sequencer never talks to a venue directly; it goes through these two
 * interfaces. Session handling and wire protocol live behind them.
 */

import type { PollError, SubmissionError } from '../errors/sequenceErrors.js';

export type Result<T, E> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
    return { ok: false, error };
}

export type Direction = 'UP' | 'DOWN';

/** Opaque venue reference for a submitted action. */
export type ActionHandle = string;

export type PollOutcome = 'WIN' | 'LOSS' | 'PENDING';

export interface ActionSubmitter {
    /**
     * Submit one action. Called at most once per level; a failure is never
     * resubmitted by the sequencer.
     */
    submit(
        asset: string,
        direction: Direction,
        stake: number,
        durationMinutes: number
    ): Promise<Result<ActionHandle, SubmissionError>>;
}

export interface OutcomePoller {
    /** Called repeatedly until the outcome is no longer PENDING or the window closes. */
    poll(handle: ActionHandle): Promise<Result<PollOutcome, PollError>>;
}
