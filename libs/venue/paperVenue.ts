/**
 * Paper Venue
 *
 * In-process venue for dry runs. Actions stay PENDING until their expiry on
 * the injected clock, then resolve from a scripted outcome list or, once the
 * script runs out, from the configured random source.
 */

import crypto from 'crypto';
import { addMinutes } from 'date-fns';
import { pino } from 'pino';
import { PollError, SubmissionError } from '../errors/sequenceErrors.js';
import { systemClock, type Clock } from '../execution/clock.js';
import {
    err,
    ok,
    type ActionHandle,
    type ActionSubmitter,
    type Direction,
    type OutcomePoller,
    type PollOutcome,
    type Result
} from './types.js';

const logger = pino({ name: 'PaperVenue', level: process.env.LOG_LEVEL ?? 'info' });

export type PaperOutcome = 'WIN' | 'LOSS';

export interface PaperAction {
    readonly handle: ActionHandle;
    readonly asset: string;
    readonly direction: Direction;
    readonly stake: number;
    readonly submittedAt: Date;
    readonly expiresAt: Date;
    readonly outcome: PaperOutcome;
}

export interface PaperVenueOptions {
    readonly clock?: Clock;
    /** Outcomes handed out in submission order */
    readonly script?: readonly PaperOutcome[];
    /** Returns a number in [0, 1); below 0.5 is a WIN */
    readonly random?: () => number;
    /** Largest stake the venue accepts */
    readonly maxStake?: number;
}

export class PaperVenue implements ActionSubmitter, OutcomePoller {
    private readonly clock: Clock;
    private readonly script: PaperOutcome[];
    private readonly random: () => number;
    private readonly maxStake: number;
    private readonly actions = new Map<ActionHandle, PaperAction>();

    constructor(options: PaperVenueOptions = {}) {
        this.clock = options.clock ?? systemClock;
        this.script = [...(options.script ?? [])];
        this.random = options.random ?? (() => crypto.randomInt(0, 1_000_000) / 1_000_000);
        this.maxStake = options.maxStake ?? Number.POSITIVE_INFINITY;
    }

    async submit(
        asset: string,
        direction: Direction,
        stake: number,
        durationMinutes: number
    ): Promise<Result<ActionHandle, SubmissionError>> {
        if (!(stake > 0) || stake > this.maxStake) {
            return err(new SubmissionError('INVALID_AMOUNT', `Stake ${stake} outside accepted range (0, ${this.maxStake}]`));
        }
        if (!Number.isInteger(durationMinutes) || durationMinutes < 1) {
            return err(new SubmissionError('INVALID_DURATION', `Duration must be a whole number of minutes, got ${durationMinutes}`));
        }

        const submittedAt = this.clock.now();
        const action: PaperAction = Object.freeze({
            handle: crypto.randomUUID(),
            asset,
            direction,
            stake,
            submittedAt,
            expiresAt: addMinutes(submittedAt, durationMinutes),
            outcome: this.nextOutcome()
        });
        this.actions.set(action.handle, action);

        logger.info({ handle: action.handle, asset, direction, stake, expiresAt: action.expiresAt.toISOString() }, 'Paper action accepted');
        return ok(action.handle);
    }

    async poll(handle: ActionHandle): Promise<Result<PollOutcome, PollError>> {
        const action = this.actions.get(handle);
        if (!action) {
            return err(new PollError('UNKNOWN_HANDLE', `No paper action with handle ${handle}`));
        }
        if (this.clock.now().getTime() < action.expiresAt.getTime()) {
            return ok<PollOutcome>('PENDING');
        }
        return ok(action.outcome);
    }

    /**
     * Actions accepted so far, in submission order.
     */
    get submitted(): readonly PaperAction[] {
        return [...this.actions.values()];
    }

    private nextOutcome(): PaperOutcome {
        return this.script.shift() ?? (this.random() < 0.5 ? 'WIN' : 'LOSS');
    }
}

/**
 * Parses a comma separated outcome script such as "LOSS,LOSS,WIN".
 */
export function parseOutcomeScript(value: string | undefined): PaperOutcome[] {
    if (!value || value.trim() === '') return [];
    return value.split(',').map(token => {
        const outcome = token.trim().toUpperCase();
        if (outcome !== 'WIN' && outcome !== 'LOSS') {
            throw new Error(`Invalid paper outcome "${token.trim()}"; expected WIN or LOSS`);
        }
        return outcome;
    });
}
