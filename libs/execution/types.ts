/**
 * Sequence execution model.
 */

import type { TimeOfDay, ScheduleEntry } from '../schedule/types.js';
import type { ActionHandle, Direction } from '../venue/types.js';
import type { SequenceError } from '../errors/sanitizer.js';

/**
 * Immutable input of one sequence run.
 */
export interface SequenceConfig {
    readonly asset: string;
    readonly direction: Direction;
    readonly baseStake: number;
    readonly escalationMultiplier: number;
    readonly maxLevels: number;
    readonly entryTimeOfDay: TimeOfDay;
    /** One per level; length equals maxLevels */
    readonly expiryTimesOfDay: readonly TimeOfDay[];
    /** IANA zone id */
    readonly timezone: string;
    readonly outcomePollIntervalS: number;
    readonly outcomeTimeoutS: number;
}

/**
 * Controller state.
 */
export type SequenceState =
    | 'PENDING_ENTRY'
    | 'ACTION_SUBMITTED'
    | 'AWAITING_OUTCOME'
    | 'ESCALATE'
    | 'SUCCEED'
    | 'ABORT';

export type AttemptOutcome = 'WIN' | 'LOSS' | 'UNKNOWN';

/**
 * One submitted (or attempted) level.
 * Resolved exactly once; never reused across levels.
 */
export interface AttemptRecord {
    readonly level: number;
    readonly stake: number;
    /** Venue handle; absent when the submission failed */
    readonly actionId?: ActionHandle;
    readonly outcome: AttemptOutcome;
    readonly submittedAt: Date;
    /** Configured expiry of the level */
    readonly expiresAt: Date;
    readonly resolvedAt?: Date;
}

export type TerminalReason =
    | 'WIN'
    | 'MAX_LEVELS_REACHED'
    | 'OUTCOME_TIMEOUT'
    | 'SUBMISSION_FAILED'
    | 'CANCELLED';

export type FinalOutcome = 'WIN' | 'LOSS' | 'ABORTED';

/**
 * Terminal summary, produced once per run.
 */
export interface SequenceResult {
    readonly sequenceId: string;
    readonly levelsAttempted: number;
    readonly terminalReason: TerminalReason;
    readonly finalOutcome: FinalOutcome;
    readonly attempts: readonly AttemptRecord[];
    readonly schedule: readonly ScheduleEntry[];
    readonly startedAt: Date;
    readonly finishedAt: Date;
    /** Set when the run ended on a submission failure */
    readonly error?: SequenceError;
}

export interface StateTransition {
    readonly sequenceId: string;
    readonly from: SequenceState;
    readonly to: SequenceState;
    readonly level: number;
    readonly at: Date;
}
