/**
 * Escalation sequencer: public surface.
 */

// Model
export type {
    SequenceConfig,
    SequenceState,
    AttemptOutcome,
    AttemptRecord,
    TerminalReason,
    FinalOutcome,
    SequenceResult,
    StateTransition
} from './types.js';

// Attempt Tracking
export type { CreateAttemptInput } from './attempt.js';
export { createAttempt, resolveAttempt, isResolved, totalStake } from './attempt.js';

// Timing
export type { Clock } from './clock.js';
export { SystemClock, systemClock, sleepUntil, isAbortError } from './clock.js';
export type { WatchOptions, WatchResult } from './outcomeWatcher.js';
export { watchOutcome } from './outcomeWatcher.js';

// Scheduling
export type { ScheduleEntry, TimeOfDay } from '../schedule/types.js';
export type { ScheduleWarning } from '../schedule/consistency.js';
export { buildSchedule, scheduleIssues, stakeFor } from '../schedule/scheduler.js';
export { checkScheduleConsistency } from '../schedule/consistency.js';

// Controller
export type { SequenceControllerOptions } from './sequenceController.js';
export { SequenceController, ACTION_DURATION_MINUTES } from './sequenceController.js';

// Venue contracts
export type { ActionHandle, ActionSubmitter, Direction, OutcomePoller, PollOutcome, Result } from '../venue/types.js';
export { ok, err } from '../venue/types.js';

// Errors
export { SequenceError, ErrorSanitizer } from '../errors/sanitizer.js';
export { SubmissionError, PollError, ScheduleError, ValidationError } from '../errors/sequenceErrors.js';
