/**
 * Sequence Controller
 *
 * Drives one escalation sequence:
 *
 *   PENDING_ENTRY -> ACTION_SUBMITTED -> AWAITING_OUTCOME -> ESCALATE | SUCCEED | ABORT
 *
 * A LOSS below the level cap escalates. The next level is submitted at the
 * expiry of the level just lost, not at the schedule's projection for it.
 * Every run ends in a SequenceResult with an explicit terminal reason.
 */

import crypto from 'crypto';
import { SequenceError, describeError, readErrorCode } from '../errors/sanitizer.js';
import { ScheduleError, SubmissionError } from '../errors/sequenceErrors.js';
import { getSequenceLogger, type SequenceLogger } from '../logging/logger.js';
import { buildSchedule, scheduleIssues, stakeFor } from '../schedule/scheduler.js';
import { checkScheduleConsistency } from '../schedule/consistency.js';
import type { ScheduleEntry } from '../schedule/types.js';
import type { ActionHandle, ActionSubmitter, OutcomePoller, Result } from '../venue/types.js';
import { createAttempt, isResolved, resolveAttempt, totalStake } from './attempt.js';
import { isAbortError, sleepUntil, systemClock, type Clock } from './clock.js';
import { watchOutcome, type WatchResult } from './outcomeWatcher.js';
import type {
    AttemptOutcome,
    AttemptRecord,
    FinalOutcome,
    SequenceConfig,
    SequenceResult,
    SequenceState,
    StateTransition,
    TerminalReason
} from './types.js';

/** Every action is a fixed one-minute contract. */
export const ACTION_DURATION_MINUTES = 1;

export interface SequenceControllerOptions {
    readonly clock?: Clock;
    readonly sequenceId?: string;
    readonly logger?: SequenceLogger;
    /** Called synchronously on every state change */
    readonly onTransition?: (transition: StateTransition) => void;
}

export class SequenceController {
    public readonly sequenceId: string;

    private readonly clock: Clock;
    private readonly log: SequenceLogger;
    private readonly onTransition?: (transition: StateTransition) => void;

    private state: SequenceState = 'PENDING_ENTRY';
    private level = 1;
    private attempts: AttemptRecord[] = [];
    private started = false;

    /**
     * @throws ScheduleError when the config is malformed; nothing has been submitted yet
     */
    constructor(
        private readonly config: SequenceConfig,
        private readonly submitter: ActionSubmitter,
        private readonly poller: OutcomePoller,
        options: SequenceControllerOptions = {}
    ) {
        const issues = scheduleIssues(config);
        if (issues.length > 0) {
            throw new ScheduleError('Sequence config cannot be scheduled', issues);
        }

        this.clock = options.clock ?? systemClock;
        this.sequenceId = options.sequenceId ?? crypto.randomUUID();
        this.log = options.logger ?? getSequenceLogger(this.sequenceId, config);
        this.onTransition = options.onTransition;
    }

    public get currentState(): SequenceState {
        return this.state;
    }

    public get currentLevel(): number {
        return this.level;
    }

    public get attemptLog(): readonly AttemptRecord[] {
        return this.attempts;
    }

    /**
     * Compute the schedule from the clock's current time and run it.
     */
    public async run(signal?: AbortSignal): Promise<SequenceResult> {
        return this.execute(buildSchedule(this.config, this.clock.now()), signal);
    }

    /**
     * Run a precomputed schedule to a terminal state.
     */
    public async execute(schedule: readonly ScheduleEntry[], signal?: AbortSignal): Promise<SequenceResult> {
        if (this.started) {
            throw new SequenceError('A SequenceController runs a single sequence', { sequenceId: this.sequenceId }, 'OPS');
        }
        const first = schedule[0];
        if (first === undefined || schedule.length !== this.config.maxLevels) {
            throw new ScheduleError('Schedule does not match the configured level count', [{
                path: 'schedule',
                message: `expected ${this.config.maxLevels} entries, got ${schedule.length}`
            }]);
        }
        this.started = true;

        const startedAt = this.clock.now();
        this.logSchedule(schedule);

        let submitAt = first.dueAt;

        for (const entry of schedule) {
            if (entry.level > 1) {
                this.level = entry.level;
                this.transition('PENDING_ENTRY');
            }

            const stake = stakeFor(this.config, entry);

            try {
                await sleepUntil(this.clock, submitAt, signal);
            } catch (error: unknown) {
                if (!isAbortError(error, signal)) throw error;
                return this.finish(schedule, startedAt, 'CANCELLED', 'ABORTED');
            }

            const submittedAt = this.clock.now();
            const submission = await this.submitAction(stake);

            if (!submission.ok) {
                const failed = createAttempt({ level: entry.level, stake, submittedAt, expiresAt: entry.expiresAt });
                this.attempts.push(resolveAttempt(failed, 'UNKNOWN', this.clock.now()));
                this.log.error({
                    level: entry.level,
                    stake,
                    code: submission.error.code,
                    incidentId: submission.error.incidentId
                }, 'Action submission failed');
                return this.finish(schedule, startedAt, 'SUBMISSION_FAILED', 'ABORTED', submission.error);
            }

            this.attempts.push(createAttempt({
                level: entry.level,
                stake,
                submittedAt,
                expiresAt: entry.expiresAt,
                actionId: submission.value
            }));
            this.transition('ACTION_SUBMITTED', { stake, actionId: submission.value });
            this.transition('AWAITING_OUTCOME', { stake, actionId: submission.value });

            let watch: WatchResult;
            try {
                watch = await watchOutcome(this.poller, submission.value, {
                    clock: this.clock,
                    intervalMs: this.config.outcomePollIntervalS * 1000,
                    timeoutMs: this.config.outcomeTimeoutS * 1000,
                    signal,
                    logger: this.log
                });
            } catch (error: unknown) {
                if (!isAbortError(error, signal)) throw error;
                // The venue already holds the action; it cannot be reversed from here
                this.resolveCurrent('UNKNOWN');
                return this.finish(schedule, startedAt, 'CANCELLED', 'ABORTED');
            }

            if (watch.status === 'TIMEOUT') {
                this.resolveCurrent('UNKNOWN');
                return this.finish(schedule, startedAt, 'OUTCOME_TIMEOUT', 'ABORTED');
            }

            this.resolveCurrent(watch.outcome, watch.resolvedAt);
            this.log.info({ level: entry.level, stake, outcome: watch.outcome, polls: watch.polls }, 'Outcome resolved');

            if (watch.outcome === 'WIN') {
                return this.finish(schedule, startedAt, 'WIN', 'WIN');
            }
            if (entry.level >= this.config.maxLevels) {
                return this.finish(schedule, startedAt, 'MAX_LEVELS_REACHED', 'LOSS');
            }

            this.transition('ESCALATE', { stake });
            submitAt = entry.expiresAt;
        }

        // Unreachable: the last level always finishes in one of the branches above
        throw new SequenceError('Schedule exhausted without a terminal state', { sequenceId: this.sequenceId }, 'OPS');
    }

    private async submitAction(stake: number): Promise<Result<ActionHandle, SubmissionError>> {
        const { asset, direction } = this.config;
        try {
            return await this.submitter.submit(asset, direction, stake, ACTION_DURATION_MINUTES);
        } catch (error: unknown) {
            return {
                ok: false,
                error: new SubmissionError(readErrorCode(error) ?? 'SUBMITTER_THREW', describeError(error), error)
            };
        }
    }

    private resolveCurrent(outcome: AttemptOutcome, resolvedAt: Date = this.clock.now()): void {
        const index = this.attempts.length - 1;
        const current = this.attempts[index];
        if (current === undefined || isResolved(current)) return;
        this.attempts[index] = resolveAttempt(current, outcome, resolvedAt);
    }

    private transition(to: SequenceState, details: Record<string, unknown> = {}): void {
        const from = this.state;
        this.state = to;

        const transition: StateTransition = Object.freeze({
            sequenceId: this.sequenceId,
            from,
            to,
            level: this.level,
            at: this.clock.now()
        });
        this.log.info({ ...details, level: this.level, from, state: to }, 'Sequence transition');
        this.onTransition?.(transition);
    }

    private finish(
        schedule: readonly ScheduleEntry[],
        startedAt: Date,
        terminalReason: TerminalReason,
        finalOutcome: FinalOutcome,
        error?: SequenceError
    ): SequenceResult {
        this.transition(terminalReason === 'WIN' ? 'SUCCEED' : 'ABORT', { terminalReason });

        const base = {
            sequenceId: this.sequenceId,
            levelsAttempted: this.attempts.length,
            terminalReason,
            finalOutcome,
            attempts: Object.freeze([...this.attempts]),
            schedule,
            startedAt,
            finishedAt: this.clock.now()
        };
        const result: SequenceResult = Object.freeze(error === undefined ? base : { ...base, error });

        this.log.info({
            levelsAttempted: result.levelsAttempted,
            terminalReason,
            finalOutcome,
            stakes: result.attempts.map(attempt => attempt.stake),
            totalStake: totalStake(result.attempts)
        }, 'Sequence finished');

        return result;
    }

    private logSchedule(schedule: readonly ScheduleEntry[]): void {
        this.log.info({
            levels: schedule.map(entry => ({
                level: entry.level,
                dueAt: entry.dueAt.toISOString(),
                expiresAt: entry.expiresAt.toISOString(),
                stake: stakeFor(this.config, entry)
            }))
        }, 'Sequence scheduled');

        for (const warning of checkScheduleConsistency(schedule, ACTION_DURATION_MINUTES)) {
            this.log.warn({ level: warning.level, code: warning.code }, warning.message);
        }
    }
}
