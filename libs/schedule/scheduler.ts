/**
 * Sequence Scheduler
 *
 * Turns configured times of day into absolute timestamps for the entry and
 * every escalation level, rolling past times to the next calendar day.
 *
 * Only level 1's entry drives execution directly. Later levels are entered at
 * the previous level's expiry, so their `dueAt` is a projection.
 */

import { addHours } from 'date-fns';
import { ScheduleError, type ValidationIssue } from '../errors/sequenceErrors.js';
import type { SequenceConfig } from '../execution/types.js';
import type { ScheduleEntry } from './types.js';
import { atTimeOfDay, calendarDateIn, formatTimeOfDay, isValidTimeOfDay, isValidTimeZone } from './timeOfDay.js';

const DAY_HOURS = 24;

/**
 * Compute the schedule of a sequence relative to `now`.
 *
 * @throws ScheduleError when the config cannot produce a schedule
 */
export function buildSchedule(config: SequenceConfig, now: Date): ScheduleEntry[] {
    assertSchedulable(config);

    const { timezone } = config;
    const anchorDate = calendarDateIn(now, timezone);

    let entryAt = atTimeOfDay(anchorDate, config.entryTimeOfDay, timezone);
    if (entryAt.getTime() <= now.getTime()) {
        entryAt = addHours(entryAt, DAY_HOURS);
    }

    // Expiries resolve against the entry's date, not a rolling "now"
    const entryDate = calendarDateIn(entryAt, timezone);

    const schedule: ScheduleEntry[] = [];
    let dueAt = entryAt;
    config.expiryTimesOfDay.forEach((time, index) => {
        let expiresAt = atTimeOfDay(entryDate, time, timezone);
        if (expiresAt.getTime() <= entryAt.getTime()) {
            expiresAt = addHours(expiresAt, DAY_HOURS);
        }

        schedule.push(Object.freeze({
            level: index + 1,
            dueAt,
            expiresAt,
            stakeMultiplier: Math.pow(config.escalationMultiplier, index)
        }));
        dueAt = expiresAt;
    });

    return schedule;
}

/**
 * Stake of a level's action.
 */
export function stakeFor(config: Pick<SequenceConfig, 'baseStake'>, entry: Pick<ScheduleEntry, 'stakeMultiplier'>): number {
    return config.baseStake * entry.stakeMultiplier;
}

/**
 * Structural checks a config must pass before a schedule can be computed.
 */
export function scheduleIssues(config: SequenceConfig): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    if (!Number.isInteger(config.maxLevels) || config.maxLevels < 1) {
        issues.push({ path: 'maxLevels', message: 'must be an integer >= 1' });
    }
    if (config.expiryTimesOfDay.length !== config.maxLevels) {
        issues.push({
            path: 'expiryTimesOfDay',
            message: `expected ${config.maxLevels} expiry times, got ${config.expiryTimesOfDay.length}`
        });
    }
    if (!(config.baseStake > 0)) {
        issues.push({ path: 'baseStake', message: 'must be greater than zero' });
    }
    if (!(config.escalationMultiplier > 0)) {
        issues.push({ path: 'escalationMultiplier', message: 'must be greater than zero' });
    }
    if (!isPositiveFinite(config.outcomePollIntervalS)) {
        issues.push({ path: 'outcomePollIntervalS', message: 'must be a finite number greater than zero' });
    }
    if (!isPositiveFinite(config.outcomeTimeoutS)) {
        issues.push({ path: 'outcomeTimeoutS', message: 'must be a finite number greater than zero' });
    }
    if (!isValidTimeZone(config.timezone)) {
        issues.push({ path: 'timezone', message: `unknown timezone "${config.timezone}"` });
    }
    if (!isValidTimeOfDay(config.entryTimeOfDay)) {
        issues.push({ path: 'entryTimeOfDay', message: `invalid time of day ${formatTimeOfDay(config.entryTimeOfDay)}` });
    }
    config.expiryTimesOfDay.forEach((time, index) => {
        if (!isValidTimeOfDay(time)) {
            issues.push({ path: `expiryTimesOfDay.${index}`, message: `invalid time of day ${formatTimeOfDay(time)}` });
        }
    });

    return issues;
}

function isPositiveFinite(value: number): boolean {
    return Number.isFinite(value) && value > 0;
}

function assertSchedulable(config: SequenceConfig): void {
    const issues = scheduleIssues(config);
    if (issues.length > 0) {
        throw new ScheduleError('Sequence config cannot be scheduled', issues);
    }
}
