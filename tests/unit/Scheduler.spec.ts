/**
 * Unit Tests: Scheduler
 *
 * @see libs/schedule/scheduler.ts
 */

import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { buildSchedule, scheduleIssues, stakeFor } from '../../libs/schedule/scheduler.js';
import { ScheduleError } from '../../libs/errors/sequenceErrors.js';
import { at, sequenceConfig } from '../helpers/fixtures.js';

const iso = (dates: Date[]) => dates.map(d => d.toISOString());

describe('buildSchedule()', () => {
    it('should produce one entry per level with geometric stake multipliers', () => {
        const schedule = buildSchedule(sequenceConfig(), new Date('2026-03-10T01:00:00Z'));

        assert.strictEqual(schedule.length, 3);
        assert.deepStrictEqual(schedule.map(e => e.level), [1, 2, 3]);
        assert.deepStrictEqual(schedule.map(e => e.stakeMultiplier), [1, 2, 4]);
        assert.deepStrictEqual(schedule.map(e => stakeFor(sequenceConfig(), e)), [1, 2, 4]);
    });

    it('should resolve entry and expiries on the same day when still ahead', () => {
        const schedule = buildSchedule(sequenceConfig(), new Date('2026-03-10T01:00:00Z'));

        assert.deepStrictEqual(iso(schedule.map(e => e.dueAt)), [
            '2026-03-10T02:02:00.000Z',
            '2026-03-10T02:03:00.000Z',
            '2026-03-10T02:04:00.000Z'
        ]);
        assert.deepStrictEqual(iso(schedule.map(e => e.expiresAt)), [
            '2026-03-10T02:03:00.000Z',
            '2026-03-10T02:04:00.000Z',
            '2026-03-10T02:05:00.000Z'
        ]);
    });

    it('should roll a passed entry time exactly 24 hours forward', () => {
        const schedule = buildSchedule(sequenceConfig(), new Date('2026-03-10T03:00:00Z'));
        const naive = new Date('2026-03-10T02:02:00Z');

        assert.strictEqual(schedule[0]!.dueAt.getTime() - naive.getTime(), 24 * 60 * 60 * 1000);
        assert.strictEqual(schedule[0]!.expiresAt.toISOString(), '2026-03-11T02:03:00.000Z');
        assert.strictEqual(schedule[2]!.expiresAt.toISOString(), '2026-03-11T02:05:00.000Z');
    });

    it('should roll an entry time equal to now', () => {
        const schedule = buildSchedule(sequenceConfig(), new Date('2026-03-10T02:02:00Z'));

        assert.strictEqual(schedule[0]!.dueAt.toISOString(), '2026-03-11T02:02:00.000Z');
    });

    it('should move expiries past midnight onto the next day', () => {
        const config = sequenceConfig({
            maxLevels: 2,
            entryTimeOfDay: at(23, 59),
            expiryTimesOfDay: [at(0, 0), at(0, 1)]
        });

        const schedule = buildSchedule(config, new Date('2026-03-10T12:00:00Z'));

        assert.strictEqual(schedule[0]!.dueAt.toISOString(), '2026-03-10T23:59:00.000Z');
        assert.deepStrictEqual(iso(schedule.map(e => e.expiresAt)), [
            '2026-03-11T00:00:00.000Z',
            '2026-03-11T00:01:00.000Z'
        ]);
    });

    it('should resolve non-monotonic expiries independently against the entry date', () => {
        const config = sequenceConfig({
            maxLevels: 2,
            entryTimeOfDay: at(10, 0),
            expiryTimesOfDay: [at(10, 5), at(10, 3)]
        });

        const schedule = buildSchedule(config, new Date('2026-03-10T09:00:00Z'));

        assert.deepStrictEqual(iso(schedule.map(e => e.expiresAt)), [
            '2026-03-10T10:05:00.000Z',
            '2026-03-10T10:03:00.000Z'
        ]);
        assert.strictEqual(schedule[1]!.dueAt.toISOString(), '2026-03-10T10:05:00.000Z');
    });

    it('should anchor on the calendar date of the configured timezone', () => {
        const config = sequenceConfig({
            maxLevels: 1,
            entryTimeOfDay: at(23, 0),
            expiryTimesOfDay: [at(23, 1)],
            timezone: 'America/New_York'
        });

        // 22:00 EDT on July 1st, already July 2nd in UTC
        const schedule = buildSchedule(config, new Date('2026-07-02T02:00:00Z'));

        assert.strictEqual(schedule[0]!.dueAt.toISOString(), '2026-07-02T03:00:00.000Z');
        assert.strictEqual(schedule[0]!.expiresAt.toISOString(), '2026-07-02T03:01:00.000Z');
    });

    it('should apply a fractional escalation multiplier', () => {
        const config = sequenceConfig({ baseStake: 2, escalationMultiplier: 1.5 });

        const schedule = buildSchedule(config, new Date('2026-03-10T01:00:00Z'));

        assert.deepStrictEqual(schedule.map(e => e.stakeMultiplier), [1, 1.5, 2.25]);
        assert.deepStrictEqual(schedule.map(e => stakeFor(config, e)), [2, 3, 4.5]);
    });

    it('should freeze schedule entries', () => {
        const schedule = buildSchedule(sequenceConfig(), new Date('2026-03-10T01:00:00Z'));

        assert.ok(Object.isFrozen(schedule[0]));
    });

    it('should reject mismatched expiry list lengths', () => {
        const config = sequenceConfig({ expiryTimesOfDay: [at(2, 3), at(2, 4)] });

        assert.throws(
            () => buildSchedule(config, new Date('2026-03-10T01:00:00Z')),
            (error: unknown) => error instanceof ScheduleError
                && error.issues.length === 1
                && error.issues[0]?.path === 'expiryTimesOfDay'
        );
    });

    it('should reject an unknown timezone', () => {
        const config = sequenceConfig({ timezone: 'Mars/Olympus_Mons' });

        assert.throws(() => buildSchedule(config, new Date('2026-03-10T01:00:00Z')), ScheduleError);
    });
});

describe('scheduleIssues()', () => {
    it('should return no issues for a valid config', () => {
        assert.deepStrictEqual(scheduleIssues(sequenceConfig()), []);
    });

    it('should report every invalid field', () => {
        const issues = scheduleIssues(sequenceConfig({
            baseStake: 0,
            escalationMultiplier: -2,
            entryTimeOfDay: at(25, 0)
        }));

        assert.deepStrictEqual(issues.map(i => i.path), ['baseStake', 'escalationMultiplier', 'entryTimeOfDay']);
    });

    it('should reject poll settings that are not positive and finite', () => {
        const issues = scheduleIssues(sequenceConfig({ outcomePollIntervalS: 0, outcomeTimeoutS: Number.NaN }));

        assert.deepStrictEqual(issues.map(i => i.path), ['outcomePollIntervalS', 'outcomeTimeoutS']);
        assert.deepStrictEqual(
            scheduleIssues(sequenceConfig({ outcomePollIntervalS: -0.5, outcomeTimeoutS: Number.POSITIVE_INFINITY })).map(i => i.path),
            ['outcomePollIntervalS', 'outcomeTimeoutS']
        );
    });

    it('should reject a non-integer level count', () => {
        const issues = scheduleIssues(sequenceConfig({ maxLevels: 2.5 }));

        assert.deepStrictEqual(issues.map(i => i.path), ['maxLevels', 'expiryTimesOfDay']);
    });
});
