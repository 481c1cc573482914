/**
 * Unit Tests: Outcome Watcher
 *
 * @see libs/execution/outcomeWatcher.ts
 */

import { describe, it, beforeEach, mock } from 'node:test';
import * as assert from 'node:assert';
import { POLL_DEADLINE_EXCEEDED, watchOutcome } from '../../libs/execution/outcomeWatcher.js';
import { PollError } from '../../libs/errors/sequenceErrors.js';
import { err, ok, type OutcomePoller, type PollOutcome, type Result } from '../../libs/venue/types.js';
import { FakeClock } from '../helpers/fakeClock.js';

type PollResult = Result<PollOutcome, PollError>;

function scriptedPoller(script: Array<PollResult | Error>) {
    const poll = mock.fn(async (_handle: string): Promise<PollResult> => {
        const next = script.length > 1 ? script.shift() : script[0];
        if (next === undefined) return ok<PollOutcome>('PENDING');
        if (next instanceof Error) throw next;
        return next;
    });
    const poller: OutcomePoller = { poll };
    return { poller, poll };
}

describe('watchOutcome()', () => {
    let clock: FakeClock;

    beforeEach(() => {
        clock = new FakeClock('2026-03-10T02:02:00Z');
    });

    it('should poll at the interval until the outcome resolves', async () => {
        const { poller, poll } = scriptedPoller([ok<PollOutcome>('PENDING'), ok<PollOutcome>('PENDING'), ok<PollOutcome>('WIN')]);

        const result = await watchOutcome(poller, 'action-1', { clock, intervalMs: 500, timeoutMs: 70_000 });

        assert.deepStrictEqual(result, {
            status: 'RESOLVED',
            outcome: 'WIN',
            polls: 3,
            resolvedAt: new Date('2026-03-10T02:02:01Z')
        });
        assert.deepStrictEqual(clock.sleeps, [500, 500]);
        assert.strictEqual(poll.mock.calls[0]?.arguments[0], 'action-1');
    });

    it('should time out with a final poll at the deadline', async () => {
        const { poller } = scriptedPoller([ok<PollOutcome>('PENDING')]);

        const result = await watchOutcome(poller, 'action-1', { clock, intervalMs: 500, timeoutMs: 1_200 });

        assert.deepStrictEqual(result, { status: 'TIMEOUT', polls: 4, pollErrors: 0 });
        assert.deepStrictEqual(clock.sleeps, [500, 500, 200]);
    });

    it('should absorb poll errors and thrown errors', async () => {
        const { poller } = scriptedPoller([
            err(new PollError('ECONNRESET', 'reset')),
            new Error('socket hang up'),
            ok<PollOutcome>('LOSS')
        ]);

        const result = await watchOutcome(poller, 'action-1', { clock, intervalMs: 500, timeoutMs: 70_000 });

        assert.strictEqual(result.status, 'RESOLVED');
        if (result.status !== 'RESOLVED') return;
        assert.strictEqual(result.outcome, 'LOSS');
        assert.strictEqual(result.polls, 3);
    });

    it('should report the last poll error on timeout', async () => {
        const { poller } = scriptedPoller([err(new PollError('ECONNRESET', 'reset'))]);

        const result = await watchOutcome(poller, 'action-1', { clock, intervalMs: 500, timeoutMs: 1_000 });

        assert.strictEqual(result.status, 'TIMEOUT');
        if (result.status !== 'TIMEOUT') return;
        assert.strictEqual(result.polls, 3);
        assert.strictEqual(result.pollErrors, 3);
        assert.strictEqual(result.lastError?.code, 'ECONNRESET');
    });

    it('should wrap a thrown error as POLLER_THREW', async () => {
        const { poller } = scriptedPoller([new Error('boom')]);

        const result = await watchOutcome(poller, 'action-1', { clock, intervalMs: 500, timeoutMs: 500 });

        assert.strictEqual(result.status, 'TIMEOUT');
        if (result.status !== 'TIMEOUT') return;
        assert.strictEqual(result.lastError?.code, 'POLLER_THREW');
        assert.strictEqual(result.lastError?.message, 'boom');
    });

    it('should reject with the abort reason when cancelled between polls', async () => {
        const { poller, poll } = scriptedPoller([ok<PollOutcome>('PENDING')]);
        const abort = new AbortController();
        const reason = new Error('stop requested');
        clock.onSleep = () => abort.abort(reason);

        await assert.rejects(
            watchOutcome(poller, 'action-1', { clock, intervalMs: 500, timeoutMs: 70_000, signal: abort.signal }),
            (error: unknown) => error === reason
        );
        assert.strictEqual(poll.mock.calls.length, 1);
    });

    it('should cut off a poll that never returns when the window closes', async () => {
        const poll = mock.fn((_handle: string) => new Promise<PollResult>(() => {}));

        const result = await watchOutcome({ poll }, 'action-1', { clock, intervalMs: 10, timeoutMs: 30 });

        assert.strictEqual(result.status, 'TIMEOUT');
        if (result.status !== 'TIMEOUT') return;
        assert.strictEqual(result.polls, 1);
        assert.strictEqual(result.pollErrors, 1);
        assert.strictEqual(result.lastError?.code, POLL_DEADLINE_EXCEEDED);
        assert.deepStrictEqual(clock.sleeps, []);
    });

    it('should reject with the abort reason while a poll is outstanding', async () => {
        const abort = new AbortController();
        const reason = new Error('stop requested');
        const poll = mock.fn((_handle: string) => {
            abort.abort(reason);
            return new Promise<PollResult>(() => {});
        });

        await assert.rejects(
            watchOutcome({ poll }, 'action-1', { clock, intervalMs: 500, timeoutMs: 70_000, signal: abort.signal }),
            (error: unknown) => error === reason
        );
        assert.strictEqual(poll.mock.calls.length, 1);
    });
});
