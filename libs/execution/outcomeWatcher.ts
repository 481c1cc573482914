/**
 * Outcome Watcher
 *
 * Polls the venue for a submitted action's outcome at a fixed interval until
 * it resolves or the window closes. Poll failures count as "still pending".
 * A poll still outstanding when the window closes (or after one interval,
 * when less than that remains) is cut off and ends the watch with TIMEOUT.
 * An abort of the signal rejects with the signal's reason, also mid-poll.
 */

import type { Logger } from 'pino';
import { PollError } from '../errors/sequenceErrors.js';
import { describeError, readErrorCode } from '../errors/sanitizer.js';
import { err, type ActionHandle, type OutcomePoller, type PollOutcome, type Result } from '../venue/types.js';
import type { Clock } from './clock.js';

/** Code of the PollError recorded for a poll cut off by the window. */
export const POLL_DEADLINE_EXCEEDED = 'POLL_DEADLINE_EXCEEDED';

type WatcherLogger = Pick<Logger, 'debug' | 'warn'>;

export interface WatchOptions {
    readonly clock: Clock;
    readonly intervalMs: number;
    readonly timeoutMs: number;
    readonly signal?: AbortSignal;
    readonly logger?: WatcherLogger;
}

export type WatchResult =
    | { readonly status: 'RESOLVED'; readonly outcome: 'WIN' | 'LOSS'; readonly polls: number; readonly resolvedAt: Date }
    | { readonly status: 'TIMEOUT'; readonly polls: number; readonly pollErrors: number; readonly lastError?: PollError };

export async function watchOutcome(
    poller: OutcomePoller,
    handle: ActionHandle,
    options: WatchOptions
): Promise<WatchResult> {
    const { clock, intervalMs, timeoutMs, signal } = options;
    const deadline = clock.now().getTime() + timeoutMs;

    let polls = 0;
    let pollErrors = 0;
    let lastError: PollError | undefined;

    for (;;) {
        signal?.throwIfAborted();

        polls += 1;
        const windowMs = Math.max(deadline - clock.now().getTime(), intervalMs);
        const result = await pollWithin(poller, handle, windowMs, signal);
        if (result.ok) {
            if (result.value !== 'PENDING') {
                return { status: 'RESOLVED', outcome: result.value, polls, resolvedAt: clock.now() };
            }
        } else {
            pollErrors += 1;
            lastError = result.error;
            if (result.error.code === POLL_DEADLINE_EXCEEDED) {
                options.logger?.warn({ handle, polls, pollErrors, windowMs }, 'Outcome poll cut off at the window');
                return { status: 'TIMEOUT', polls, pollErrors, lastError: result.error };
            }
            options.logger?.debug({ handle, code: result.error.code, polls }, 'Outcome poll failed; retrying');
        }

        const remainingMs = deadline - clock.now().getTime();
        if (remainingMs <= 0) {
            options.logger?.warn({ handle, polls, pollErrors }, 'Outcome not resolved within window');
            return lastError === undefined
                ? { status: 'TIMEOUT', polls, pollErrors }
                : { status: 'TIMEOUT', polls, pollErrors, lastError };
        }

        await clock.sleep(Math.min(intervalMs, remainingMs), signal);
    }
}

function pollWithin(
    poller: OutcomePoller,
    handle: ActionHandle,
    windowMs: number,
    signal?: AbortSignal
): Promise<Result<PollOutcome, PollError>> {
    return new Promise((resolve, reject) => {
        const settle = (): void => {
            clearTimeout(timeout);
            signal?.removeEventListener('abort', onAbort);
        };
        const onAbort = (): void => {
            settle();
            reject(signal?.reason);
        };
        const timeout = setTimeout(() => {
            settle();
            resolve(err(new PollError(POLL_DEADLINE_EXCEEDED, `Outcome poll did not return within ${windowMs}ms`)));
        }, windowMs);
        signal?.addEventListener('abort', onAbort, { once: true });

        pollOnce(poller, handle).then(result => {
            settle();
            resolve(result);
        }, (error: unknown) => {
            settle();
            reject(error);
        });
    });
}

async function pollOnce(poller: OutcomePoller, handle: ActionHandle): Promise<Result<PollOutcome, PollError>> {
    try {
        return await poller.poll(handle);
    } catch (error: unknown) {
        return {
            ok: false,
            error: new PollError(readErrorCode(error) ?? 'POLLER_THREW', describeError(error), error)
        };
    }
}
