/**
 * Time source and interruptible waits for the sequencer.
 */

import { setTimeout as delay } from 'node:timers/promises';

export interface Clock {
    now(): Date;
    /**
     * Resolve after `ms`. Rejects with the signal's reason when aborted,
     * including when the signal is already aborted on entry.
     */
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
    now(): Date {
        return new Date();
    }

    async sleep(ms: number, signal?: AbortSignal): Promise<void> {
        signal?.throwIfAborted();
        if (ms <= 0) return;
        try {
            await delay(ms, undefined, { signal });
        } catch (error: unknown) {
            // timers/promises rejects with its own AbortError; surface the signal's reason
            if (signal?.aborted) throw signal.reason;
            throw error;
        }
    }
}

/**
 * Suspend until `at` on the given clock. Returns immediately when `at` has passed.
 */
export async function sleepUntil(clock: Clock, at: Date, signal?: AbortSignal): Promise<void> {
    const remainingMs = at.getTime() - clock.now().getTime();
    await clock.sleep(Math.max(0, remainingMs), signal);
}

export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
    if (signal?.aborted && error === signal.reason) return true;
    return error instanceof Error && error.name === 'AbortError';
}

export const systemClock: Clock = new SystemClock();
