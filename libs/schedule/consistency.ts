import type { ScheduleEntry } from './types.js';

export interface ScheduleWarning {
    readonly level: number;
    readonly code: 'EXPIRY_NOT_AFTER_ENTRY' | 'EXPIRY_GAP_MISMATCH';
    readonly message: string;
}

const MINUTE_MS = 60_000;

/**
 * Informational checks on a computed schedule.
 *
 * Levels chain off the previous expiry, so a level whose expiry does not fall
 * after its projected entry, or whose gap differs from the action duration,
 * will behave differently from what the times of day suggest.
 */
export function checkScheduleConsistency(schedule: readonly ScheduleEntry[], durationMinutes: number): ScheduleWarning[] {
    const warnings: ScheduleWarning[] = [];
    const expectedGapMs = durationMinutes * MINUTE_MS;

    for (const entry of schedule) {
        const gapMs = entry.expiresAt.getTime() - entry.dueAt.getTime();
        if (gapMs <= 0) {
            warnings.push({
                level: entry.level,
                code: 'EXPIRY_NOT_AFTER_ENTRY',
                message: `level ${entry.level} expires at ${entry.expiresAt.toISOString()}, not after its entry at ${entry.dueAt.toISOString()}`
            });
        } else if (gapMs !== expectedGapMs) {
            warnings.push({
                level: entry.level,
                code: 'EXPIRY_GAP_MISMATCH',
                message: `level ${entry.level} spans ${gapMs / MINUTE_MS} min, action duration is ${durationMinutes} min`
            });
        }
    }

    return warnings;
}
