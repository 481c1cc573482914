/**
 * Wall-clock time of day, interpreted in the sequence's timezone.
 */
export interface TimeOfDay {
    readonly hour: number;
    readonly minute: number;
}

/**
 * One level of a computed schedule.
 */
export interface ScheduleEntry {
    /** Level number (1, 2, 3...) */
    readonly level: number;
    /** Projected entry: sequence entry for level 1, previous expiry otherwise */
    readonly dueAt: Date;
    /** Configured expiry of this level, resolved against the entry date */
    readonly expiresAt: Date;
    /** escalationMultiplier^(level - 1) */
    readonly stakeMultiplier: number;
}
