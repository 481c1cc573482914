import { z } from 'zod';
import { isValidTimeZone, parseTimeOfDay } from '../schedule/timeOfDay.js';

/**
 * Schemas for the sequence configuration file.
 */

export const DEFAULT_OUTCOME_POLL_INTERVAL_S = 0.5;
export const DEFAULT_OUTCOME_TIMEOUT_S = 70;

export const TimeOfDaySchema = z.string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM (24h)')
    .transform((value, ctx) => {
        const parsed = parseTimeOfDay(value);
        if (!parsed) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected HH:MM (24h)' });
            return z.NEVER;
        }
        return parsed;
    });

export const DirectionSchema = z.enum(['UP', 'DOWN']);

export const SequenceConfigFileSchema = z.object({
    asset: z.string().min(1).max(64),
    direction: DirectionSchema,
    base_stake: z.number().positive(),
    escalation_multiplier: z.number().positive().default(2),
    max_levels: z.number().int().min(1),
    entry_time_of_day: TimeOfDaySchema,
    expiry_times_of_day: z.array(TimeOfDaySchema).min(1),
    timezone: z.string().min(1).refine(isValidTimeZone, { message: 'Unknown IANA timezone' }),
    outcome_poll_interval_s: z.number().positive().default(DEFAULT_OUTCOME_POLL_INTERVAL_S),
    outcome_timeout_s: z.number().positive().default(DEFAULT_OUTCOME_TIMEOUT_S)
}).strict().superRefine((config, ctx) => {
    if (config.expiry_times_of_day.length !== config.max_levels) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['expiry_times_of_day'],
            message: `Expected ${config.max_levels} expiry times (one per level), got ${config.expiry_times_of_day.length}`
        });
    }
});

export type SequenceConfigFile = z.infer<typeof SequenceConfigFileSchema>;
