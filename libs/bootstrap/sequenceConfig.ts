/**
 * Sequence configuration loading.
 *
 * Reads the snake_case config file, validates it, and returns the frozen
 * SequenceConfig the controller is constructed with.
 */

import fs from 'fs';
import { ScheduleError, ValidationError } from '../errors/sequenceErrors.js';
import type { SequenceConfig } from '../execution/types.js';
import { SequenceConfigFileSchema, type SequenceConfigFile } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';

/**
 * @throws ScheduleError when the input is not a valid sequence config
 */
export function parseSequenceConfig(raw: unknown, source = 'SequenceConfig'): SequenceConfig {
    let file: SequenceConfigFile;
    try {
        file = validate(SequenceConfigFileSchema, raw, source);
    } catch (error: unknown) {
        if (error instanceof ValidationError) {
            throw new ScheduleError(`Invalid sequence config (${source})`, error.issues, error);
        }
        throw error;
    }

    return Object.freeze({
        asset: file.asset,
        direction: file.direction,
        baseStake: file.base_stake,
        escalationMultiplier: file.escalation_multiplier,
        maxLevels: file.max_levels,
        entryTimeOfDay: Object.freeze(file.entry_time_of_day),
        expiryTimesOfDay: Object.freeze(file.expiry_times_of_day.map(time => Object.freeze(time))),
        timezone: file.timezone,
        outcomePollIntervalS: file.outcome_poll_interval_s,
        outcomeTimeoutS: file.outcome_timeout_s
    });
}

export function loadSequenceConfig(path: string): SequenceConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(path, 'utf8'));
    } catch (error: unknown) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ScheduleError(`Cannot read sequence config at ${path}: ${reason}`, [], error);
    }
    return parseSequenceConfig(raw, path);
}
