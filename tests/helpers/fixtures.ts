import type { SequenceConfig } from '../../libs/execution/types.js';
import type { TimeOfDay } from '../../libs/schedule/types.js';

export const at = (hour: number, minute: number): TimeOfDay => ({ hour, minute });

export function sequenceConfig(overrides: Partial<SequenceConfig> = {}): SequenceConfig {
    return {
        asset: 'EURUSD',
        direction: 'UP',
        baseStake: 1,
        escalationMultiplier: 2,
        maxLevels: 3,
        entryTimeOfDay: at(2, 2),
        expiryTimesOfDay: [at(2, 3), at(2, 4), at(2, 5)],
        timezone: 'UTC',
        outcomePollIntervalS: 0.5,
        outcomeTimeoutS: 70,
        ...overrides
    };
}
