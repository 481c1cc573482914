import type { GuardRule } from '../config-guard.js';

export const SUPPORTED_VENUE_MODES = ['paper'] as const;

/**
 * Sequence runner environment.
 * The paper venue is the only venue bundled with the runner.
 */
export const RUNNER_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'SEQUENCE_CONFIG_PATH' },
    { type: 'required', name: 'VENUE_MODE' },

    {
        type: 'assert',
        check: env => env.VENUE_MODE === undefined || SUPPORTED_VENUE_MODES.some(mode => mode === env.VENUE_MODE),
        message: `VENUE_MODE must be one of: ${SUPPORTED_VENUE_MODES.join(', ')}`,
    },

    {
        type: 'forbidIf',
        name: 'PaperVenueInProduction',
        when: env => env.NODE_ENV === 'production' && env.VENUE_MODE === 'paper' && env.ALLOW_PAPER_IN_PRODUCTION !== 'true',
        message: 'Paper venue in production requires ALLOW_PAPER_IN_PRODUCTION=true',
    },

    {
        type: 'assert',
        check: env => env.PAPER_VENUE_OUTCOMES === undefined || /^\s*(WIN|LOSS)(\s*,\s*(WIN|LOSS))*\s*$/i.test(env.PAPER_VENUE_OUTCOMES),
        message: 'PAPER_VENUE_OUTCOMES must be a comma separated list of WIN and LOSS',
    }
];
