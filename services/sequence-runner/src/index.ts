#!/usr/bin/env node
import { logger } from "../../../libs/logging/logger.js";
import { ConfigGuard } from "../../../libs/bootstrap/config-guard.js";
import { RUNNER_CONFIG_GUARDS } from "../../../libs/bootstrap/config/runner-config.js";
import { loadSequenceConfig } from "../../../libs/bootstrap/sequenceConfig.js";
import { ErrorSanitizer } from "../../../libs/errors/sanitizer.js";
import { SequenceController, type FinalOutcome } from "../../../libs/execution/index.js";
import { PaperVenue, parseOutcomeScript } from "../../../libs/venue/paperVenue.js";

const EXIT_CODES: Record<FinalOutcome, number> = {
    WIN: 0,
    LOSS: 2,
    ABORTED: 3
};

async function main(): Promise<number> {
    ConfigGuard.enforce(RUNNER_CONFIG_GUARDS);

    const configPath = process.env.SEQUENCE_CONFIG_PATH ?? "";
    const config = loadSequenceConfig(configPath);

    const venue = new PaperVenue({ script: parseOutcomeScript(process.env.PAPER_VENUE_OUTCOMES) });
    const controller = new SequenceController(config, venue, venue);

    const abort = new AbortController();
    const stop = (signal: NodeJS.Signals) => {
        logger.warn({ signal, sequenceId: controller.sequenceId }, "Stop requested; cancelling sequence");
        abort.abort(new Error(`Received ${signal}`));
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    logger.info({ sequenceId: controller.sequenceId, configPath, venueMode: process.env.VENUE_MODE }, "Sequence runner initialized");

    try {
        const result = await controller.run(abort.signal);
        logger.info({
            sequenceId: result.sequenceId,
            levelsAttempted: result.levelsAttempted,
            terminalReason: result.terminalReason,
            finalOutcome: result.finalOutcome,
            incidentId: result.error?.incidentId
        }, "Sequence runner finished");
        return EXIT_CODES[result.finalOutcome];
    } finally {
        process.off("SIGINT", stop);
        process.off("SIGTERM", stop);
    }
}

main().then(code => {
    process.exitCode = code;
}).catch(err => {
    const sanitized = ErrorSanitizer.sanitize(err, "SequenceRunner");
    logger.fatal({ incidentId: sanitized.incidentId }, sanitized.publicMessage);
    process.exit(1);
});
