import * as cheerio from "cheerio";
import { ParseError } from "./errors";
import type { Logger } from "./logger";
import type { WaitTimeSnapshot } from "./types";

// The page marks its checkpoint blocks with "lomestic" (sic); names and times
// live in sibling columns that are paired up by position.
const CHECKPOINT_NAME_SELECTOR = ".lomestic > h2";
const WAIT_TIME_SELECTOR = ".lomestic.float-right > .declasser3 > button > span";

export interface ParseOptions {
    /** Text the section's <h1> must contain, case-insensitive. Default: "domestic" */
    section?: string;
    logger?: Logger;
}

/**
 * Extract checkpoint wait times from the airport's wait-times page.
 *
 * Returns the entries it could read in page order. Missing sections and
 * unreadable values are logged and skipped; this never throws.
 */
export function parseWaitTimes(html: string, options: ParseOptions = {}): WaitTimeSnapshot {
    const { section = "domestic", logger } = options;

    try {
        const $ = cheerio.load(html);

        const heading = $("h1")
            .filter((_idx, el) => $(el).text().toLowerCase().includes(section.toLowerCase()))
            .first();

        if (heading.length === 0) {
            logger?.warn(`Failed to find ${section.toUpperCase()} heading in HTML`);
            return [];
        }

        const container = heading.parent().parent();
        const names = container
            .find(CHECKPOINT_NAME_SELECTOR)
            .map((_idx, el) => $(el).text().trim())
            .get();
        const times = container
            .find(WAIT_TIME_SELECTOR)
            .map((_idx, el) => $(el).text().trim())
            .get();

        if (names.length === 0 || times.length === 0) {
            logger?.warn("No checkpoint or time elements found");
            return [];
        }

        if (names.length !== times.length) {
            logger?.warn(`Mismatch between checkpoint count (${names.length}) and time count (${times.length})`);
        }

        const snapshot: WaitTimeSnapshot = [];
        const seen = new Set<string>();
        const pairs = Math.min(names.length, times.length);

        for (let i = 0; i < pairs; i++) {
            const checkpointName = names[i];
            const rawMinutes = times[i];

            if (!checkpointName) {
                logger?.warn(`Skipping wait time '${rawMinutes}' with no checkpoint name`);
                continue;
            }

            if (!/^\d+$/.test(rawMinutes)) {
                logger?.warn(`Could not convert wait time '${rawMinutes}' to integer for ${checkpointName}`);
                continue;
            }

            if (seen.has(checkpointName)) {
                logger?.warn(`Duplicate checkpoint ${checkpointName}; keeping the first value`);
                continue;
            }

            seen.add(checkpointName);
            snapshot.push({ checkpointName, minutes: parseInt(rawMinutes, 10) });
        }

        logger?.info(`Successfully extracted wait times for ${snapshot.length} checkpoints`);
        return snapshot;
    } catch (error) {
        logger?.error("Error parsing HTML", new ParseError("Unable to parse wait-times page", { cause: error }));
        return [];
    }
}
