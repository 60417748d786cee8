import { format } from "date-fns";
import { parseTweet } from "twitter-text";
import { MAX_POST_LENGTH, DEFAULT_WAIT_TIMES_URL } from "./config";
import { FormatOverflowError } from "./errors";
import type { Logger } from "./logger";
import type { StatusMessage, WaitTimeEntry, WaitTimeSnapshot } from "./types";
import { cleanCheckpointName } from "./utils";

export interface SeverityBand {
    /** Highest minute value in the band, inclusive. */
    maxMinutes: number;
    emoji: string;
    label: "green" | "yellow" | "orange" | "purple" | "red";
}

export const SEVERITY_BANDS: readonly SeverityBand[] = [
    { maxMinutes: 15, emoji: "🟢", label: "green" },
    { maxMinutes: 30, emoji: "🟡", label: "yellow" },
    { maxMinutes: 45, emoji: "🟠", label: "orange" },
    { maxMinutes: 60, emoji: "🟣", label: "purple" },
    { maxMinutes: Infinity, emoji: "🔴", label: "red" },
];

/**
 * Length as the posting platform counts it: most characters outside the
 * Latin ranges (emoji, `…`) weigh 2, and every URL weighs 23.
 */
export function postLength(text: string): number {
    return parseTweet(text).weightedLength;
}

/** Drop trailing characters until the text fits the post limit. */
export function truncateToFit(text: string, maxLength: number): string {
    const chars = Array.from(text);
    while (chars.length > 0 && postLength(chars.join("")) > maxLength) {
        chars.pop();
    }
    return chars.join("");
}

export function getSeverityBand(minutes: number): SeverityBand {
    return SEVERITY_BANDS.find((band) => minutes <= band.maxMinutes) ?? SEVERITY_BANDS[SEVERITY_BANDS.length - 1];
}

export function unavailableMessage(sourceUrl: string = DEFAULT_WAIT_TIMES_URL): StatusMessage {
    return `TSA wait times currently unavailable. Please check ${sourceUrl}`;
}

export interface FormatOptions {
    now?: Date;
    maxLength?: number;
    sourceUrl?: string;
    logger?: Logger;
}

export function formatEntryLine(entry: WaitTimeEntry): string {
    const { emoji } = getSeverityBand(entry.minutes);
    return `${emoji} ${cleanCheckpointName(entry.checkpointName)}: ${entry.minutes} min`;
}

/**
 * Build the status post for a snapshot.
 *
 * Lines keep snapshot order. When they do not all fit, trailing checkpoints
 * are replaced with an "…and N more" line; if not even one fits, or the
 * snapshot is empty, the unavailable message is returned instead.
 */
export function formatStatus(snapshot: WaitTimeSnapshot, options: FormatOptions = {}): StatusMessage {
    const { now = new Date(), maxLength = MAX_POST_LENGTH, sourceUrl = DEFAULT_WAIT_TIMES_URL, logger } = options;

    if (snapshot.length === 0) {
        logger?.warn("No wait times to format");
        return truncateToFit(unavailableMessage(sourceUrl), maxLength);
    }

    const header = `Current TSA wait times (as of ${format(now, "yyyy-MM-dd HH:mm:ss")}):\n\n`;
    const lines = snapshot.map(formatEntryLine);

    try {
        const message = fitLines(header, lines, maxLength);
        logger?.debug(`Formatted status: ${message}`);
        return message;
    } catch (error) {
        if (error instanceof FormatOverflowError) {
            logger?.warn(`${error.message}; posting the unavailable message instead`);
            return truncateToFit(unavailableMessage(sourceUrl), maxLength);
        }
        throw error;
    }
}

function fitLines(header: string, lines: string[], maxLength: number): string {
    const full = header + lines.join("\n");
    if (postLength(full) <= maxLength) {
        return full;
    }

    for (let kept = lines.length - 1; kept >= 1; kept--) {
        const candidate = `${header}${lines.slice(0, kept).join("\n")}\n…and ${lines.length - kept} more`;
        if (postLength(candidate) <= maxLength) {
            return candidate;
        }
    }

    throw new FormatOverflowError(postLength(full), maxLength);
}
