export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Capitalise the first letter of every word and lowercase the rest.
 * Any non-letter starts a new word, so "PRE-CHECK" -> "Pre-Check".
 */
export function titleCase(str: string): string {
    return str
        .toLowerCase()
        .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

/**
 * Turn a raw checkpoint heading into a short label.
 * Example: "LOWER NORTH CHECKPOINT PRECHECK ONLY" -> "Lower North (Pre-Check Only)"
 */
export function cleanCheckpointName(name: string): string {
    if (!name) return name;
    const label = name
        .replace(/CHECKPOINT/g, "")
        .replace(/PRECHECK ONLY/g, "(Pre-Check Only)")
        .replace(/\s+/g, " ")
        .trim();
    return titleCase(label);
}
