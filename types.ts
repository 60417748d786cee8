export interface WaitTimeEntry {
    checkpointName: string;
    minutes: number;
}

/** Entries in page order, unique by checkpoint name. */
export type WaitTimeSnapshot = WaitTimeEntry[];

export type StatusMessage = string;

export interface TwitterCredentials {
    apiKey: string;
    apiSecret: string;
    accessToken: string;
    accessTokenSecret: string;
}

export interface PostResult {
    id: string;
    text: string;
}

export type RunnerState =
    | "idle"
    | "fetching"
    | "parsing"
    | "formatting"
    | "publishing"
    | "sleeping"
    | "stopped";

export type CycleStage = "fetching" | "parsing" | "formatting" | "publishing";

export interface CycleResult {
    iteration: number;
    outcome: "posted" | "skipped" | "failed";
    stage?: CycleStage;
    error?: string;
    postId?: string;
    startedAt: string;
    finishedAt: string;
}
