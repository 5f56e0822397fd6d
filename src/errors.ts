export class RunInProgressError extends Error {
    readonly owner: string;
    readonly since: string;

    constructor(owner: string, since: string) {
        super(`Pipeline run already in progress (started by ${owner} at ${since})`);
        this.name = 'RunInProgressError';
        this.owner = owner;
        this.since = since;
    }
}

/** A run-level failure: the run is recorded as failed and nothing is marked complete. */
export class PipelineError extends Error {
    readonly stage: string;

    constructor(stage: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PipelineError';
        this.stage = stage;
    }
}

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}
