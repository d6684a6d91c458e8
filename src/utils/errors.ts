/**
 * Error types that stop the probe run before (or instead of) talking to Portainer.
 */

/** Base class for unmet preconditions. Anything else is reported, not fatal. */
export abstract class FatalProbeError extends Error {
    readonly exitCode = 2;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** A required input is missing or invalid. */
export class ConfigError extends FatalProbeError {}

/** An external command the run depends on is not installed. */
export class MissingDependencyError extends FatalProbeError {
    constructor(readonly command: string) {
        super(`Missing required command: ${command}`);
    }
}
