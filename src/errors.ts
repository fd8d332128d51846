import type { ZodError } from "zod";

function formatIssues(error: ZodError): string {
    return error.issues
        .map(issue => {
            const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
            return `${path}: ${issue.message}`;
        })
        .join("; ");
}

/**
 * Invalid environment variables or CLI options
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }

    static fromZod(error: ZodError): ConfigError {
        return new ConfigError(`Invalid configuration: ${formatIssues(error)}`);
    }
}

/**
 * Serialized outline that does not match the expected JSON shape
 */
export class OutlineParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "OutlineParseError";
    }

    static fromZod(error: ZodError): OutlineParseError {
        return new OutlineParseError(`Invalid outline JSON: ${formatIssues(error)}`);
    }
}

/**
 * A PDF could not be opened or read
 */
export class DocumentLoadError extends Error {
    public readonly path: string;

    constructor(path: string, message: string, options?: { cause?: unknown }) {
        super(`Failed to load ${path}: ${message}`, options);
        this.name = "DocumentLoadError";
        this.path = path;
    }
}
