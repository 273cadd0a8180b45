export const ERROR_CODES = [
    "INVALID_INPUT",
    "NOT_FOUND",
    "SEED_TRANSFER",
    "GENERATION_TIMEOUT",
    "EXTERNAL_SERVICE",
    "ASSEMBLY",
] as const;
export type ErrorCode = (typeof ERROR_CODES)[ number ];

export class PipelineError extends Error {
    readonly code: ErrorCode;
    readonly retryable: boolean;
    readonly details?: Record<string, unknown>;

    constructor(code: ErrorCode, message: string, options: { retryable?: boolean; details?: Record<string, unknown>; cause?: unknown; } = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = "PipelineError";
        this.code = code;
        this.retryable = options.retryable ?? false;
        this.details = options.details;
    }
}

/** Caller error; never retried. */
export class InvalidInputError extends PipelineError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("INVALID_INPUT", message, { details });
        this.name = "InvalidInputError";
    }
}

export class NotFoundError extends PipelineError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("NOT_FOUND", message, { details });
        this.name = "NotFoundError";
    }
}

/**
 * The provider could not fetch the seed image attached to a request.
 * Triggers the seed fallback policy.
 */
export class SeedTransferError extends PipelineError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("SEED_TRANSFER", message, { retryable: true, details });
        this.name = "SeedTransferError";
    }
}

export class GenerationTimeoutError extends PipelineError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("GENERATION_TIMEOUT", message, { details });
        this.name = "GenerationTimeoutError";
    }
}

export class ExternalServiceError extends PipelineError {
    constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
        super("EXTERNAL_SERVICE", message, { details, cause });
        this.name = "ExternalServiceError";
    }
}

export class AssemblyError extends PipelineError {
    constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
        super("ASSEMBLY", message, { details, cause });
        this.name = "AssemblyError";
    }
}

const SEED_TRANSFER_MARKERS = [ "failedtotransferimage", "failed to transfer image", "seed image" ];

export function isSeedTransferFailure(message: string): boolean {
    const normalized = message.toLowerCase();
    return SEED_TRANSFER_MARKERS.some(marker => normalized.includes(marker));
}

export function extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message || error.toString();
    }

    if (error && typeof error === "object") {
        if ("message" in error && typeof error.message === "string") {
            return error.message;
        }

        try {
            return JSON.stringify(error);
        } catch {
            return String(error);
        }
    }

    return String(error);
}

/**
 * Extract structured error details for logging.
 */
export function extractErrorDetails(error: unknown): Record<string, unknown> | undefined {
    if (!error || typeof error !== "object") {
        return undefined;
    }

    const details: Record<string, unknown> = {};

    if (error instanceof Error) {
        details.name = error.name;
        details.message = error.message;
        if (error.stack) details.stack = error.stack;
    }

    if (error instanceof PipelineError) {
        details.code = error.code;
        details.retryable = error.retryable;
        if (error.details) details.details = error.details;
    } else {
        if ("code" in error) details.code = error.code;
        if ("statusCode" in error) details.statusCode = error.statusCode;
    }

    return Object.keys(details).length > 0 ? details : undefined;
}
