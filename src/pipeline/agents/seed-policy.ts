import { SeedSource } from "../../shared/types/index.js";
import { SeedTransferError, extractErrorMessage, isSeedTransferFailure } from "../../shared/utils/errors.js";



export interface SeedChoice {
    source: SeedSource;
    handle?: string;
}

export interface SeedAttemptState {
    seed: SeedChoice;
    /** Retries already spent on this scene, the static swap included. */
    retries: number;
    /** The continuity seed has been abandoned for the static image. */
    fallbackUsed: boolean;
    attempts: number;
}

export type SeedAction =
    | { type: "retry"; seed: SeedChoice; delayMs: number; reason: "static-fallback" | "same-seed-backoff"; }
    | { type: "fail"; reason: "not-a-seed-error" | "retries-exhausted"; };

export interface SeedPolicyOptions {
    maxSameSeedRetries: number;
    baseDelayMs: number;
}

export const DEFAULT_SEED_POLICY: SeedPolicyOptions = {
    maxSameSeedRetries: 2,
    baseDelayMs: 2000,
};

/**
 * Seed priority: the previous clip's last frame, then the scene's own static image,
 * then none.
 */
export function selectInitialSeed(continuityToken: string | undefined, staticImage: string | undefined): SeedChoice {
    if (continuityToken) return { source: "continuity", handle: continuityToken };
    if (staticImage) return { source: "static", handle: staticImage };
    return { source: "none" };
}

export function initialAttemptState(seed: SeedChoice): SeedAttemptState {
    return { seed, retries: 0, fallbackUsed: false, attempts: 1 };
}

export function isSeedTransferError(error: unknown): boolean {
    return error instanceof SeedTransferError || isSeedTransferFailure(extractErrorMessage(error));
}

/**
 * Decides what follows a failed attempt. Only seed transfer failures are retried, and
 * every retry draws on one budget: a failing continuity seed is swapped once for the
 * static image, anything else is retried on the same seed with exponential backoff.
 */
export function nextSeedAction(
    state: SeedAttemptState,
    error: unknown,
    staticImage: string | undefined,
    options: SeedPolicyOptions = DEFAULT_SEED_POLICY,
): SeedAction {
    if (!isSeedTransferError(error)) {
        return { type: "fail", reason: "not-a-seed-error" };
    }

    if (state.retries >= options.maxSameSeedRetries) {
        return { type: "fail", reason: "retries-exhausted" };
    }

    if (state.seed.source === "continuity" && staticImage && !state.fallbackUsed) {
        return { type: "retry", seed: { source: "static", handle: staticImage }, delayMs: 0, reason: "static-fallback" };
    }

    return {
        type: "retry",
        seed: state.seed,
        delayMs: options.baseDelayMs * 2 ** state.retries,
        reason: "same-seed-backoff",
    };
}

export function applySeedAction(state: SeedAttemptState, action: Extract<SeedAction, { type: "retry"; }>): SeedAttemptState {
    return {
        seed: action.seed,
        retries: state.retries + 1,
        fallbackUsed: state.fallbackUsed || action.reason === "static-fallback",
        attempts: state.attempts + 1,
    };
}
