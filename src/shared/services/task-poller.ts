import { GenerationClient, TaskPoll } from "../types/index.js";
import { ExternalServiceError, GenerationTimeoutError, SeedTransferError, isSeedTransferFailure } from "../utils/errors.js";
import { sleep } from "../utils/utils.js";
import { logger } from "../logger.js";



export interface PollOptions {
    intervalMs: number;
    timeoutMs: number;
    label?: string;
    onProgress?: (poll: TaskPoll) => void;
}

/**
 * Polls a provider task until it settles. Resolves with the result URI of a `done`
 * task; a provider error is classified into a seed transfer or external service error.
 */
export async function waitForTask(client: GenerationClient, taskId: string, options: PollOptions): Promise<string> {
    const { intervalMs, timeoutMs, label = "task", onProgress } = options;
    const startTime = Date.now();

    let poll = await client.poll(taskId);
    while (poll.status === "queued" || poll.status === "running") {
        onProgress?.(poll);
        if (Date.now() - startTime > timeoutMs) {
            throw new GenerationTimeoutError(`${label} timed out after ${Math.round(timeoutMs / 1000)}s`, { taskId, lastStatus: poll.status });
        }

        logger.debug({ taskId, status: poll.status }, `... waiting ${intervalMs / 1000}s for ${label} to complete`);
        await sleep(intervalMs);
        poll = await client.poll(taskId);
    }

    if (poll.status === "error") {
        const message = poll.error || `${label} failed without a reason`;
        if (isSeedTransferFailure(message)) {
            throw new SeedTransferError(message, { taskId });
        }
        throw new ExternalServiceError(message, { taskId });
    }

    if (!poll.resultUri) {
        throw new ExternalServiceError(`${label} completed but returned no result`, { taskId });
    }
    return poll.resultUri;
}
