import { TaskPool } from "../../shared/services/task-pool.js";
import { extractErrorMessage } from "../../shared/utils/errors.js";
import { logger } from "../../shared/logger.js";



export interface FanOutTask<T> {
    /** Label used in logs and outcomes, e.g. the scenario. */
    key: string;
    run: () => Promise<T>;
}

export type FanOutOutcome<T> =
    | {
        key: string;
        index: number;
        status: "succeeded";
        result: T;
        handle?: string;
        registerError?: string;
    }
    | {
        key: string;
        index: number;
        status: "failed";
        error: string;
        cause: unknown;
    };

export interface FanOutOptions<T> {
    /** Uploads a produced asset and returns a reusable handle. */
    register?: (result: T, key: string) => Promise<string>;
    onSettled?: (outcome: FanOutOutcome<T>) => void;
}

export const DEFAULT_FAN_OUT_CONCURRENCY = 4;

/**
 * Runs independent generation tasks with bounded concurrency. Outcomes are returned
 * aligned by index to the input regardless of completion order; a failing task never
 * aborts its siblings, and a minimum-success threshold is left to the caller.
 */
export class ParallelFanOutGenerator {

    constructor(private concurrency: number = DEFAULT_FAN_OUT_CONCURRENCY) {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`Fan-out concurrency must be a positive integer, got ${concurrency}`);
        }
    }

    async generate<T>(tasks: readonly FanOutTask<T>[], options: FanOutOptions<T> = {}): Promise<FanOutOutcome<T>[]> {
        if (tasks.length === 0) return [];

        const pool = new TaskPool(Math.min(tasks.length, this.concurrency));
        logger.info({ tasks: tasks.length, concurrency: Math.min(tasks.length, this.concurrency) }, "Fan-out started");

        const outcomes = await Promise.all(tasks.map((task, index) =>
            pool.run(() => this.runOne(task, index, options))));

        const failed = outcomes.filter(o => o.status === "failed").length;
        logger.info({ succeeded: outcomes.length - failed, failed }, "Fan-out finished");
        return outcomes;
    }

    private async runOne<T>(task: FanOutTask<T>, index: number, options: FanOutOptions<T>): Promise<FanOutOutcome<T>> {
        let outcome: FanOutOutcome<T>;
        try {
            const result = await task.run();
            outcome = { key: task.key, index, status: "succeeded", result };

            if (options.register) {
                try {
                    const handle = await options.register(result, task.key);
                    outcome = { ...outcome, handle };
                } catch (error) {
                    logger.warn({ key: task.key, error: extractErrorMessage(error) }, "Result produced but could not be registered as a reference");
                    outcome = { ...outcome, registerError: extractErrorMessage(error) };
                }
            }
        } catch (error) {
            logger.error({ key: task.key, error: extractErrorMessage(error) }, "Fan-out task failed");
            outcome = { key: task.key, index, status: "failed", error: extractErrorMessage(error), cause: error };
        }

        try {
            options.onSettled?.(outcome);
        } catch (error) {
            logger.warn({ key: task.key, error: extractErrorMessage(error) }, "onSettled callback threw");
        }
        return outcome;
    }
}
