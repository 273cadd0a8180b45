import pino from "pino";
import os from "os";
import { AsyncLocalStorage } from "async_hooks";



export interface LogContext {
    jobId: string;
    ownerReference: string;
    correlationId: string;
    scenario?: string;
}

/**
 * Carries the job context of the currently executing pipeline so log lines
 * written anywhere below it are attributed without threading ids through calls.
 */
export const logContextStore = new AsyncLocalStorage<LogContext>();

const isDev = process.env.NODE_ENV !== "production";
const workerId = `${os.hostname()}-${process.pid}`.toLowerCase();

export const logger = pino({
    level: process.env.LOG_LEVEL || "info",
    mixin() {
        const context = logContextStore.getStore();
        return context ? { worker_id: workerId, ...context } : { worker_id: workerId };
    },
    formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
    },
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: isDev && process.env.VITEST === undefined ? {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:standard" }
    } : undefined,
});

export type Logger = pino.Logger;

/**
 * Scoped logger for code that runs outside the context store.
 */
export function createJobLogger(context: LogContext): Logger {
    return logger.child(context);
}

export function withLogContext<T>(context: LogContext, fn: () => Promise<T>): Promise<T> {
    return logContextStore.run(context, fn);
}

export function withScenario<T>(scenario: string, fn: () => Promise<T>): Promise<T> {
    const current = logContextStore.getStore();
    if (!current) return fn();
    return logContextStore.run({ ...current, scenario }, fn);
}
