import { logger } from "../../shared/logger.js";



/**
 * In-process keyed mutex. Callers on the same key run one after another in arrival
 * order; different keys never wait on each other.
 */
export class LockManager {
    private tails: Map<string, Promise<void>> = new Map();
    private holders: Map<string, number> = new Map();

    async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => { };
        const current = new Promise<void>(resolve => { release = resolve; });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);
        this.holders.set(key, (this.holders.get(key) ?? 0) + 1);

        if (this.holders.get(key) !== 1) {
            logger.debug({ key }, "[LockManager] Waiting for lock");
        }

        await previous;
        try {
            return await fn();
        } finally {
            release();
            const remaining = (this.holders.get(key) ?? 1) - 1;
            if (remaining === 0) {
                this.holders.delete(key);
                if (this.tails.get(key) === tail) this.tails.delete(key);
            } else {
                this.holders.set(key, remaining);
            }
        }
    }
}
