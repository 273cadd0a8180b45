export interface TaskPoolMetrics {
    running: number;
    waiting: number;
    completed: number;
    failed: number;
}

interface QueuedTask {
    start: () => void;
}

/**
 * FIFO pool that runs at most `concurrency` tasks at once; excess tasks wait their turn.
 * A concurrency of 0 means no limit.
 */
export class TaskPool {
    private queue: QueuedTask[] = [];
    private metrics: TaskPoolMetrics = { running: 0, waiting: 0, completed: 0, failed: 0 };

    constructor(private concurrency: number) {
        if (!Number.isInteger(concurrency) || concurrency < 0) {
            throw new RangeError(`concurrency must be a non-negative integer, got ${concurrency}`);
        }
    }

    run<T>(task: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            const start = () => {
                this.metrics.running++;
                void Promise.resolve()
                    .then(task)
                    .then(
                        (value) => {
                            this.metrics.completed++;
                            resolve(value);
                        },
                        (error: unknown) => {
                            this.metrics.failed++;
                            reject(error);
                        })
                    .finally(() => {
                        this.metrics.running--;
                        this.next();
                    });
            };

            if (this.hasCapacity()) {
                start();
            } else {
                this.queue.push({ start });
                this.metrics.waiting = this.queue.length;
            }
        });
    }

    getMetrics(): TaskPoolMetrics {
        return { ...this.metrics };
    }

    private hasCapacity(): boolean {
        return this.concurrency === 0 || this.metrics.running < this.concurrency;
    }

    private next(): void {
        while (this.queue.length > 0 && this.hasCapacity()) {
            const queued = this.queue.shift();
            queued?.start();
        }
        this.metrics.waiting = this.queue.length;
    }
}
