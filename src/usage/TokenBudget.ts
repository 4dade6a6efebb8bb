/**
 * @file Token Budget
 *
 * Fixed-capacity permit pool limiting how many directory units perform
 * filesystem I/O at once. Waiters are served in arrival order.
 *
 * @module usage/TokenBudget
 */

export class TokenBudget {
    public readonly capacity: number;
    private held: number = 0;
    private peak: number = 0;
    private readonly waiters: Array<() => void> = [];

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Token budget capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
    }

    /** Tokens currently held. */
    public get inFlight(): number {
        return this.held;
    }

    /** Highest number of tokens held at the same time so far. */
    public get peakInFlight(): number {
        return this.peak;
    }

    /**
     * Take one token, suspending until one is free.
     */
    public async token_acquire(): Promise<void> {
        if (this.held < this.capacity) {
            this.token_take();
            return;
        }
        await new Promise<void>((resolve: () => void): void => {
            this.waiters.push(resolve);
        });
    }

    /**
     * Return one token. A queued waiter inherits it directly.
     */
    public token_release(): void {
        if (this.held === 0) {
            throw new Error('Token released without a matching acquire');
        }
        const next: (() => void) | undefined = this.waiters.shift();
        if (next) {
            next();
            return;
        }
        this.held--;
    }

    /**
     * Run `task` while holding a token. The token is returned whether the
     * task resolves or rejects.
     */
    public async token_with<T>(task: () => Promise<T>): Promise<T> {
        await this.token_acquire();
        try {
            return await task();
        } finally {
            this.token_release();
        }
    }

    private token_take(): void {
        this.held++;
        if (this.held > this.peak) this.peak = this.held;
    }
}
