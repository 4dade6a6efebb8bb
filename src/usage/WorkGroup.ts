/**
 * @file Work Group
 *
 * Outstanding-work counter for detached units of work. A unit is
 * registered before it starts and deregistered when it settles; `wait()`
 * resolves once the counter is back at zero.
 *
 * A unit that rejects is recorded, and `wait()` rejects with the first such
 * error after every other unit has settled.
 *
 * @module usage/WorkGroup
 */

export class WorkGroup {
    private outstanding: number = 0;
    private failure: { error: unknown } | null = null;
    private drained: Array<() => void> = [];

    /** Units registered and not yet settled. */
    public get pending(): number {
        return this.outstanding;
    }

    /**
     * Register and start a unit without waiting for it.
     */
    public unit_spawn(unit: () => Promise<void>): void {
        this.outstanding++;
        void Promise.resolve()
            .then(unit)
            .catch((error: unknown): void => {
                if (!this.failure) this.failure = { error };
            })
            .finally((): void => {
                this.unit_done();
            });
    }

    /**
     * Suspend until every spawned unit, including units spawned by other
     * units, has settled.
     */
    public async wait(): Promise<void> {
        if (this.outstanding > 0) {
            await new Promise<void>((resolve: () => void): void => {
                this.drained.push(resolve);
            });
        }
        if (this.failure) {
            throw this.failure.error;
        }
    }

    private unit_done(): void {
        this.outstanding--;
        if (this.outstanding > 0) return;
        const listeners: Array<() => void> = this.drained;
        this.drained = [];
        for (const resolve of listeners) resolve();
    }
}
