/**
 * Arms a bounded reaction window for a participant after one of its results is accepted.
 * What happens when the window elapses is up to the implementation.
 */
export interface TimeoutPolicy {
    arm(identity: string, windowMs: number): void;
}

/**
 * Longest delay a Node timer honours. Longer delays fire after 1 ms.
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type ArmedWindow = {
    identity: string;
    expiresAt: number;
};

/**
 * Timer-backed policy: one timer per identity, re-arming replaces the previous one.
 */
export class TimerTimeoutPolicy implements TimeoutPolicy {
    private readonly timers = new Map<string, { handle: NodeJS.Timeout; expiresAt: number }>();

    constructor(private readonly onExpire: (identity: string) => void) {}

    /**
     * @throws RangeError if the window is longer than {@link MAX_TIMER_DELAY_MS}.
     */
    arm(identity: string, windowMs: number): void {
        if (windowMs > MAX_TIMER_DELAY_MS) {
            throw new RangeError(`reaction window of ${windowMs} ms exceeds ${MAX_TIMER_DELAY_MS} ms`);
        }
        this.cancel(identity);
        const handle = setTimeout(() => {
            this.timers.delete(identity);
            this.onExpire(identity);
        }, windowMs);
        // An open window must not keep the process alive on shutdown.
        handle.unref();
        this.timers.set(identity, { handle, expiresAt: Date.now() + windowMs });
    }

    cancel(identity: string): void {
        const timer = this.timers.get(identity);
        if (!timer) return;
        clearTimeout(timer.handle);
        this.timers.delete(identity);
    }

    /**
     * Windows that are still open, in the order they were armed.
     */
    armed(): ArmedWindow[] {
        return Array.from(this.timers, ([identity, { expiresAt }]) => ({ identity, expiresAt }));
    }

    dispose(): void {
        for (const { handle } of this.timers.values()) clearTimeout(handle);
        this.timers.clear();
    }
}
