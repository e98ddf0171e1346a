// Minimum spacing between outbound AI requests.
// Callers wait for their slot instead of failing.

export class RequestThrottle {
    private lastRequestTime = 0;
    private readonly minIntervalMs: number;

    constructor(minIntervalMs: number = 500) {
        this.minIntervalMs = minIntervalMs;
    }

    async waitForSlot(): Promise<void> {
        const now = Date.now();
        const elapsed = now - this.lastRequestTime;

        if (this.lastRequestTime > 0 && elapsed < this.minIntervalMs) {
            const waitTime = this.minIntervalMs - elapsed;
            // Reserve the slot before sleeping so concurrent callers queue behind it
            this.lastRequestTime = now + waitTime;
            await new Promise((resolve) => setTimeout(resolve, waitTime));
            return;
        }

        this.lastRequestTime = now;
    }
}
