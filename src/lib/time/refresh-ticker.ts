export type TickHandler = (signal: AbortSignal) => Promise<void> | void;

/**
 * Fixed-interval timer for periodic refresh. A tick that is still running
 * when the next one is due causes that next one to be skipped. `stop()` aborts the
 * signal handed to the running tick.
 */
export class RefreshTicker {
    private timer: ReturnType<typeof setInterval> | null = null;
    private controller: AbortController | null = null;
    private ticking = false;

    constructor(
        private readonly intervalMs: number,
        private readonly onTick: TickHandler
    ) {}

    get running(): boolean {
        return this.timer !== null;
    }

    start(): void {
        if (this.timer) return;
        const controller = new AbortController();
        this.controller = controller;
        this.timer = setInterval(() => {
            void this.tick(controller.signal);
        }, this.intervalMs);
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        this.controller?.abort();
        this.controller = null;
    }

    private async tick(signal: AbortSignal): Promise<void> {
        if (this.ticking || signal.aborted) return;
        this.ticking = true;
        try {
            await this.onTick(signal);
        } catch (error) {
            console.error("[RefreshTicker] Tick failed:", error);
        } finally {
            this.ticking = false;
        }
    }
}
