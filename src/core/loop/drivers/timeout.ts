import type { LoopDriver } from "../loop";

/**
 * Default delay between iterations, in milliseconds.
 * 1ms keeps the tick rate high while still yielding to I/O.
 */
const TIMEOUT_DELAY = 1;

/**
 * Loop driver using setTimeout with a fixed delay between iterations.
 *
 * The first iteration runs synchronously inside {@link start}. The delay is
 * measured from the end of one iteration to the start of the next, so a slow
 * update never causes iterations to pile up.
 *
 * Delta time is calculated between iterations and passed to the update callback in seconds.
 *
 * @example
 * ```typescript
 * const driver = new TimeoutDriver(() => {
 *   server.applyChanges();
 * }, 50);
 * driver.start();
 * ```
 */
export class TimeoutDriver implements LoopDriver {
    /**
     * @param update - Callback invoked each iteration with delta time in seconds
     * @param delay - Milliseconds between iterations
     */
    constructor(public update: (dt: number) => void, private delay: number = TIMEOUT_DELAY) { }

    private last = performance.now();
    private running = false;
    private timer: ReturnType<typeof setTimeout> | null = null;

    /**
     * Starts the loop. Resets timing to prevent a large initial delta.
     */
    start() {
        this.running = true;
        this.last = performance.now();
        this.loop();
    }

    /**
     * Stops the loop and clears the pending timeout.
     */
    stop() {
        this.running = false;
        if (this.timer !== null) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    loop = () => {
        if (!this.running) return;

        const now = performance.now();
        const dt = (now - this.last) / 1000;
        this.last = now;

        this.update(dt);
        if (this.running) {
            this.timer = setTimeout(this.loop, this.delay);
        }
    };
}
