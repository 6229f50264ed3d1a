/**
 * Interface for loop drivers that run an update callback repeatedly.
 * Drivers own the scheduling; the callback only sees elapsed time.
 */
export interface LoopDriver {
    /** Starts the loop */
    start(): void;
    /** Stops the loop and cancels the next scheduled iteration */
    stop(): void;
    /** Internal loop iteration method */
    loop(): void;
    /** Update callback invoked each iteration with delta time in seconds */
    update(dt: number): void;
}
