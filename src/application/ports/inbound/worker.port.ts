/**
 * Represents a task that can be scheduled and executed
 */
export interface TaskPort {
    /**
     * The function to execute when the task runs
     */
    execute: () => Promise<void>;

    /**
     * Whether the task should be executed immediately on startup
     * @default false
     */
    executeOnStartup?: boolean;

    /**
     * Pause between the end of one run and the start of the next
     */
    intervalMs: number;

    /**
     * Unique name of the task
     */
    name: string;
}

/**
 * Worker port - defines how background tasks can be scheduled and managed
 */
export interface WorkerPort {
    /**
     * Initialize the worker and start all registered tasks
     */
    initialize(): Promise<void>;

    /**
     * Stop all tasks, waiting for runs in flight to finish
     */
    stop(): Promise<void>;
}
