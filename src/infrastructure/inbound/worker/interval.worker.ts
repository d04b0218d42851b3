import { type TaskPort, type WorkerPort } from '../../../application/ports/inbound/worker.port.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';
import { sleep } from '../../../shared/time/sleep.js';

/**
 * Runs each task in its own sequential loop: run, sleep, repeat.
 * A run never overlaps the previous one.
 */
export class IntervalWorker implements WorkerPort {
    private controller: AbortController | null = null;
    private readonly loops: Promise<void>[] = [];

    constructor(
        private readonly logger: LoggerPort,
        private readonly tasks: TaskPort[],
    ) {}

    async initialize(): Promise<void> {
        if (this.controller) {
            throw new Error('Worker is already running');
        }

        this.logger.debug('Starting worker', { tasks: this.tasks.length });

        const controller = new AbortController();
        this.controller = controller;

        for (const task of this.tasks) {
            this.logger.debug('Scheduling task', { intervalMs: task.intervalMs, task: task.name });
            this.loops.push(this.runLoop(task, controller.signal));
        }

        this.logger.debug('Worker initialization complete');
    }

    async stop(): Promise<void> {
        this.logger.info('Stopping worker', { runningTasks: this.loops.length });

        this.controller?.abort();
        await Promise.all(this.loops);

        this.loops.length = 0;
        this.controller = null;
        this.logger.info('Worker has stopped');
    }

    /**
     * Executes a task and logs the outcome. Never rejects.
     */
    private async executeSafely(task: TaskPort): Promise<void> {
        const start = Date.now();
        this.logger.debug('Task started', { task: task.name });

        try {
            await task.execute();
            this.logger.info('Task completed successfully', {
                durationMs: Date.now() - start,
                task: task.name,
            });
        } catch (error) {
            this.logger.error('Task execution error', { error, task: task.name });
        }
    }

    private async runLoop(task: TaskPort, signal: AbortSignal): Promise<void> {
        if (!task.executeOnStartup) {
            await sleep(task.intervalMs, signal);
        }

        while (!signal.aborted) {
            await this.executeSafely(task);
            await sleep(task.intervalMs, signal);
        }

        this.logger.debug('Task loop ended', { task: task.name });
    }
}
