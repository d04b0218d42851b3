import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { type MockProxy, mock } from 'vitest-mock-extended';

import { type TaskPort } from '../../../../application/ports/inbound/worker.port.js';

import { type LoggerPort } from '../../../../shared/logger/logger.port.js';
import { IntervalWorker } from '../interval.worker.js';

describe('IntervalWorker', () => {
    let mockLogger: MockProxy<LoggerPort>;
    let worker: IntervalWorker | undefined;

    const createTask = (overrides: Partial<Omit<TaskPort, 'execute'>> = {}) => ({
        execute: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
        executeOnStartup: true,
        intervalMs: 5,
        name: 'test-task',
        ...overrides,
    });

    beforeEach(() => {
        mockLogger = mock<LoggerPort>();
    });

    afterEach(async () => {
        await worker?.stop();
        worker = undefined;
    });

    test('should run the task on startup and keep repeating it', async () => {
        // Given - a task with a short interval
        const task = createTask();
        worker = new IntervalWorker(mockLogger, [task]);

        // When - starting the worker
        await worker.initialize();

        // Then - the task runs again and again
        await vi.waitFor(() => expect(task.execute.mock.calls.length).toBeGreaterThanOrEqual(3));
    });

    test('should keep looping after a failed run', async () => {
        // Given - a task whose first run fails
        const failure = new Error('fetch failed');
        const task = createTask();
        task.execute.mockRejectedValueOnce(failure);
        worker = new IntervalWorker(mockLogger, [task]);

        // When - starting the worker
        await worker.initialize();

        // Then - the failure is logged and the next run still happens
        await vi.waitFor(() => expect(task.execute.mock.calls.length).toBeGreaterThanOrEqual(2));
        expect(mockLogger.error).toHaveBeenCalledWith('Task execution error', {
            error: failure,
            task: 'test-task',
        });
    });

    test('should interrupt the sleep when stopped', async () => {
        // Given - a task that would next run in a minute
        const task = createTask({ intervalMs: 60_000 });
        worker = new IntervalWorker(mockLogger, [task]);
        await worker.initialize();
        await vi.waitFor(() => expect(task.execute).toHaveBeenCalledTimes(1));

        // When - stopping the worker
        const startedAt = Date.now();
        await worker.stop();

        // Then - it returns right away without another run
        expect(Date.now() - startedAt).toBeLessThan(1_000);
        expect(task.execute).toHaveBeenCalledTimes(1);
    });

    test('should wait for the run in flight before stopping', async () => {
        // Given - a run that is still in progress
        let finishRun: () => void = () => undefined;
        const task = createTask({ intervalMs: 60_000 });
        task.execute.mockImplementationOnce(
            () =>
                new Promise<void>((resolve) => {
                    finishRun = resolve;
                }),
        );
        worker = new IntervalWorker(mockLogger, [task]);
        await worker.initialize();
        await vi.waitFor(() => expect(task.execute).toHaveBeenCalledTimes(1));

        // When - stopping while the run is in flight
        let stopped = false;
        const stopping = worker.stop().then(() => {
            stopped = true;
        });
        await new Promise((resolve) => setTimeout(resolve, 10));

        // Then - stop only resolves once the run finished
        expect(stopped).toBe(false);
        finishRun();
        await stopping;
        expect(stopped).toBe(true);
    });

    test('should wait one interval before the first run when not executed on startup', async () => {
        // Given - a task not meant to run on startup
        const task = createTask({ executeOnStartup: false, intervalMs: 60_000 });
        worker = new IntervalWorker(mockLogger, [task]);

        // When - starting and stopping right away
        await worker.initialize();
        await worker.stop();

        // Then - the task never ran
        expect(task.execute).not.toHaveBeenCalled();
    });

    test('should refuse to start twice', async () => {
        worker = new IntervalWorker(mockLogger, [createTask({ intervalMs: 60_000 })]);
        await worker.initialize();

        await expect(worker.initialize()).rejects.toThrow('Worker is already running');
    });
});
