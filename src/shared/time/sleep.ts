/**
 * Resolves after `ms` milliseconds, or as soon as `signal` aborts.
 * Never rejects, so callers check `signal.aborted` to tell the two apart.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
