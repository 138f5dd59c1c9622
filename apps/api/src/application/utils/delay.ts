export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Timer-based wait that rejects with the signal's reason as soon as it aborts.
 */
export const delay: DelayFn = (ms, signal) => {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(signal?.reason);
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
};
