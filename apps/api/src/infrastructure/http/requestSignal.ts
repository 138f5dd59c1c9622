import { Response } from 'express';

/**
 * Aborts when the client disconnects before the response is written.
 * Call `release` once the handler is done.
 */
export function requestSignal(res: Response): { signal: AbortSignal; release: () => void } {
    const abortController = new AbortController();

    const onClose = () => {
        if (!res.writableFinished && !abortController.signal.aborted) {
            abortController.abort();
        }
    };
    res.on('close', onClose);

    return {
        signal: abortController.signal,
        release: () => res.off('close', onClose),
    };
}
