/**
 * Timeout Utilities
 *
 * Timer handles are always cleared once the race settles, so a finished
 * operation never keeps the event loop alive.
 */

/** Longest delay a Node timer holds; anything larger fires almost at once */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Whether `timeoutMs` can be handed to `setTimeout` as-is: an integer from 1
 * to MAX_TIMER_DELAY_MS.
 */
export function isValidTimeout(timeoutMs: number): boolean {
    return Number.isInteger(timeoutMs) && timeoutMs >= 1 && timeoutMs <= MAX_TIMER_DELAY_MS;
}

/**
 * Resolve to `true` if the promise settles within `timeoutMs`, `false`
 * otherwise. Rejections count as settled.
 */
export async function settlesWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
    const { promise: delayPromise, cancel } = cancellableDelay(timeoutMs);
    let settled = false;

    const watched = promise.then(
        () => {
            settled = true;
        },
        () => {
            settled = true;
        }
    );

    await Promise.race([watched, delayPromise]);
    cancel();
    return settled;
}

/**
 * Create a cancellable delay. Cancelling resolves the promise immediately.
 *
 * @example
 * const { promise, cancel } = cancellableDelay(5000);
 * // Later, if needed:
 * cancel();
 */
export function cancellableDelay(delayMs: number): {
    promise: Promise<void>
    cancel:  () => void
} {
    let timeoutHandle: NodeJS.Timeout | undefined;
    let resolveFn: (() => void) | undefined;

    const promise = new Promise<void>((resolve) => {
        resolveFn = resolve;
        timeoutHandle = setTimeout(() => {
            resolve();
        }, delayMs);
    });

    const cancel = (): void => {
        if(timeoutHandle !== undefined) {
            clearTimeout(timeoutHandle);
        }
        if(resolveFn !== undefined) {
            resolveFn();
        }
    };

    return { promise, cancel };
}
