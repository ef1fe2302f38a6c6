/**
 * Resolves after `ms`, or early (with false) when the signal aborts.
 * Never rejects.
 */
export type Sleeper = (ms: number, signal: AbortSignal) => Promise<boolean>

export const abortableSleep: Sleeper = (ms, signal) => {
    if (signal.aborted) return Promise.resolve(false)

    return new Promise<boolean>((resolve) => {
        const onAbort = (): void => {
            clearTimeout(timer)
            resolve(false)
        }
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort)
            resolve(true)
        }, Math.max(0, ms))
        signal.addEventListener('abort', onAbort, { once: true })
    })
}

export interface Cancellation {
    signal: AbortSignal
    onCancel: () => Error
}

/**
 * Runs `fn` with an AbortSignal that fires after `ms`, or as soon as
 * `cancel.signal` aborts. If `fn` has not settled by then, the returned
 * promise rejects with `onTimeout()` or `cancel.onCancel()`. An already
 * aborted `cancel.signal` rejects without calling `fn`.
 */
export async function withTimeout<T>(
    ms: number,
    fn: (signal: AbortSignal) => Promise<T>,
    onTimeout: () => Error,
    cancel?: Cancellation
): Promise<T> {
    if (cancel?.signal.aborted) throw cancel.onCancel()

    const ctrl = new AbortController()

    let rejectEarly: (err: Error) => void = () => undefined
    const early = new Promise<never>((_resolve, reject) => {
        rejectEarly = reject
    })
    // settle `early` before aborting: fn may reject as soon as its signal fires
    const fail = (err: Error): void => {
        rejectEarly(err)
        ctrl.abort()
    }

    const timer = setTimeout(() => fail(onTimeout()), Math.max(0, ms))
    const onCancel = (): void => fail(cancel ? cancel.onCancel() : onTimeout())

    cancel?.signal.addEventListener('abort', onCancel, { once: true })

    try {
        return await Promise.race([fn(ctrl.signal), early])
    } finally {
        clearTimeout(timer)
        cancel?.signal.removeEventListener('abort', onCancel)
    }
}
