/**
 * Bounded provider calls: a timeout combined with the caller's AbortSignal.
 */

export type DeadlineReason = 'timeout' | 'aborted'

/**
 * Raised when a call is cut short. The service turns it into a
 * `ProviderUnavailableError`.
 */
export class DeadlineError extends Error {
  readonly reason: DeadlineReason

  constructor(reason: DeadlineReason, timeoutMs: number) {
    super(reason === 'timeout' ? `timed out after ${timeoutMs}ms` : 'request aborted')
    this.name = 'DeadlineError'
    this.reason = reason
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export interface DeadlineOptions {
  timeoutMs: number
  signal?: AbortSignal
}

/**
 * Runs `task` with a signal that aborts on timeout or when `options.signal`
 * aborts, and rejects with {@link DeadlineError} as soon as either happens,
 * even if `task` ignores its signal.
 */
export async function withDeadline<T>(task: (signal: AbortSignal) => Promise<T>, options: DeadlineOptions): Promise<T> {
  const { timeoutMs, signal: outer } = options

  if (outer?.aborted) {
    throw new DeadlineError('aborted', timeoutMs)
  }

  const controller = new AbortController()
  const cutShort = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true })
  })

  const timer = setTimeout(() => controller.abort(new DeadlineError('timeout', timeoutMs)), timeoutMs)
  const onOuterAbort = () => controller.abort(new DeadlineError('aborted', timeoutMs))
  outer?.addEventListener('abort', onOuterAbort, { once: true })

  try {
    return await Promise.race([task(controller.signal), cutShort])
  } finally {
    clearTimeout(timer)
    outer?.removeEventListener('abort', onOuterAbort)
  }
}
