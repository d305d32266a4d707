// src/shared/async.ts — Timeouts, cancellation, sleep and per-key serialization

/** Resolves after `ms`, or as soon as `signal` aborts */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const done = (): void => {
      clearTimeout(timer)
      signal?.removeEventListener("abort", done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal?.addEventListener("abort", done, { once: true })
  })
}

export class TimeoutError extends Error {
  readonly name = "TimeoutError"
  readonly timeoutMs: number

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`)
    this.timeoutMs = timeoutMs
  }
}

/** The caller's signal aborted while `label` was in flight */
export class CancelledError extends Error {
  readonly name = "CancelledError"

  constructor(label: string) {
    super(`${label} cancelled by caller`)
  }
}

/**
 * Race `work` against a timer and, when given, the caller's signal. The
 * AbortSignal passed to `work` fires on either so the callee can drop
 * in-flight I/O; the returned promise settles immediately either way.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) throw new CancelledError(label)

  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  let onAbort: (() => void) | undefined
  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new TimeoutError(label, timeoutMs))
    }, timeoutMs)
    if (parent) {
      onAbort = () => {
        controller.abort()
        reject(new CancelledError(label))
      }
      parent.addEventListener("abort", onAbort, { once: true })
    }
  })
  try {
    return await Promise.race([work(controller.signal), guard])
  } finally {
    clearTimeout(timer)
    if (parent && onAbort) parent.removeEventListener("abort", onAbort)
  }
}

/**
 * Per-key async mutex. Critical sections for different keys run in parallel;
 * sections for the same key run one at a time in arrival order.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>()

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve()
    let release: () => void = () => {}
    const current = new Promise<void>(resolve => { release = resolve })
    const tail = prev.then(() => current)
    this.tails.set(key, tail)

    await prev
    try {
      return await fn()
    } finally {
      release()
      if (this.tails.get(key) === tail) this.tails.delete(key)
    }
  }

  /** Number of keys with queued or running sections */
  get size(): number {
    return this.tails.size
  }
}
