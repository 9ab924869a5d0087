/**
 * A notification queue with capacity 1. Raising the signal while one is already pending
 * coalesces into the pending one, so a consumer never falls more than one write behind.
 *
 * Shutdown happens in two phases: `seal()` stops accepting new signals while the consumer
 * can still take a pending one, then `close()` wakes any waiter with `false`.
 */
export type DirtySignal = {
  /** Returns true when the signal was queued, false when coalesced or sealed. */
  notify: () => boolean
  /** Resolves true when a signal was taken, false once nothing more will arrive. */
  take: () => Promise<boolean>
  pending: () => number
  seal: () => void
  close: () => void
  isSealed: () => boolean
}

export const createDirtySignal = (): DirtySignal => {
  let pending = false
  let sealed = false
  let closed = false
  let waiter: ((value: boolean) => void) | null = null

  const wake = (value: boolean) => {
    const resolve = waiter
    waiter = null
    resolve?.(value)
  }

  return {
    notify: () => {
      if (sealed || closed) return false
      if (waiter) {
        wake(true)
        return true
      }
      if (pending) return false
      pending = true
      return true
    },
    take: () => {
      if (pending) {
        pending = false
        return Promise.resolve(true)
      }
      if (sealed || closed) return Promise.resolve(false)
      return new Promise<boolean>((resolve) => {
        waiter = resolve
      })
    },
    pending: () => (pending ? 1 : 0),
    seal: () => {
      sealed = true
      if (!pending) wake(false)
    },
    close: () => {
      sealed = true
      closed = true
      pending = false
      wake(false)
    },
    isSealed: () => sealed,
  }
}
