/**
 * Async read/write lock. Once a writer is waiting, new readers queue behind it; a released
 * writer hands over to every queued reader before the next writer.
 */
export type RwLock = {
  withRead: <T>(fn: () => Promise<T>) => Promise<T>
  withWrite: <T>(fn: () => Promise<T>) => Promise<T>
  state: () => { readers: number; writer: boolean; waitingReaders: number; waitingWriters: number }
}

export const createRwLock = (): RwLock => {
  let readers = 0
  let writer = false
  let waitingReaders: Array<() => void> = []
  const waitingWriters: Array<() => void> = []

  const grantWriter = () => {
    const next = waitingWriters.shift()
    if (!next) return false
    writer = true
    next()
    return true
  }

  const grantReaders = () => {
    const queued = waitingReaders
    waitingReaders = []
    readers += queued.length
    for (const resolve of queued) resolve()
    return queued.length > 0
  }

  const acquireRead = () =>
    new Promise<void>((resolve) => {
      if (!writer && waitingWriters.length === 0) {
        readers += 1
        resolve()
        return
      }
      waitingReaders.push(resolve)
    })

  const acquireWrite = () =>
    new Promise<void>((resolve) => {
      if (!writer && readers === 0) {
        writer = true
        resolve()
        return
      }
      waitingWriters.push(resolve)
    })

  const releaseRead = () => {
    readers -= 1
    if (readers === 0) grantWriter()
  }

  const releaseWrite = () => {
    writer = false
    if (!grantReaders()) grantWriter()
  }

  return {
    withRead: async (fn) => {
      await acquireRead()
      try {
        return await fn()
      } finally {
        releaseRead()
      }
    },
    withWrite: async (fn) => {
      await acquireWrite()
      try {
        return await fn()
      } finally {
        releaseWrite()
      }
    },
    state: () => ({
      readers,
      writer,
      waitingReaders: waitingReaders.length,
      waitingWriters: waitingWriters.length,
    }),
  }
}
