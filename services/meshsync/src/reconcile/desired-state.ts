import type { MeshDescription } from '~/evaluator/evaluator'
import { createRwLock } from './rw-lock'

export type DesiredState = {
  /** Runs `fn` under the read lock; the description is null until the first replace. */
  read: <T>(fn: (mesh: MeshDescription | null) => Promise<T>) => Promise<T>
  replace: (mesh: MeshDescription) => Promise<void>
  current: () => MeshDescription | null
}

export const createDesiredState = (initial: MeshDescription | null = null): DesiredState => {
  const lock = createRwLock()
  let mesh = initial

  return {
    read: (fn) => lock.withRead(() => fn(mesh)),
    replace: (next) =>
      lock.withWrite(async () => {
        mesh = next
      }),
    current: () => mesh,
  }
}
