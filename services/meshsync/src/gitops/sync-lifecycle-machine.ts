import { createActor, createMachine } from 'xstate'

const repositorySyncMachine = createMachine({
  id: 'repositorySync',
  initial: 'idle',
  states: {
    idle: {
      on: {
        CLONE: 'cloning',
        CLOSE: 'closed',
      },
    },
    cloning: {
      on: {
        CLONED: 'watching',
        CLONE_FAILED: 'idle',
        CLOSE: 'closed',
      },
    },
    watching: {
      on: {
        FETCH: 'fetching',
        CLOSE: 'closed',
      },
    },
    fetching: {
      on: {
        FETCHED: 'checkedOut',
        FETCH_FAILED: 'watching',
        CLOSE: 'closed',
      },
    },
    checkedOut: {
      on: {
        SETTLED: 'watching',
        CLOSE: 'closed',
      },
    },
    closed: {
      type: 'final',
    },
  },
})

export type RepositorySyncActor = ReturnType<typeof createRepositorySyncActor>
export type RepositorySyncStatus = 'idle' | 'cloning' | 'watching' | 'fetching' | 'checkedOut' | 'closed'
export type RepositorySyncEvent = 'CLONE' | 'CLONED' | 'CLONE_FAILED' | 'FETCH' | 'FETCHED' | 'FETCH_FAILED' | 'SETTLED'

const statuses: RepositorySyncStatus[] = ['cloning', 'watching', 'fetching', 'checkedOut', 'closed']

export const createRepositorySyncActor = () => {
  const actor = createActor(repositorySyncMachine)
  actor.start()
  return actor
}

export const getRepositorySyncStatus = (actor: RepositorySyncActor): RepositorySyncStatus => {
  const snapshot = actor.getSnapshot()
  return statuses.find((status) => snapshot.matches(status)) ?? 'idle'
}

/** Sends `event` only when the machine accepts it from its current state. */
export const transitionRepositorySync = (actor: RepositorySyncActor, event: RepositorySyncEvent) => {
  if (!actor.getSnapshot().can({ type: event })) return false
  actor.send({ type: event })
  return true
}

export const closeRepositorySync = (actor: RepositorySyncActor) => {
  actor.send({ type: 'CLOSE' })
}
