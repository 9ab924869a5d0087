import { createActor, createMachine } from 'xstate'

const operatorLifecycleMachine = createMachine({
  id: 'operatorLifecycle',
  initial: 'idle',
  states: {
    idle: {
      on: {
        START: 'starting',
      },
    },
    starting: {
      on: {
        STARTED: 'running',
        FAILED: 'idle',
        STOP: 'stopping',
      },
    },
    running: {
      on: {
        STOP: 'stopping',
      },
    },
    stopping: {
      on: {
        STOPPED: 'idle',
      },
    },
  },
})

export type OperatorLifecycleActor = ReturnType<typeof createOperatorLifecycleActor>
export type OperatorLifecycleStatus = 'idle' | 'starting' | 'running' | 'stopping'

export const createOperatorLifecycleActor = () => {
  const actor = createActor(operatorLifecycleMachine)
  actor.start()
  return actor
}

export const getOperatorLifecycleStatus = (actor: OperatorLifecycleActor): OperatorLifecycleStatus => {
  const snapshot = actor.getSnapshot()
  if (snapshot.matches('starting')) return 'starting'
  if (snapshot.matches('running')) return 'running'
  if (snapshot.matches('stopping')) return 'stopping'
  return 'idle'
}

export const requestOperatorStart = (actor: OperatorLifecycleActor) => {
  if (getOperatorLifecycleStatus(actor) !== 'idle') return false
  actor.send({ type: 'START' })
  return true
}

export const markOperatorStarted = (actor: OperatorLifecycleActor) => {
  if (getOperatorLifecycleStatus(actor) !== 'starting') return false
  actor.send({ type: 'STARTED' })
  return true
}

export const markOperatorStartFailed = (actor: OperatorLifecycleActor) => {
  if (getOperatorLifecycleStatus(actor) !== 'starting') return
  actor.send({ type: 'FAILED' })
}

/** Returns false when there is nothing to stop. */
export const requestOperatorStop = (actor: OperatorLifecycleActor) => {
  const status = getOperatorLifecycleStatus(actor)
  if (status !== 'starting' && status !== 'running') return false
  actor.send({ type: 'STOP' })
  return true
}

export const markOperatorStopped = (actor: OperatorLifecycleActor) => {
  if (getOperatorLifecycleStatus(actor) !== 'stopping') return
  actor.send({ type: 'STOPPED' })
}
