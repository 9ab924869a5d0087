import { Redis } from 'ioredis'
import { z } from 'zod'

import { componentLogger, type Logger } from '~/logger'
import type { ConfigObjectRef, WorkloadObjectRef } from './object-refs'

/** Durable backing for snapshots: one value per key, overwritten wholesale. */
export type SnapshotStore = {
  connect: () => Promise<void>
  read: (key: string) => Promise<string | null>
  write: (key: string, value: string) => Promise<void>
  close: () => Promise<void>
}

export type RedisSnapshotStoreOptions = {
  host: string
  port: number
  db: number
  username?: string
  password?: string
  connectTimeoutMs?: number
  logger?: Logger
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000

export const createRedisSnapshotStore = (options: RedisSnapshotStoreOptions): SnapshotStore => {
  const log = options.logger ?? componentLogger('snapshot-store')
  let client: Redis | null = null

  const requireClient = () => {
    if (!client) throw new Error('snapshot store is not connected')
    return client
  }

  return {
    connect: async () => {
      if (client) return
      const candidate = new Redis({
        host: options.host,
        port: options.port,
        db: options.db,
        username: options.username,
        password: options.password,
        connectTimeout: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
        lazyConnect: true,
      })
      // an emitter throws 'error' events that have no listener
      candidate.on('error', (error: Error) => log.error({ err: error }, 'redis connection error'))
      try {
        await candidate.connect()
        await candidate.ping()
      } catch (error) {
        candidate.disconnect()
        throw error
      }
      client = candidate
    },
    read: async (key) => requireClient().get(key),
    write: async (key, value) => {
      await requireClient().set(key, value)
    },
    close: async () => {
      const current = client
      client = null
      if (current) {
        await current.quit()
      }
    },
  }
}

const configObjectRefSchema = z.object({
  zone: z.string(),
  kind: z.string(),
  id: z.string(),
  hash: z.string(),
})

const workloadObjectRefSchema = z.object({
  namespace: z.string(),
  kind: z.object({
    group: z.string(),
    version: z.string(),
    kind: z.string(),
  }),
  name: z.string(),
  hash: z.string(),
})

const configSnapshotSchema = z.record(configObjectRefSchema)
const workloadSnapshotSchema = z.record(workloadObjectRefSchema)

export const encodeSnapshot = <T>(snapshot: ReadonlyMap<string, T>) => JSON.stringify(Object.fromEntries(snapshot))

export const decodeConfigSnapshot = (raw: string): Map<string, ConfigObjectRef> =>
  new Map(Object.entries(configSnapshotSchema.parse(JSON.parse(raw))))

export const decodeWorkloadSnapshot = (raw: string): Map<string, WorkloadObjectRef> =>
  new Map(Object.entries(workloadSnapshotSchema.parse(JSON.parse(raw))))
