import { resolve } from 'node:path'

import { OperatorConfigError } from '~/errors'
import { type RepoRef, resolveRepoRef } from '~/gitops/repo-ref'
import type { SshCredentials } from '~/gitops/ssh-auth'

export type OperatorConfig = {
  git: {
    remote: string | null
    ref: RepoRef
    localPath: string
    ssh: SshCredentials | null
    pollIntervalSeconds: number
    /** Where the desired-state tree lives inside the checkout. */
    treeSubdir: string
  }
  redis: {
    host: string
    port: number
    db: number
    username: string | null
    password: string | null
  }
  stateKeys: {
    config: string
    workload: string
  }
  mesh: {
    mtlsEnabled: boolean
    imagePullSecret: string | null
    operatorNamespace: string | null
  }
  meshCli: {
    binary: string
    baseArgs: string[]
    requeueDelayMs: number
    maxAttempts: number
  }
  reconcile: {
    intervalMs: number
    sidecarConcurrency: number
    sidecarMaxPending: number
  }
}

type Env = Record<string, string | undefined>

const DEFAULT_REDIS_PORT = 6379
const DEFAULT_POLL_INTERVAL_SECONDS = 10
const DEFAULT_RECONCILE_INTERVAL_SECONDS = 30

export const parseBooleanEnv = (value: string | undefined, fallback: boolean) => {
  if (value == null) return fallback
  const normalized = value.trim().toLowerCase()
  if (['1', 'true', 'yes', 'y'].includes(normalized)) return true
  if (['0', 'false', 'no', 'n'].includes(normalized)) return false
  return fallback
}

export const parseNumberEnv = (value: string | undefined, fallback: number, min = 0) => {
  if (!value) return fallback
  const parsed = Number.parseInt(value, 10)
  if (!Number.isFinite(parsed) || parsed < min) return fallback
  return parsed
}

const optional = (value: string | undefined) => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : null
}

const parsePort = (input: string | undefined): number => {
  if (!input) return DEFAULT_REDIS_PORT
  const parsed = Number.parseInt(input, 10)
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed > 65535) {
    throw new OperatorConfigError(`Invalid MESHSYNC_REDIS_PORT value: ${input}`)
  }
  return parsed
}

export const loadConfig = (env: Env = process.env): OperatorConfig => {
  const sshKeyPath = optional(env.MESHSYNC_SSH_KEY_PATH)
  const passphrase = optional(env.MESHSYNC_SSH_PASSPHRASE)
  if (passphrase && !sshKeyPath) {
    throw new OperatorConfigError('MESHSYNC_SSH_PASSPHRASE is set but MESHSYNC_SSH_KEY_PATH is not')
  }

  return {
    git: {
      remote: optional(env.MESHSYNC_GIT_REMOTE),
      ref: resolveRepoRef({ branch: env.MESHSYNC_GIT_BRANCH, tag: env.MESHSYNC_GIT_TAG }),
      localPath: resolve(optional(env.MESHSYNC_GIT_DIR) ?? process.cwd()),
      ssh: sshKeyPath ? { privateKeyPath: sshKeyPath, passphrase } : null,
      pollIntervalSeconds: parseNumberEnv(env.MESHSYNC_SYNC_INTERVAL_SECONDS, DEFAULT_POLL_INTERVAL_SECONDS, 1),
      treeSubdir: optional(env.MESHSYNC_TREE_SUBDIR) ?? '.',
    },
    redis: {
      host: optional(env.MESHSYNC_REDIS_HOST) ?? '127.0.0.1',
      port: parsePort(env.MESHSYNC_REDIS_PORT),
      db: parseNumberEnv(env.MESHSYNC_REDIS_DB, 0),
      username: optional(env.MESHSYNC_REDIS_USERNAME),
      password: optional(env.MESHSYNC_REDIS_PASSWORD),
    },
    stateKeys: {
      config: optional(env.MESHSYNC_STATE_KEY_CONFIG) ?? 'meshsync.state.config',
      workload: optional(env.MESHSYNC_STATE_KEY_WORKLOADS) ?? 'meshsync.state.workloads',
    },
    mesh: {
      mtlsEnabled: parseBooleanEnv(env.MESHSYNC_MTLS_ENABLED, false),
      imagePullSecret: optional(env.MESHSYNC_IMAGE_PULL_SECRET),
      operatorNamespace: optional(env.POD_NAMESPACE),
    },
    meshCli: {
      binary: optional(env.MESHSYNC_MESH_CLI) ?? 'meshctl',
      baseArgs: (env.MESHSYNC_MESH_CLI_ARGS ?? '').split(/\s+/).filter(Boolean),
      requeueDelayMs: parseNumberEnv(env.MESHSYNC_COMMAND_REQUEUE_DELAY_MS, 5_000, 0),
      maxAttempts: parseNumberEnv(env.MESHSYNC_COMMAND_MAX_ATTEMPTS, 5, 1),
    },
    reconcile: {
      intervalMs: parseNumberEnv(env.MESHSYNC_RECONCILE_INTERVAL_SECONDS, DEFAULT_RECONCILE_INTERVAL_SECONDS, 1) * 1000,
      sidecarConcurrency: parseNumberEnv(env.MESHSYNC_SIDECAR_CONCURRENCY, 4, 1),
      sidecarMaxPending: parseNumberEnv(env.MESHSYNC_SIDECAR_MAX_PENDING, 256, 1),
    },
  }
}
