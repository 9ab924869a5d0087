import { stat } from 'node:fs/promises'
import { join } from 'node:path'

import { componentLogger, type Logger } from '~/logger'
import { sleep } from '~/shared/sleep'
import { git, GitCommandError, type GitRunner, runGitCommand } from './git-runner'
import { describeRepoRef, type RepoRef } from './repo-ref'
import { type GitAuth, prepareGitAuth, type SshCredentials } from './ssh-auth'
import {
  closeRepositorySync,
  createRepositorySyncActor,
  getRepositorySyncStatus,
  type RepositorySyncStatus,
  transitionRepositorySync,
} from './sync-lifecycle-machine'

export const DEFAULT_POLL_INTERVAL_SECONDS = 10

export type RevisionChangedHandler = (revision: string, previous: string) => void | Promise<void>

export type SyncConfig = {
  remote: string | null
  ref: RepoRef
  localPath: string
  ssh: SshCredentials | null
  pollIntervalSeconds: number
  onRevisionChanged?: RevisionChangedHandler
}

export type RepositorySyncOptions = SyncConfig & {
  /** Closed together with the sync; owns the durable-state connection. */
  engine?: { close: () => Promise<void> } | null
  runner?: GitRunner
  logger?: Logger
}

export type RepositorySync = {
  bootstrap: () => Promise<void>
  tick: () => Promise<string | null>
  watch: () => Promise<void>
  close: () => Promise<void>
  getRevision: () => string | null
  getStatus: () => RepositorySyncStatus
}

const exists = async (path: string) => {
  try {
    await stat(path)
    return true
  } catch {
    return false
  }
}

export const createRepositorySync = (options: RepositorySyncOptions): RepositorySync => {
  const { remote, ref, localPath } = options
  const runner = options.runner ?? runGitCommand
  const log = options.logger ?? componentLogger('repository-sync')
  const intervalMs = Math.max(1, options.pollIntervalSeconds) * 1000

  const actor = createRepositorySyncActor()
  const abort = new AbortController()
  let auth: GitAuth | null = null
  let lastRevision: string | null = null
  let watching: Promise<void> | null = null
  let closing: Promise<void> | null = null

  const authEnv = async () => {
    if (!auth) auth = await prepareGitAuth(options.ssh)
    return auth.env
  }

  const run = async (args: string[], cwd: string | null = localPath) =>
    git(runner, args, { cwd: cwd ?? undefined, env: await authEnv() })

  const checkoutBranch = async (branch: string) => {
    try {
      await run(['checkout', '-b', branch, '--track', `origin/${branch}`])
    } catch (error) {
      if (!(error instanceof GitCommandError) || !error.stderr.includes('already exists')) throw error
    }
    await run(['checkout', '--force', branch])
    await run(['pull', '--force', '--no-rebase', '--recurse-submodules', 'origin', branch])
  }

  const checkoutTag = async (tag: string) => {
    const commit = await run(['rev-parse', '--verify', '--quiet', `refs/tags/${tag}^{commit}`])
    await run(['checkout', '--force', commit])
    await run(['submodule', 'update', '--init', '--recursive', '--force'])
  }

  const update = async () => {
    await run(['fetch', '--tags', '--force', '--prune', 'origin'])
    if (ref.type === 'branch') {
      await checkoutBranch(ref.name)
    } else {
      await checkoutTag(ref.name)
    }
    await run(['clean', '-fd'])
    return run(['rev-parse', 'HEAD'])
  }

  const bootstrap = async () => {
    if (!remote) {
      log.info({ localPath }, 'no git remote configured; using the local tree as-is')
      return
    }
    if (!transitionRepositorySync(actor, 'CLONE')) return
    try {
      if (await exists(join(localPath, '.git'))) {
        // a kept clone can be behind the remote; bring it up to date before the first apply
        lastRevision = await update()
        log.info({ localPath, revision: lastRevision }, 'refreshed existing clone')
      } else {
        await run(['clone', '--recurse-submodules', '--branch', ref.name, remote, localPath], null)
        lastRevision = await run(['rev-parse', 'HEAD'])
        log.info({ remote, ref: describeRepoRef(ref), localPath, revision: lastRevision }, 'cloned repository')
      }
      transitionRepositorySync(actor, 'CLONED')
    } catch (error) {
      transitionRepositorySync(actor, 'CLONE_FAILED')
      throw error
    }
  }

  const tick = async () => {
    if (!remote || !transitionRepositorySync(actor, 'FETCH')) return lastRevision

    let revision: string
    try {
      revision = await update()
    } catch (error) {
      log.error({ err: error, remote, ref: describeRepoRef(ref) }, 'failed while syncing repository')
      transitionRepositorySync(actor, 'FETCH_FAILED')
      return lastRevision
    }
    if (!transitionRepositorySync(actor, 'FETCHED')) return lastRevision

    const previous = lastRevision
    lastRevision = revision
    if (previous !== null && previous !== revision) {
      log.info({ revision, previous }, 'repository revision changed')
      try {
        await options.onRevisionChanged?.(revision, previous)
      } catch (error) {
        log.error({ err: error, revision }, 'revision change handler failed')
      }
    }
    transitionRepositorySync(actor, 'SETTLED')
    return revision
  }

  const watch = () => {
    if (!remote) return Promise.resolve()
    if (!watching) {
      watching = (async () => {
        while (!abort.signal.aborted) {
          await tick()
          await sleep(intervalMs, abort.signal)
        }
      })()
    }
    return watching
  }

  const close = () => {
    if (!closing) {
      closing = (async () => {
        closeRepositorySync(actor)
        abort.abort()
        if (watching) await watching
        await auth?.dispose()
        await options.engine?.close()
        log.info('repository sync closed')
      })()
    }
    return closing
  }

  return {
    bootstrap,
    tick,
    watch,
    close,
    getRevision: () => lastRevision,
    getStatus: () => getRepositorySyncStatus(actor),
  }
}
