import type { V1Container, V1Deployment, V1Pod, V1StatefulSet } from '@kubernetes/client-node'
import pino from 'pino'
import { vi } from 'vitest'

import type { ConfigCandidate } from '~/change-set/object-refs'
import type { SnapshotStore } from '~/change-set/snapshot-store'
import type { MeshDescription, RenderedState, SidecarFragment } from '~/evaluator/evaluator'
import type { GitCommandResult, GitRunner } from '~/gitops/git-runner'
import type { ApplyMode, ClusterClient, ClusterResource, ResourceRef } from '~/kube/kube-client'
import { type Command, type CommandSink, createCommandDispatcher } from '~/mesh/commands'
import type { ReconcileContext } from '~/reconcile/types'
import { LABEL_CLUSTER } from '~/wellknown'

export const silentLogger = pino({ level: 'silent' })

export const flushAsync = () => new Promise<void>((resolve) => setImmediate(resolve))

export const deferred = () => {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((done) => {
    resolve = done
  })
  return { promise, resolve }
}

export const createMemoryStore = (options: { failConnects?: number; initial?: Record<string, string> } = {}) => {
  const values = new Map(Object.entries(options.initial ?? {}))
  let failuresLeft = options.failConnects ?? 0
  const store = {
    connect: vi.fn(async () => {
      if (failuresLeft > 0) {
        failuresLeft -= 1
        throw new Error('connect ECONNREFUSED 127.0.0.1:6379')
      }
    }),
    read: vi.fn(async (key: string) => values.get(key) ?? null),
    write: vi.fn(async (key: string, value: string) => {
      values.set(key, value)
    }),
    close: vi.fn(async () => {}),
  } satisfies SnapshotStore
  return { store, values }
}

const ok = (stdout = ''): GitCommandResult => ({ exitCode: 0, stdout, stderr: '' })

export type GitCall = {
  args: string[]
  cwd?: string
  env?: Record<string, string>
}

/**
 * Answers git invocations the way a healthy checkout would. `rev-parse HEAD` walks through
 * `heads`, repeating the last one; `fail` turns any invocation into a non-zero exit.
 */
export const createFakeGit = (
  options: { heads?: string[]; tagCommit?: string; fail?: (args: string[]) => boolean } = {},
) => {
  const heads = options.heads ?? ['0000000000000000000000000000000000000000']
  const calls: GitCall[] = []
  let headIndex = 0

  const runner: GitRunner = async (args, commandOptions = {}) => {
    calls.push({ args, cwd: commandOptions.cwd, env: commandOptions.env })
    if (options.fail?.(args)) {
      return { exitCode: 1, stdout: '', stderr: `fatal: unable to ${args[0] ?? 'run'}` }
    }
    if (args[0] === 'checkout' && args[1] === '-b') {
      return { exitCode: 128, stdout: '', stderr: `fatal: a branch named '${args[2] ?? ''}' already exists` }
    }
    if (args[0] === 'rev-parse' && args[1] === 'HEAD') {
      const head = heads[Math.min(headIndex, heads.length - 1)] ?? ''
      headIndex += 1
      return ok(`${head}\n`)
    }
    if (args[0] === 'rev-parse' && args[1] === '--verify') {
      return ok(`${options.tagCommit ?? 'c0ffee'}\n`)
    }
    return ok()
  }

  return {
    runner,
    calls,
    commands: () => calls.map((call) => call.args),
    headReads: () => calls.filter((call) => call.args[0] === 'rev-parse' && call.args[1] === 'HEAD').length,
  }
}

export type ClusterState = {
  pods?: Record<string, V1Pod[]>
  deployments?: Record<string, V1Deployment[]>
  statefulSets?: Record<string, V1StatefulSet[]>
  objects?: Record<string, Record<string, unknown>>
}

export const refKey = (ref: ResourceRef) => `${ref.namespace}/${ref.kind.kind}/${ref.name}`

export const createFakeCluster = (state: ClusterState = {}) => {
  const applied: Array<{ resource: ClusterResource; mode: ApplyMode }> = []
  const deleted: ResourceRef[] = []
  const client = {
    listPods: vi.fn(async (namespace: string) => state.pods?.[namespace] ?? []),
    listDeployments: vi.fn(async (namespace: string) => state.deployments?.[namespace] ?? []),
    listStatefulSets: vi.fn(async (namespace: string) => state.statefulSets?.[namespace] ?? []),
    get: vi.fn(async (ref: ResourceRef) => state.objects?.[refKey(ref)] ?? null),
    apply: vi.fn(async (resource: ClusterResource, mode: ApplyMode) => {
      applied.push({ resource, mode })
    }),
    delete: vi.fn(async (ref: ResourceRef) => {
      deleted.push(ref)
      return true
    }),
  } satisfies ClusterClient
  return { client, applied, deleted }
}

export const createRecordingSink = () => {
  const commands: Command[] = []
  const sink: CommandSink = {
    enqueue: (command) => {
      commands.push(command)
    },
  }
  return { sink, commands }
}

export const testMesh: MeshDescription = {
  name: 'mesh-a',
  zone: 'z1',
  installNamespace: 'mesh-system',
  watchNamespaces: ['apps'],
}

export const sidecarContainer = (clusterLabel: string): V1Container => ({
  name: 'sidecar',
  image: 'proxy:test',
  env: [{ name: 'XDS_CLUSTER', value: clusterLabel }],
  ports: [{ name: 'proxy', containerPort: 10808 }],
})

export const sidecarFragment = (clusterLabel: string): SidecarFragment => ({
  container: sidecarContainer(clusterLabel),
  volumes: [{ name: 'sidecar-certs', emptyDir: {} }],
})

export const createFakeEvaluator = () => ({
  describeMesh: vi.fn(async (): Promise<MeshDescription> => testMesh),
  renderAll: vi.fn(async (): Promise<RenderedState> => ({ manifests: [], configs: [] })),
  renderSidecarFor: vi.fn(
    async (clusterLabel: string): Promise<SidecarFragment | null> => sidecarFragment(clusterLabel),
  ),
  renderAllowlist: vi.fn(
    async (clusterLabels: string[]): Promise<string | null> =>
      JSON.stringify({ listener_key: 'ingress-allowlist', zone_key: 'z1', allowed_clusters: clusterLabels }),
  ),
  renderSidecarConfig: vi.fn(
    async (clusterLabel: string, port: string): Promise<ConfigCandidate[]> => [
      { raw: JSON.stringify({ cluster_key: clusterLabel, zone_key: 'z1', port: Number(port) }), kind: 'cluster' },
    ],
  ),
})

const appContainer = (name: string, proxy = false): V1Container => ({
  name,
  image: `${name}:test`,
  ports: proxy ? [{ name: 'proxy', containerPort: 10808 }] : [{ name: 'http', containerPort: 8080 }],
})

type WorkloadSpec = {
  name: string
  namespace?: string
  labels?: Record<string, string>
  annotations?: Record<string, string>
  containers?: V1Container[]
}

const podTemplate = (spec: WorkloadSpec) => ({
  metadata: { labels: { app: spec.name, ...spec.labels }, annotations: spec.annotations },
  spec: { containers: spec.containers ?? [appContainer(spec.name)] },
})

export const makeDeployment = (spec: WorkloadSpec): V1Deployment => ({
  apiVersion: 'apps/v1',
  kind: 'Deployment',
  metadata: { name: spec.name, namespace: spec.namespace ?? 'apps' },
  spec: { selector: { matchLabels: { app: spec.name } }, template: podTemplate(spec) },
})

export const makeStatefulSet = (spec: WorkloadSpec): V1StatefulSet => ({
  apiVersion: 'apps/v1',
  kind: 'StatefulSet',
  metadata: { name: spec.name, namespace: spec.namespace ?? 'apps' },
  spec: { serviceName: spec.name, selector: { matchLabels: { app: spec.name } }, template: podTemplate(spec) },
})

export const makePod = (spec: { name: string; namespace?: string; cluster?: string; proxy?: boolean }): V1Pod => ({
  apiVersion: 'v1',
  kind: 'Pod',
  metadata: {
    name: spec.name,
    namespace: spec.namespace ?? 'apps',
    labels: spec.cluster ? { [LABEL_CLUSTER]: spec.cluster } : {},
  },
  spec: { containers: [appContainer('app', spec.proxy ?? false)] },
})

/** A reconcile context over a fake cluster, a fake evaluator and a recording command sink. */
export const createTestContext = (state: ClusterState = {}, mesh: MeshDescription = testMesh) => {
  const cluster = createFakeCluster(state)
  const evaluator = createFakeEvaluator()
  const recording = createRecordingSink()
  const commands = createCommandDispatcher({ sink: recording.sink, logger: silentLogger })
  const context: ReconcileContext = { mesh, client: cluster.client, evaluator, commands, logger: silentLogger }
  return { context, cluster, evaluator, commands, sent: recording.commands }
}
