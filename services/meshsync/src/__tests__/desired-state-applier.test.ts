import { afterEach, describe, expect, it } from 'vitest'

import { type ChangeSetEngine, createChangeSetEngine } from '~/change-set/change-set-engine'
import type { RenderedState } from '~/evaluator/evaluator'
import type { WorkloadManifest } from '~/kube/workloads'
import { createDesiredStateApplier, withDefaultNamespace } from '~/operator/desired-state-applier'
import { createDesiredState } from '~/reconcile/desired-state'
import { createMemoryStore, createTestContext, silentLogger, testMesh } from './fakes'

const web: WorkloadManifest = {
  apiVersion: 'apps/v1',
  kind: 'Deployment',
  metadata: { name: 'web' },
  spec: { replicas: 1 },
}
const extraNamespace: WorkloadManifest = { apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'extra' } }
const clusterA = { raw: JSON.stringify({ cluster_key: 'a', zone_key: 'z1' }), kind: 'cluster' }

const engines: ChangeSetEngine[] = []

afterEach(async () => {
  await Promise.all(engines.splice(0).map((engine) => engine.close()))
})

const setup = () => {
  const { cluster, evaluator, commands, sent } = createTestContext({
    objects: {
      'mesh-system/Secret/regcred': { type: 'kubernetes.io/dockerconfigjson', data: { '.dockerconfigjson': 'e30=' } },
    },
  })
  const engine = createChangeSetEngine({
    store: createMemoryStore().store,
    keys: { config: 'config', workload: 'workload' },
    logger: silentLogger,
  })
  engines.push(engine)
  const desired = createDesiredState()
  const applier = createDesiredStateApplier({
    evaluator,
    desired,
    engine,
    client: cluster.client,
    commands,
    imagePullSecret: { name: 'regcred', namespace: 'mesh-system' },
    logger: silentLogger,
  })
  return { cluster, evaluator, desired, applier, sent }
}

const rendered = (state: RenderedState) => async () => state

describe('desired state applier', () => {
  it('prepares namespaces, applies manifests and dispatches configuration', async () => {
    const { cluster, evaluator, desired, applier, sent } = setup()
    evaluator.renderAll.mockImplementation(rendered({ manifests: [web, extraNamespace], configs: [clusterA] }))

    const result = await applier.apply()

    expect(desired.current()).toEqual(testMesh)
    expect(result).toEqual({
      mesh: testMesh,
      manifestsApplied: 2,
      manifestsDeleted: 0,
      configsApplied: 1,
      configsDeleted: 0,
      failures: 0,
    })
    expect(cluster.applied).toEqual([
      { resource: { apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'mesh-system' } }, mode: 'getOrCreate' },
      { resource: { apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'apps' } }, mode: 'getOrCreate' },
      {
        resource: {
          apiVersion: 'v1',
          kind: 'Secret',
          metadata: { name: 'regcred', namespace: 'apps' },
          type: 'kubernetes.io/dockerconfigjson',
          data: { '.dockerconfigjson': 'e30=' },
        },
        mode: 'getOrCreate',
      },
      { resource: { ...web, metadata: { name: 'web', namespace: 'mesh-system' } }, mode: 'createOrUpdate' },
      { resource: extraNamespace, mode: 'createOrUpdate' },
    ])
    expect(sent.map((command) => command.args)).toEqual([['apply', '--kind', 'cluster', '-f', '-']])
    expect(applier.lastResult()?.configsApplied).toBe(1)
  })

  it('does nothing new for an unchanged tree', async () => {
    const { cluster, evaluator, applier, sent } = setup()
    evaluator.renderAll.mockImplementation(rendered({ manifests: [web], configs: [clusterA] }))

    await applier.apply()
    const applied = cluster.applied.length
    const second = await applier.apply()

    expect(second).toMatchObject({ manifestsApplied: 0, manifestsDeleted: 0, configsApplied: 0, configsDeleted: 0 })
    // only the namespace and secret ensures repeat
    expect(cluster.applied.slice(applied).every(({ mode }) => mode === 'getOrCreate')).toBe(true)
    expect(sent).toHaveLength(1)
  })

  it('deletes what left the tree', async () => {
    const { cluster, evaluator, applier, sent } = setup()
    evaluator.renderAll.mockImplementationOnce(rendered({ manifests: [web], configs: [clusterA] }))
    await applier.apply()

    evaluator.renderAll.mockImplementationOnce(rendered({ manifests: [], configs: [] }))
    const result = await applier.apply()

    expect(result).toMatchObject({ manifestsDeleted: 1, configsDeleted: 1 })
    expect(cluster.deleted).toEqual([
      {
        namespace: 'mesh-system',
        kind: { group: 'apps', version: 'v1', kind: 'Deployment' },
        name: 'web',
        hash: expect.any(String),
      },
    ])
    expect(sent.at(-1)?.args).toEqual(['delete', 'cluster', '--cluster-key', 'a'])
  })

  it('counts failed manifests and carries on', async () => {
    const { cluster, evaluator, applier, sent } = setup()
    evaluator.renderAll.mockImplementation(rendered({ manifests: [web], configs: [clusterA] }))
    cluster.client.apply.mockImplementation(async (resource) => {
      if (resource.kind === 'Deployment') throw new Error('admission webhook denied the request')
    })

    const result = await applier.apply()

    expect(result.failures).toBe(1)
    expect(sent).toHaveLength(1)
  })

  it('surfaces a broken mesh description before touching anything', async () => {
    const { cluster, evaluator, desired, applier } = setup()
    evaluator.describeMesh.mockRejectedValueOnce(new Error('mesh.yaml: file not found'))

    await expect(applier.apply()).rejects.toThrow('mesh.yaml: file not found')
    expect(desired.current()).toBeNull()
    expect(cluster.applied).toEqual([])
  })
})

describe('withDefaultNamespace', () => {
  it('leaves namespaced and cluster-scoped manifests alone', () => {
    const placed = { ...web, metadata: { name: 'web', namespace: 'apps' } }
    expect(withDefaultNamespace(placed, 'mesh-system')).toBe(placed)
    expect(withDefaultNamespace(extraNamespace, 'mesh-system')).toBe(extraNamespace)
    expect(withDefaultNamespace(web, 'mesh-system').metadata.namespace).toBe('mesh-system')
  })
})
