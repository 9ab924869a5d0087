import { describe, expect, it } from 'vitest'

import { createAllowlistReconciler } from '~/reconcile/allowlist-reconciler'
import { createLabelReconciler, workloadLabels } from '~/reconcile/label-reconciler'
import { createOutboundQueue } from '~/reconcile/outbound-queue'
import { createSidecarReconciler } from '~/reconcile/sidecar-reconciler'
import {
  ANNOTATION_CONFIGURE_SIDECAR,
  ANNOTATION_INJECT_SIDECAR_TO_PORT,
  LABEL_CLUSTER,
  LABEL_WORKLOAD,
} from '~/wellknown'
import { createTestContext, makeDeployment, makePod, makeStatefulSet, silentLogger } from './fakes'

const createSidecarQueue = () =>
  createOutboundQueue({ name: 'sidecar-config', concurrency: 1, maxPending: 8, logger: silentLogger })

describe('label reconciler', () => {
  it('stamps mesh labels and configures the sidecar in the background', async () => {
    const { context, cluster, evaluator, sent } = createTestContext()
    const queue = createSidecarQueue()
    const deployment = makeDeployment({ name: 'web', annotations: { [ANNOTATION_INJECT_SIDECAR_TO_PORT]: '9080' } })

    await createLabelReconciler(queue)(deployment, context)
    await queue.drain()

    expect(deployment.spec?.template.metadata?.labels).toEqual({
      app: 'web',
      [LABEL_CLUSTER]: 'web',
      [LABEL_WORKLOAD]: 'mesh-a.web',
    })
    expect(cluster.applied).toEqual([{ resource: deployment, mode: 'createOrUpdate' }])
    expect(evaluator.renderSidecarConfig).toHaveBeenCalledWith('web', '9080')
    expect(sent.map((command) => command.stdin)).toEqual([
      JSON.stringify({ cluster_key: 'web', zone_key: 'z1', port: 9080 }),
    ])
  })

  it('leaves labelled workloads alone', async () => {
    const { context, cluster } = createTestContext()
    const statefulSet = makeStatefulSet({ name: 'db', labels: workloadLabels('mesh-a', 'db') })

    await createLabelReconciler(createSidecarQueue())(statefulSet, context)

    expect(cluster.applied).toEqual([])
  })

  it('honours the configure-sidecar opt-out', async () => {
    const { context, cluster, evaluator } = createTestContext()
    const queue = createSidecarQueue()
    const deployment = makeDeployment({
      name: 'web',
      annotations: { [ANNOTATION_INJECT_SIDECAR_TO_PORT]: '9080', [ANNOTATION_CONFIGURE_SIDECAR]: 'false' },
    })

    await createLabelReconciler(queue)(deployment, context)
    await queue.drain()

    expect(cluster.applied).toHaveLength(1)
    expect(evaluator.renderSidecarConfig).not.toHaveBeenCalled()
  })

  it('skips sidecar configuration without an inject port', async () => {
    const { context, evaluator } = createTestContext()
    const queue = createSidecarQueue()

    await createLabelReconciler(queue)(makeDeployment({ name: 'plain' }), context)
    await queue.drain()

    expect(evaluator.renderSidecarConfig).not.toHaveBeenCalled()
  })
})

describe('sidecar reconciler', () => {
  const injectable = () =>
    makeDeployment({
      name: 'web',
      labels: { [LABEL_CLUSTER]: 'web' },
      annotations: { [ANNOTATION_INJECT_SIDECAR_TO_PORT]: '9080' },
    })

  it('injects the sidecar once', async () => {
    const { context, cluster, evaluator } = createTestContext()
    const reconcile = createSidecarReconciler('regcred')
    const deployment = injectable()

    await reconcile(deployment, context)
    await reconcile(deployment, context)

    const spec = deployment.spec?.template.spec
    expect(spec?.containers.map((container) => container.name)).toEqual(['web', 'sidecar'])
    expect(spec?.volumes).toEqual([{ name: 'sidecar-certs', emptyDir: {} }])
    expect(spec?.imagePullSecrets).toEqual([{ name: 'regcred' }])
    expect(evaluator.renderSidecarFor).toHaveBeenCalledTimes(1)
    expect(evaluator.renderSidecarFor).toHaveBeenCalledWith('web')
    expect(cluster.applied).toHaveLength(1)
  })

  it('does not duplicate an existing pull secret', async () => {
    const { context } = createTestContext()
    const deployment = injectable()
    const spec = deployment.spec?.template.spec
    if (spec) spec.imagePullSecrets = [{ name: 'regcred' }]

    await createSidecarReconciler('regcred')(deployment, context)

    expect(spec?.imagePullSecrets).toEqual([{ name: 'regcred' }])
  })

  it('needs the inject annotation and the cluster label', async () => {
    const { context, cluster } = createTestContext()
    const reconcile = createSidecarReconciler(null)

    await reconcile(makeDeployment({ name: 'a', labels: { [LABEL_CLUSTER]: 'a' } }), context)
    await reconcile(makeDeployment({ name: 'b', annotations: { [ANNOTATION_INJECT_SIDECAR_TO_PORT]: '80' } }), context)
    await reconcile(
      makeDeployment({
        name: 'c',
        labels: { [LABEL_CLUSTER]: 'c' },
        annotations: { [ANNOTATION_INJECT_SIDECAR_TO_PORT]: '' },
      }),
      context,
    )

    expect(cluster.applied).toEqual([])
  })

  it('skips when the tree has no sidecar template', async () => {
    const { context, cluster, evaluator } = createTestContext()
    evaluator.renderSidecarFor.mockResolvedValueOnce(null)
    const deployment = injectable()

    await createSidecarReconciler(null)(deployment, context)

    expect(deployment.spec?.template.spec?.containers).toHaveLength(1)
    expect(cluster.applied).toEqual([])
  })
})

describe('allowlist reconciler', () => {
  const pods = [
    makePod({ name: 'p1', cluster: 'b', proxy: true }),
    makePod({ name: 'p2', cluster: 'a', proxy: true }),
    makePod({ name: 'p3', namespace: 'web', cluster: 'a', proxy: true }),
    makePod({ name: 'p4', cluster: 'c' }),
    makePod({ name: 'p5', proxy: true }),
  ]

  it('dispatches the sorted cluster set once', async () => {
    const { context, evaluator, sent } = createTestContext()
    const reconcile = createAllowlistReconciler()

    await reconcile(pods, context)
    await reconcile([...pods].reverse(), context)

    expect(evaluator.renderAllowlist).toHaveBeenCalledTimes(1)
    expect(evaluator.renderAllowlist).toHaveBeenCalledWith(['a', 'b'])
    expect(sent.map((command) => command.args)).toEqual([['apply', '--kind', 'listener', '-f', '-']])
    expect(reconcile.recorded()).toEqual(['a', 'b'])
  })

  it('ignores an empty set', async () => {
    const { context, evaluator } = createTestContext()
    const reconcile = createAllowlistReconciler()

    await reconcile([makePod({ name: 'p4', cluster: 'c' })], context)

    expect(evaluator.renderAllowlist).not.toHaveBeenCalled()
  })

  it('records nothing until the listener is dispatched', async () => {
    const { context, evaluator, sent } = createTestContext()
    const reconcile = createAllowlistReconciler()
    evaluator.renderAllowlist.mockRejectedValueOnce(new Error('template failed')).mockResolvedValueOnce(null)

    await expect(reconcile(pods, context)).rejects.toThrow('template failed')
    expect(reconcile.recorded()).toEqual([])
    await reconcile(pods, context)
    expect(reconcile.recorded()).toEqual([])

    await reconcile(pods, context)
    expect(reconcile.recorded()).toEqual(['a', 'b'])
    expect(sent).toHaveLength(1)
  })
})
