import type { ConfigEvaluator } from '~/evaluator/evaluator'
import {
  describeResource,
  type PodTemplateWorkload,
  podTemplateOf,
  setTemplateLabels,
  templateAnnotations,
  templateLabels,
} from '~/kube/workloads'
import type { CommandDispatcher } from '~/mesh/commands'
import {
  ANNOTATION_CONFIGURE_SIDECAR,
  ANNOTATION_INJECT_SIDECAR_TO_PORT,
  LABEL_CLUSTER,
  LABEL_WORKLOAD,
} from '~/wellknown'
import type { OutboundQueue } from './outbound-queue'
import type { WorkloadReconciler } from './types'

export const workloadLabels = (meshName: string, resourceName: string) => ({
  [LABEL_CLUSTER]: resourceName,
  [LABEL_WORKLOAD]: `${meshName}.${resourceName}`,
})

/** Renders the mesh objects that route to one sidecar and sends them as apply commands. */
export const configureSidecar = async (
  evaluator: ConfigEvaluator,
  commands: CommandDispatcher,
  clusterLabel: string,
  port: string,
) => {
  const candidates = await evaluator.renderSidecarConfig(clusterLabel, port)
  return commands.applyAll(
    candidates.map((candidate) => candidate.raw),
    candidates.map((candidate) => candidate.kind),
  )
}

export const createLabelReconciler =
  (sidecarConfigQueue: OutboundQueue): WorkloadReconciler<PodTemplateWorkload> =>
  async (resource, context) => {
    const template = podTemplateOf(resource)
    if (!template || LABEL_WORKLOAD in templateLabels(template)) return

    const name = resource.metadata?.name ?? ''
    const namespace = resource.metadata?.namespace ?? ''
    context.logger.info({ resource: describeResource(resource) }, 'stamping mesh labels')
    setTemplateLabels(template, workloadLabels(context.mesh.name, name))

    const annotations = templateAnnotations(template)
    const port = annotations[ANNOTATION_INJECT_SIDECAR_TO_PORT]
    if (port && annotations[ANNOTATION_CONFIGURE_SIDECAR] !== 'false') {
      sidecarConfigQueue.submit(`${namespace}/${name}`, async () => {
        const sent = await configureSidecar(context.evaluator, context.commands, name, port)
        context.logger.info({ cluster: name, port, commands: sent }, 'configured sidecar')
      })
    }

    await context.client.apply(resource, 'createOrUpdate')
  }
